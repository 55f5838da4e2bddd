export * from './sdp';
export * from './decoder';
export * from './configurations';
export * from './logging';
export { container } from './container';
