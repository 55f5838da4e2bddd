export * from './attributes';
export * from './Attribute';
export * from './Connection';
export * from './NetKind';
export * from './numeric';
export * from './SdpParseError';
export * from './split';
