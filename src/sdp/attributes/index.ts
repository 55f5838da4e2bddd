export * from './ExtMap';
export * from './Fmtp';
export * from './Kind';
export * from './Mid';
export * from './Orient';
export * from './RtpMap';
export * from './Ssrc';
