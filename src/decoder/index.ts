export * from './SdpLineDecoder';
