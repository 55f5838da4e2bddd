import { SdpParseError, SdpParseErrorCode } from '../SdpParseError';

// a=orient:<value>, case-sensitive
export const Orient = {
  Portrait: 'portrait',
  Landscape: 'landscape',
  Seascape: 'seascape',
} as const;

export type Orient = (typeof Orient)[keyof typeof Orient];

const ORIENTATIONS: ReadonlySet<string> = new Set(Object.values(Orient));

const isOrient = (value: string): value is Orient => ORIENTATIONS.has(value);

export const parseOrient = (text: string): Orient => {
  if (!isOrient(text)) {
    throw new SdpParseError(SdpParseErrorCode.VOCABULARY, 'invalid orient!', text);
  }
  return text;
};
