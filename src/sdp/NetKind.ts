import { SdpParseError, SdpParseErrorCode } from './SdpParseError';

export const NetKind = {
  IN: 'IN',
} as const;

export type NetKind = (typeof NetKind)[keyof typeof NetKind];

export const AddrKind = {
  IP4: 'IP4',
  IP6: 'IP6',
} as const;

export type AddrKind = (typeof AddrKind)[keyof typeof AddrKind];

export const parseNetKind = (text: string): NetKind => {
  if (text !== NetKind.IN) {
    throw new SdpParseError(SdpParseErrorCode.VOCABULARY, 'invalid nettype!', text);
  }
  return text;
};

export const parseAddrKind = (text: string): AddrKind => {
  switch (text) {
    case AddrKind.IP4:
    case AddrKind.IP6:
      return text;
    default:
      throw new SdpParseError(SdpParseErrorCode.VOCABULARY, 'invalid addrtype!', text);
  }
};
