import { SdpParseError, SdpParseErrorCode } from '../SdpParseError';

/**
 * `a=type:<conference-type>`
 *
 * - `broadcast` usually pairs with `a=recvonly` for those connecting.
 * - `meeting` usually pairs with `a=sendrecv`.
 * - `moderated` suggests a floor control tool, with new sites muted on join.
 * - `H332` marks a loosely coupled session that is part of an H.332 session.
 * - `test` hints that receivers need not display the session to users.
 *
 * The names are case-sensitive.
 */
export const Kind = {
  Broadcast: 'broadcast',
  Meeting: 'meeting',
  Moderated: 'moderated',
  Test: 'test',
  H332: 'H332',
} as const;

export type Kind = (typeof Kind)[keyof typeof Kind];

const KINDS: ReadonlySet<string> = new Set(Object.values(Kind));

const isKind = (value: string): value is Kind => KINDS.has(value);

export const parseKind = (text: string): Kind => {
  if (!isKind(text)) {
    throw new SdpParseError(SdpParseErrorCode.VOCABULARY, 'invalid type!', text);
  }
  return text;
};
