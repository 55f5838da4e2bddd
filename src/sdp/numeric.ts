import { SdpNumericError } from './SdpParseError';

export type UnsignedWidth = 8 | 16 | 32;

const DECIMAL = /^\+?\d+$/;

const U64_MAX = 2n ** 64n - 1n;

export const maxUnsigned = (bits: UnsignedWidth): number => 2 ** bits - 1;

export const isUnsigned = (value: number, bits: UnsignedWidth): boolean =>
  Number.isInteger(value) && value >= 0 && value <= maxUnsigned(bits);

/**
 * Parses a decimal unsigned integer that must fit in `bits`. A leading `+`
 * is accepted; whitespace, signs other than `+`, fractions and exponents are not.
 */
export const parseUnsigned = (text: string, bits: UnsignedWidth, field: string): number => {
  if (!DECIMAL.test(text)) {
    throw new SdpNumericError(field, text, bits);
  }
  const value = Number.parseInt(text, 10);
  if (!isUnsigned(value, bits)) {
    throw new SdpNumericError(field, text, bits);
  }
  return value;
};

// Same grammar as parseUnsigned, for fields that use the full u64 range.
export const parseUnsigned64 = (text: string, field: string): bigint => {
  if (!DECIMAL.test(text)) {
    throw new SdpNumericError(field, text, 64);
  }
  const value = BigInt(text.startsWith('+') ? text.slice(1) : text);
  if (value > U64_MAX) {
    throw new SdpNumericError(field, text, 64);
  }
  return value;
};
