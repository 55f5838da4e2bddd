export const SdpParseErrorCode = {
  ARITY: 'ARITY',
  NUMERIC_FORMAT: 'NUMERIC_FORMAT',
  VOCABULARY: 'VOCABULARY',
  ADDRESS_FORMAT: 'ADDRESS_FORMAT',
} as const;

export type SdpParseErrorCode = (typeof SdpParseErrorCode)[keyof typeof SdpParseErrorCode];

export class SdpParseError extends Error {
  public readonly code: SdpParseErrorCode;
  public readonly input: string;

  constructor(code: SdpParseErrorCode, message: string, input: string) {
    super(message);
    this.name = 'SdpParseError';
    this.code = code;
    this.input = input;
  }
}

/**
 * Raised when a fixed-arity split finds too few (or, for slash-delimited
 * fields, too many) separator-delimited parts.
 */
export class SdpArityError extends SdpParseError {
  public readonly arity: number;
  public readonly separator: string;

  constructor(message: string, input: string, arity: number, separator: string) {
    super(SdpParseErrorCode.ARITY, message, input);
    this.name = 'SdpArityError';
    this.arity = arity;
    this.separator = separator;
  }
}

export class SdpNumericError extends SdpParseError {
  public readonly field: string;
  public readonly bits: number;

  constructor(field: string, input: string, bits: number) {
    super(SdpParseErrorCode.NUMERIC_FORMAT, `invalid ${field}: "${input}"`, input);
    this.name = 'SdpNumericError';
    this.field = field;
    this.bits = bits;
  }
}
