import { SdpArityError } from '../SdpParseError';

/** `a=mid:<identification-tag>` (RFC 5888). */
export class Mid {
  constructor(public readonly id: string) {}

  static parse(text: string): Mid {
    if (text === '') {
      throw new SdpArityError('invalid mid!', text, 1, ':');
    }
    return new Mid(text);
  }

  toString(): string {
    return this.id;
  }
}
