import { parseUnsigned } from '../numeric';
import { splitTwo } from '../split';

/**
 * `a=ssrc:<ssrc-id> <attribute>[:<value>]`
 *
 * Source-level attribute (RFC 5576), e.g. `ssrc:3735928559 cname:user@host`.
 */
export class Ssrc {
  constructor(
    public readonly id: number,
    public readonly attribute: string,
    public readonly value?: string
  ) {}

  static parse(text: string): Ssrc {
    const [id, rest] = splitTwo(text, ' ', 'invalid ssrc!');
    const ssrc = parseUnsigned(id, 32, 'ssrc id');

    const index = rest.indexOf(':');
    if (index === -1) {
      return new Ssrc(ssrc, rest);
    }
    return new Ssrc(ssrc, rest.slice(0, index), rest.slice(index + 1));
  }

  toString(): string {
    return this.value === undefined
      ? `${this.id} ${this.attribute}`
      : `${this.id} ${this.attribute}:${this.value}`;
  }
}
