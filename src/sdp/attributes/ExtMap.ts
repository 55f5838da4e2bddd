import { parseUnsigned } from '../numeric';
import { splitTwo } from '../split';

/**
 * `a=extmap:<id> <uri>`
 *
 * Maps the extension numbers used in RTP packet headers to the extension
 * names registered for them. The id is 1-255 on the wire; only the u8 range
 * is checked here.
 */
export class ExtMap {
  constructor(
    public readonly key: number,
    public readonly value: string
  ) {}

  static parse(text: string): ExtMap {
    const [id, uri] = splitTwo(text, ' ', 'invalid extmap!');
    return new ExtMap(parseUnsigned(id, 8, 'extmap id'), uri);
  }

  toString(): string {
    return `${this.key} ${this.value}`;
  }
}
