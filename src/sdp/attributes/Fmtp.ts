import { parseUnsigned } from '../numeric';
import { splitTwo } from '../split';

/**
 * `a=fmtp:<format> <name>[=<value>][;<name>[=<value>]...]`
 *
 * Format-specific parameters conveyed unchanged to the media tool. A name
 * without `=` maps to `undefined`. When a name repeats, the last one wins.
 */
export class Fmtp {
  constructor(
    public readonly key: number,
    public readonly values: ReadonlyMap<string, string | undefined>
  ) {}

  static parse(text: string): Fmtp {
    const [code, blob] = splitTwo(text, ' ', 'invalid fmtp!');
    const key = parseUnsigned(code, 8, 'fmtp payload type');
    const values = new Map<string, string | undefined>();

    for (const entry of blob.split(';')) {
      const index = entry.indexOf('=');
      if (index === -1) {
        values.set(entry, undefined);
      } else {
        values.set(entry.slice(0, index), entry.slice(index + 1));
      }
    }

    return new Fmtp(key, values);
  }

  public get(name: string): string | undefined {
    return this.values.get(name);
  }

  public has(name: string): boolean {
    return this.values.has(name);
  }

  toString(): string {
    const params = [...this.values.entries()]
      .map(([name, value]) => (value === undefined ? name : `${name}=${value}`))
      .join(';');
    return `${this.key} ${params}`;
  }
}
