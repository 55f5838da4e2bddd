import { parseUnsigned } from '../numeric';
import { SdpArityError } from '../SdpParseError';
import { splitTwo } from '../split';

/**
 * `a=rtpmap:<payload type> <encoding name>/<clock rate>[/<encoding parameters>]`
 *
 * For audio streams the encoding parameter is the channel count.
 */
export class RtpMap {
  constructor(
    public readonly key: number,
    public readonly encoding: string,
    public readonly clockRate: number,
    public readonly channels?: number
  ) {}

  static parse(text: string): RtpMap {
    const [code, encodingText] = splitTwo(text, ' ', 'invalid rtpmap!');
    const key = parseUnsigned(code, 8, 'rtpmap payload type');

    const segments = encodingText.split('/');
    if (segments.length < 2 || segments.length > 3 || segments[0] === '') {
      throw new SdpArityError('invalid rtpmap encoding!', encodingText, 2, '/');
    }

    const [encoding, rate, channels] = segments;
    return new RtpMap(
      key,
      encoding,
      parseUnsigned(rate, 32, 'rtpmap clock rate'),
      channels === undefined ? undefined : parseUnsigned(channels, 16, 'rtpmap channels')
    );
  }

  toString(): string {
    const base = `${this.key} ${this.encoding}/${this.clockRate}`;
    return this.channels === undefined ? base : `${base}/${this.channels}`;
  }
}
