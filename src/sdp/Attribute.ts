import { ExtMap, Fmtp, Kind, Mid, Orient, RtpMap, Ssrc, parseKind, parseOrient } from './attributes';
import { parseUnsigned, parseUnsigned64 } from './numeric';

export type Attribute =
  /** `a=ptime:<ms>`, media time carried in one packet. */
  | { type: 'Ptime'; value: bigint }
  /** `a=maxptime:<ms>`, maximum media time one packet may carry. */
  | { type: 'MaxPtime'; value: bigint }
  /** `a=rtpmap:<pt> <encoding>/<clock rate>[/<channels>]` */
  | { type: 'Rtpmap'; value: RtpMap }
  /** `a=fmtp:<format> <params>`, format-specific parameters. */
  | { type: 'Fmtp'; value: Fmtp }
  /** `a=orient:<orientation>`, whiteboard or presentation orientation. */
  | { type: 'Orient'; value: Orient }
  /** `a=charset:<name>`, character set for the session name and information. */
  | { type: 'Charset'; value: string }
  /** `a=sdplang:<tag>`, language of the session description itself. */
  | { type: 'SdpLang'; value: string }
  /** `a=lang:<tag>`, a language capability of the session or media. */
  | { type: 'Lang'; value: string }
  /** `a=framerate:<fps>`, maximum video frame rate. */
  | { type: 'Framerate'; value: number }
  /** `a=quality:<0-10>`, 10 is the best still-image quality, 5 the default. */
  | { type: 'Quality'; value: number }
  /** `a=type:<conference type>` */
  | { type: 'Kind'; value: Kind }
  /** `a=recvonly`. The flag is its presence, so the payload is always `true`. */
  | { type: 'Recvonly'; value: true }
  /** `a=sendrecv` */
  | { type: 'Sendrecv'; value: true }
  /** `a=sendonly` */
  | { type: 'Sendonly'; value: true }
  /** `a=inactive` */
  | { type: 'Inactive'; value: true }
  /** `a=extmap:<id> <uri>`, RTP header extension mapping. */
  | { type: 'Extmap'; value: ExtMap }
  /** `a=mid:<tag>`, media stream identification. */
  | { type: 'Mid'; value: Mid }
  /** `a=ssrc:<id> <attribute>[:<value>]`, source-level attribute. */
  | { type: 'Ssrc'; value: Ssrc }
  /** Any key outside the recognized set; `value` is absent for `a=<key>`. */
  | { type: 'Other'; key: string; value?: string };

export type AttributeType = Attribute['type'];

/**
 * Decodes the body of an `a=` line (everything after `a=`).
 *
 * Keys outside the recognized set come back as `Other`. A recognized key
 * whose value is malformed throws the sub-parser's `SdpParseError`.
 *
 * The direction flags (`recvonly`, `sendrecv`, `sendonly`, `inactive`) and
 * `mid` are not part of the recognized set and decode as `Other`.
 */
export const parseAttribute = (text: string): Attribute => {
  const index = text.indexOf(':');
  if (index === -1) {
    return { type: 'Other', key: text };
  }

  const key = text.slice(0, index);
  const value = text.slice(index + 1);

  switch (key) {
    case 'fmtp':
      return { type: 'Fmtp', value: Fmtp.parse(value) };
    case 'rtpmap':
      return { type: 'Rtpmap', value: RtpMap.parse(value) };
    case 'extmap':
      return { type: 'Extmap', value: ExtMap.parse(value) };
    case 'lang':
      return { type: 'Lang', value };
    case 'charset':
      return { type: 'Charset', value };
    case 'sdplang':
      return { type: 'SdpLang', value };
    case 'ptime':
      return { type: 'Ptime', value: parseUnsigned64(value, 'ptime') };
    case 'maxptime':
      return { type: 'MaxPtime', value: parseUnsigned64(value, 'maxptime') };
    case 'orient':
      return { type: 'Orient', value: parseOrient(value) };
    case 'type':
      return { type: 'Kind', value: parseKind(value) };
    case 'framerate':
      return { type: 'Framerate', value: parseUnsigned(value, 16, 'framerate') };
    case 'quality':
      return { type: 'Quality', value: parseUnsigned(value, 8, 'quality') };
    case 'ssrc':
      return { type: 'Ssrc', value: Ssrc.parse(value) };
    default:
      return { type: 'Other', key, value };
  }
};

/**
 * Formats an attribute back into `key[:value]`, without the `a=` prefix.
 * Direction flags have no value text and format as the bare key.
 */
export const formatAttribute = (attribute: Attribute): string => {
  switch (attribute.type) {
    case 'Ptime':
      return `ptime:${attribute.value}`;
    case 'MaxPtime':
      return `maxptime:${attribute.value}`;
    case 'Rtpmap':
      return `rtpmap:${attribute.value.toString()}`;
    case 'Fmtp':
      return `fmtp:${attribute.value.toString()}`;
    case 'Orient':
      return `orient:${attribute.value}`;
    case 'Charset':
      return `charset:${attribute.value}`;
    case 'SdpLang':
      return `sdplang:${attribute.value}`;
    case 'Lang':
      return `lang:${attribute.value}`;
    case 'Framerate':
      return `framerate:${attribute.value}`;
    case 'Quality':
      return `quality:${attribute.value}`;
    case 'Kind':
      return `type:${attribute.value}`;
    case 'Recvonly':
      return 'recvonly';
    case 'Sendrecv':
      return 'sendrecv';
    case 'Sendonly':
      return 'sendonly';
    case 'Inactive':
      return 'inactive';
    case 'Extmap':
      return `extmap:${attribute.value.toString()}`;
    case 'Mid':
      return `mid:${attribute.value.toString()}`;
    case 'Ssrc':
      return `ssrc:${attribute.value.toString()}`;
    case 'Other':
      return attribute.value === undefined ? attribute.key : `${attribute.key}:${attribute.value}`;
  }
};
