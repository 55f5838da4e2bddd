import { isIPv4, isIPv6 } from 'net';
import { AddrKind, NetKind, parseAddrKind, parseNetKind } from './NetKind';
import { isUnsigned, parseUnsigned } from './numeric';
import { SdpArityError, SdpNumericError, SdpParseError, SdpParseErrorCode } from './SdpParseError';
import { splitThree } from './split';

export type IpFamily = 4 | 6;

// WHATWG URL serialization gives the RFC 5952 compressed, lowercase form.
const canonicalIpv6 = (text: string): string | null => {
  try {
    const { hostname } = new URL(`http://[${text}]/`);
    return hostname.slice(1, -1);
  } catch {
    return null;
  }
};

const parseIp = (text: string): { ip: string; family: IpFamily } => {
  if (isIPv4(text)) {
    return { ip: text, family: 4 };
  }
  if (isIPv6(text)) {
    const ip = canonicalIpv6(text);
    if (ip !== null) {
      return { ip, family: 6 };
    }
  }
  throw new SdpParseError(SdpParseErrorCode.ADDRESS_FORMAT, `invalid connection address: "${text}"`, text);
};

/**
 * Connection address with its optional multicast suffixes,
 * `<ip>[/<ttl>][/<count>]`.
 */
export class Addr {
  public readonly ip: string;
  public readonly family: IpFamily;
  /**
   * IPv6 multicast does not use TTL scoping, so the TTL must not be present
   * for IPv6 multicast. This is not checked at parse time.
   */
  public readonly ttl?: number;
  /** Number of addresses in a multicast block. */
  public readonly count?: number;

  constructor(ip: string, options: { ttl?: number; count?: number } = {}) {
    const { ttl, count } = options;
    if (ttl !== undefined && !isUnsigned(ttl, 16)) {
      throw new SdpNumericError('connection ttl', String(ttl), 16);
    }
    if (count !== undefined && !isUnsigned(count, 8)) {
      throw new SdpNumericError('connection count', String(count), 8);
    }
    // `<ip>/<count>` would read back as a ttl
    if (count !== undefined && ttl === undefined) {
      throw new SdpArityError('connection count requires a ttl', `${ip}/${count}`, 3, '/');
    }

    const parsed = parseIp(ip);
    this.ip = parsed.ip;
    this.family = parsed.family;
    this.ttl = ttl;
    this.count = count;
  }

  static parse(text: string): Addr {
    const [ip, ttl, count] = text.split('/');
    if (ip === '') {
      throw new SdpArityError('invalid connection information!', text, 1, '/');
    }
    return new Addr(ip, {
      ttl: ttl === undefined ? undefined : parseUnsigned(ttl, 16, 'connection ttl'),
      count: count === undefined ? undefined : parseUnsigned(count, 8, 'connection count'),
    });
  }

  public equals(other: Addr): boolean {
    return this.ip === other.ip && this.ttl === other.ttl && this.count === other.count;
  }

  toString(): string {
    let text = this.ip;
    if (this.ttl !== undefined) text += `/${this.ttl}`;
    if (this.count !== undefined) text += `/${this.count}`;
    return text;
  }
}

/**
 * The `c=` line: `<nettype> <addrtype> <connection-address>`.
 */
export class Connection {
  constructor(
    public readonly nettype: NetKind,
    public readonly addrtype: AddrKind,
    public readonly connectionAddress: Addr
  ) {}

  static parse(text: string): Connection {
    const [nettype, addrtype, address] = splitThree(text, ' ', 'invalid connection information!');
    return new Connection(parseNetKind(nettype), parseAddrKind(addrtype), Addr.parse(address));
  }

  public equals(other: Connection): boolean {
    return (
      this.nettype === other.nettype &&
      this.addrtype === other.addrtype &&
      this.connectionAddress.equals(other.connectionAddress)
    );
  }

  toString(): string {
    return `${this.nettype} ${this.addrtype} ${this.connectionAddress.toString()}`;
  }
}
