import { describe, expect, expectTypeOf, it } from 'vitest';
import { Attribute, formatAttribute, parseAttribute } from '../src/sdp/Attribute';
import { ExtMap, Fmtp, Mid, RtpMap, Ssrc } from '../src/sdp/attributes';
import { SdpArityError, SdpNumericError, SdpParseError, SdpParseErrorCode } from '../src/sdp/SdpParseError';
import { captureError } from './utils';

describe('parseAttribute', () => {
  it('returns a flag-style Other when there is no colon', () => {
    expect(parseAttribute('rtcp-mux')).toEqual({ type: 'Other', key: 'rtcp-mux' });
    expect(parseAttribute('rtcp-mux')).not.toHaveProperty('value');
  });

  it('returns Other with the text after the first colon for unknown keys', () => {
    expect(parseAttribute('ice-ufrag:F7gI')).toEqual({ type: 'Other', key: 'ice-ufrag', value: 'F7gI' });
    expect(parseAttribute('fingerprint:sha-256 AB:CD:EF')).toEqual({
      type: 'Other',
      key: 'fingerprint',
      value: 'sha-256 AB:CD:EF',
    });
    expect(parseAttribute('x-empty:')).toEqual({ type: 'Other', key: 'x-empty', value: '' });
  });

  it('matches keys case-sensitively', () => {
    expect(parseAttribute('PTIME:20')).toEqual({ type: 'Other', key: 'PTIME', value: '20' });
  });

  it('leaves direction flags and mid to Other', () => {
    expect(parseAttribute('recvonly')).toEqual({ type: 'Other', key: 'recvonly' });
    expect(parseAttribute('sendrecv')).toEqual({ type: 'Other', key: 'sendrecv' });
    expect(parseAttribute('mid:audio')).toEqual({ type: 'Other', key: 'mid', value: 'audio' });
  });

  it('decodes numeric attributes', () => {
    expect(parseAttribute('ptime:20')).toEqual({ type: 'Ptime', value: 20n });
    expect(parseAttribute('maxptime:120')).toEqual({ type: 'MaxPtime', value: 120n });
    expect(parseAttribute('framerate:60')).toEqual({ type: 'Framerate', value: 60 });
    expect(parseAttribute('quality:10')).toEqual({ type: 'Quality', value: 10 });
  });

  it('decodes packet times across the u64 range', () => {
    expect(parseAttribute('ptime:18446744073709551615')).toEqual({
      type: 'Ptime',
      value: 18446744073709551615n,
    });
    expect(() => parseAttribute('maxptime:18446744073709551616')).toThrowError(SdpNumericError);
  });

  it('decodes string attributes', () => {
    expect(parseAttribute('charset:ISO-8859-1')).toEqual({ type: 'Charset', value: 'ISO-8859-1' });
    expect(parseAttribute('sdplang:fr')).toEqual({ type: 'SdpLang', value: 'fr' });
    expect(parseAttribute('lang:de')).toEqual({ type: 'Lang', value: 'de' });
  });

  it('decodes vocabulary attributes', () => {
    expect(parseAttribute('type:moderated')).toEqual({ type: 'Kind', value: 'moderated' });
    expect(parseAttribute('orient:landscape')).toEqual({ type: 'Orient', value: 'landscape' });
  });

  it('decodes structured attributes', () => {
    const rtpmap = parseAttribute('rtpmap:111 opus/48000/2');
    expect(rtpmap.type).toBe('Rtpmap');
    expect(rtpmap.type === 'Rtpmap' && rtpmap.value).toBeInstanceOf(RtpMap);

    const fmtp = parseAttribute('fmtp:96 profile-level-id=42e016;max-mbps=108000;max-fs=3600');
    expect(fmtp.type === 'Fmtp' && fmtp.value).toBeInstanceOf(Fmtp);
    expect(fmtp.type === 'Fmtp' && fmtp.value.get('max-fs')).toBe('3600');

    const extmap = parseAttribute('extmap:1 urn:ietf:params:rtp-hdrext:ssrc-audio-level');
    expect(extmap.type === 'Extmap' && extmap.value).toBeInstanceOf(ExtMap);
    expect(extmap.type === 'Extmap' && extmap.value.value).toBe('urn:ietf:params:rtp-hdrext:ssrc-audio-level');

    const ssrc = parseAttribute('ssrc:1001 cname:host');
    expect(ssrc.type === 'Ssrc' && ssrc.value).toBeInstanceOf(Ssrc);
    expect(ssrc.type === 'Ssrc' && ssrc.value.value).toBe('host');
  });

  it('propagates sub-parser failures instead of falling back to Other', () => {
    expect(() => parseAttribute('ptime:twenty')).toThrowError(SdpNumericError);
    expect(() => parseAttribute('quality:256')).toThrowError(SdpNumericError);
    expect(() => parseAttribute('framerate:29.97')).toThrowError(SdpNumericError);
    expect(() => parseAttribute('extmap:1')).toThrowError(SdpArityError);
    expect(() => parseAttribute('type:webinar')).toThrowError(SdpParseError);
    expect(() => parseAttribute('orient:upside-down')).toThrowError(SdpParseError);
    expect(() => parseAttribute('rtpmap:96 VP8')).toThrowError(SdpArityError);
  });

  it('reports a vocabulary error for a bad conference type', () => {
    expect(captureError(() => parseAttribute('type:webinar'))).toMatchObject({
      code: SdpParseErrorCode.VOCABULARY,
      input: 'webinar',
    });
  });
});

describe('formatAttribute', () => {
  it.each([
    'ptime:20',
    'ptime:18446744073709551615',
    'maxptime:120',
    'framerate:30',
    'quality:5',
    'charset:UTF-8',
    'sdplang:en',
    'lang:en-GB',
    'type:H332',
    'orient:seascape',
    'rtpmap:0 PCMU/8000',
    'rtpmap:111 opus/48000/2',
    'fmtp:111 minptime=10;useinbandfec=1',
    'extmap:2 http://www.webrtc.org/experiments/rtp-hdrext/abs-send-time',
    'ssrc:1001 msid:stream track',
    'rtcp-mux',
    'ice-pwd:placeholder-password',
  ])('reproduces %s', text => {
    expect(formatAttribute(parseAttribute(text))).toBe(text);
  });

  it('formats a direction flag as its bare key', () => {
    expect(formatAttribute({ type: 'Recvonly', value: true })).toBe('recvonly');
    expectTypeOf<Extract<Attribute, { type: 'Recvonly' }>['value']>().toEqualTypeOf<true>();
    expectTypeOf<Extract<Attribute, { type: 'Inactive' }>['value']>().toEqualTypeOf<true>();
  });

  it('formats variants the dispatcher does not produce', () => {
    const attributes: Attribute[] = [
      { type: 'Recvonly', value: true },
      { type: 'Sendrecv', value: true },
      { type: 'Sendonly', value: true },
      { type: 'Inactive', value: true },
      { type: 'Mid', value: new Mid('video') },
    ];
    expect(attributes.map(formatAttribute)).toEqual(['recvonly', 'sendrecv', 'sendonly', 'inactive', 'mid:video']);
  });
});
