import { describe, expect, it } from 'vitest';
import { container } from '../src/container';
import { SdpLineDecoder } from '../src/decoder/SdpLineDecoder';
import { ConsoleLogger } from '../src/logging/ConsoleLogger';

describe('container', () => {
  it('wires the line decoder with its collaborators', () => {
    const decoder = container.resolve<SdpLineDecoder>('lineDecoder');
    expect(decoder).toBeInstanceOf(SdpLineDecoder);
    expect(container.resolve('logger')).toBeInstanceOf(ConsoleLogger);
    expect(container.resolve<SdpLineDecoder>('lineDecoder')).toBe(decoder);
  });
});
