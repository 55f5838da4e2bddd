import { vi } from 'vitest';
import { Config } from '../src/configurations';
import { Logger } from '../src/logging/Logger';

export const createTestConfig = (overrides: Partial<Config> = {}): Config => ({
  SDP_FAILURE_POLICY: 'strict',
  LOG_LEVEL: 'debug',
  ...overrides,
});

export const createTestLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

export const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
};
