import dotenv from 'dotenv';
import type { LogLevel } from '../logging/Logger';

dotenv.config();

export type FailurePolicy = 'strict' | 'skip';

const FAILURE_POLICIES: readonly FailurePolicy[] = ['strict', 'skip'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const pick = <T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T =>
  allowed.find(option => option === value) ?? fallback;

export class Config {
  // strict: the first malformed line aborts decoding; skip: log it and move on
  public readonly SDP_FAILURE_POLICY: FailurePolicy = pick(
    process.env.SDP_FAILURE_POLICY,
    FAILURE_POLICIES,
    'strict'
  );
  public readonly LOG_LEVEL: LogLevel = pick(process.env.LOG_LEVEL, LOG_LEVELS, 'info');
}
