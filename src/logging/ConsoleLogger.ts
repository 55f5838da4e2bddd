import type { Config } from '../configurations';
import { Logger, LogLevel } from './Logger';

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor({ config }: { config: Pick<Config, 'LOG_LEVEL'> }) {
    this.threshold = SEVERITY[config.LOG_LEVEL];
  }

  private enabled(level: LogLevel): boolean {
    return SEVERITY[level] >= this.threshold;
  }

  public debug(message: string, meta?: unknown): void {
    if (this.enabled('debug')) console.debug(`[DEBUG] ${message}`, meta ?? '');
  }

  public info(message: string, meta?: unknown): void {
    if (this.enabled('info')) console.log(`[INFO] ${message}`, meta ?? '');
  }

  public warn(message: string, meta?: unknown): void {
    if (this.enabled('warn')) console.warn(`[WARN] ${message}`, meta ?? '');
  }

  public error(message: string, meta?: unknown): void {
    if (this.enabled('error')) console.error(`[ERROR] ${message}`, meta ?? '');
  }
}
