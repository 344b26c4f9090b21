import type { LoggerPort, LogLevel } from '@agri-telemetry/domain';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') return value;
  return fallback;
}

/** Tag-prefixed console output, e.g. `[telemetry-core] connected`. */
export class ConsoleLogger implements LoggerPort {
  constructor(
    private readonly tag: string,
    private readonly level: LogLevel = 'info',
    private readonly sink: LogSink = console,
  ) {}

  debug(message: string, ...details: unknown[]): void {
    if (this.enabled('debug')) this.sink.debug(this.format(message), ...details);
  }

  info(message: string, ...details: unknown[]): void {
    if (this.enabled('info')) this.sink.log(this.format(message), ...details);
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.enabled('warn')) this.sink.warn(this.format(message), ...details);
  }

  error(message: string, ...details: unknown[]): void {
    if (this.enabled('error')) this.sink.error(this.format(message), ...details);
  }

  child(tag: string): LoggerPort {
    return new ConsoleLogger(`${this.tag}:${tag}`, this.level, this.sink);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(message: string): string {
    return `[${this.tag}] ${message}`;
  }
}
