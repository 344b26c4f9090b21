export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerPort {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(tag: string): LoggerPort;
}
