/**
 * Logger contract
 * The Node package provides a winston-backed implementation
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface ILogger {
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

const noop = (): void => {};

export const noopLogger: ILogger = {
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
};
