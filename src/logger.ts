/**
 * Tagged console logger. Output goes to stderr as "[tag] message".
 */

import type { LogLevel } from './types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const envLevel = process.env.SSH_BRIDGE_LOG_LEVEL;
let threshold: LogLevel = envLevel && isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createLogger(tag: string): Logger {
  const write = (level: LogLevel, message: string, args: unknown[]) => {
    if (LEVELS[level] < LEVELS[threshold]) return;
    console.error(`[${tag}] ${message}`, ...args);
  };

  return {
    debug: (message, ...args) => write('debug', message, args),
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args),
  };
}
