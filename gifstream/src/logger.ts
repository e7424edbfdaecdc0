/**
 * Structured logger with debug toggle for gifstream
 *
 * Usage:
 *   import { logger } from './logger.js';
 *   logger.debug('Launching stage', { program: 'ffmpeg' });
 *   logger.error('Encoder exited early', { code: 1 });
 *
 * Enable debug output:
 *   GIFSTREAM_DEBUG=true gifstream render out.gif
 */

const DEBUG_ENV = 'GIFSTREAM_DEBUG';

let debugOverride: boolean | null = null;

const isDebugEnabled = (): boolean => {
  if (debugOverride !== null) return debugOverride;
  return process.env[DEBUG_ENV] === 'true';
};

// Format timestamp for log messages
const timestamp = (): string => {
  const now = new Date();
  return now.toISOString().slice(11, 23); // HH:MM:SS.mmm
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: (message: string, data?: object) => void;
  info: (message: string, data?: object) => void;
  warn: (message: string, data?: object) => void;
  error: (message: string, data?: object) => void;
  setLevel: (level: LogLevel) => void;
  enableDebug: () => void;
  disableDebug: () => void;
}

// Log level priority (lower = more verbose)
const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = 'debug';

const shouldLog = (level: LogLevel): boolean => {
  if (level === 'debug' && !isDebugEnabled()) return false;
  return levelPriority[level] >= levelPriority[minLevel];
};

const emit = (
  write: (...args: unknown[]) => void,
  level: LogLevel,
  message: string,
  data?: object
): void => {
  const prefix = `[${timestamp()}] [${level.toUpperCase()}]`;
  if (data) {
    write(prefix, message, data);
  } else {
    write(prefix, message);
  }
};

export const logger: Logger = {
  debug: (message: string, data?: object) => {
    if (!shouldLog('debug')) return;
    emit(console.log, 'debug', message, data);
  },

  info: (message: string, data?: object) => {
    if (!shouldLog('info')) return;
    emit(console.log, 'info', message, data);
  },

  // warnings and errors go to stderr
  warn: (message: string, data?: object) => {
    if (!shouldLog('warn')) return;
    emit(console.warn, 'warn', message, data);
  },

  error: (message: string, data?: object) => {
    if (!shouldLog('error')) return;
    emit(console.error, 'error', message, data);
  },

  setLevel: (level: LogLevel) => {
    minLevel = level;
  },

  enableDebug: () => {
    debugOverride = true;
  },

  disableDebug: () => {
    debugOverride = false;
  },
};

// Export helper to check debug state
export const isDebug = isDebugEnabled;
