/**
 * Leveled console logger for the wire adapter and the CLI
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVEL_ENV = 'BATTLESNAKE_LOG_LEVEL';

export interface Logger {
  debug(module: string, message: string): void;
  info(module: string, message: string): void;
  warn(module: string, message: string): void;
  error(module: string, message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Parse a level name, case-insensitively. Unknown or missing names give the
 * fallback.
 */
export function resolveLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const value = raw?.trim().toLowerCase();
  return value && isLogLevel(value) ? value : fallback;
}

export function createLogger(level: LogLevel): Logger {
  const threshold = LEVELS[level];
  const log = (lvl: LogLevel, module: string, message: string): void => {
    if (LEVELS[lvl] < threshold) return;
    const stamp = new Date().toISOString();
    console.log(`${stamp} | ${lvl} | ${module} | ${message}`);
  };
  return {
    debug: (module, message) => log('debug', module, message),
    info: (module, message) => log('info', module, message),
    warn: (module, message) => log('warn', module, message),
    error: (module, message) => log('error', module, message),
  };
}

/** A logger that drops everything */
export const SILENT_LOGGER: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
