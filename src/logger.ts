export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LIVE_LOG_LEVEL?.toLowerCase().trim();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Console-backed logger that tags every line with `[scope]`, e.g.
 * `[live-server] client connected: main`.
 */
export function createLogger(scope: string, level: LogLevel = defaultLevel()): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${scope}]`;
  const enabled = (l: Exclude<LogLevel, 'silent'>) => LEVEL_ORDER[l] >= threshold;

  return {
    debug: (message, ...details) => { if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details); },
    info: (message, ...details) => { if (enabled('info')) console.info(`${prefix} ${message}`, ...details); },
    warn: (message, ...details) => { if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details); },
    error: (message, ...details) => { if (enabled('error')) console.error(`${prefix} ${message}`, ...details); },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
