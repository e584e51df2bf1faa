// Logger - Injected console logger shared by every relay component

export interface Logger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

/**
 * Level comes from `RELAY_LOG_LEVEL`; `DEBUG` set to anything switches on
 * debug output.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.RELAY_LOG_LEVEL?.toLowerCase();
  if (requested && isLogLevel(requested)) return requested;
  return env.DEBUG ? 'debug' : 'info';
}

export function createConsoleLogger(level: LogLevel = resolveLogLevel()): Logger {
  const enabled = (wanted: LogLevel) => LEVEL_RANK[wanted] <= LEVEL_RANK[level];

  return {
    info: (...args: unknown[]) => {
      if (enabled('info')) console.log(new Date().toISOString(), '[INFO]', ...args);
    },
    warn: (...args: unknown[]) => {
      if (enabled('warn')) console.warn(new Date().toISOString(), '[WARN]', ...args);
    },
    error: (...args: unknown[]) => {
      if (enabled('error')) console.error(new Date().toISOString(), '[ERROR]', ...args);
    },
    debug: (...args: unknown[]) => {
      if (enabled('debug')) console.log(new Date().toISOString(), '[DEBUG]', ...args);
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
