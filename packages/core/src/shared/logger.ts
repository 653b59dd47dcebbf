export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const DEFAULT_LEVEL: LogLevel = process.env.NODE_ENV === 'production' ? 'info' : 'debug';
const envLevel = process.env.LOG_LEVEL?.toLowerCase();

let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : DEFAULT_LEVEL;

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function parseLogLevel(value: string): LogLevel | undefined {
  const lowered = value.toLowerCase();
  return isLogLevel(lowered) ? lowered : undefined;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatPrefix(level: LogLevel, prefix: string): string {
  const levelTag = level.toUpperCase().padEnd(5);
  return `${new Date().toISOString()} [${levelTag}] [${prefix}]`;
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  /** Logger whose prefix is extended with `scope`, e.g. `flywheel-service:job-1`. */
  child: (scope: string) => Logger;
}

// Diagnostics go to stderr so stdout stays clean for --json output.
export function createLogger(prefix: string): Logger {
  return {
    debug: (...args: unknown[]) => {
      if (shouldLog('debug')) {
        console.error(formatPrefix('debug', prefix), ...args);
      }
    },
    info: (...args: unknown[]) => {
      if (shouldLog('info')) {
        console.error(formatPrefix('info', prefix), ...args);
      }
    },
    warn: (...args: unknown[]) => {
      if (shouldLog('warn')) {
        console.warn(formatPrefix('warn', prefix), ...args);
      }
    },
    error: (...args: unknown[]) => {
      if (shouldLog('error')) {
        console.error(formatPrefix('error', prefix), ...args);
      }
    },
    child: (scope: string) => createLogger(`${prefix}:${scope}`),
  };
}
