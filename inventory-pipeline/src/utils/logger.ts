/**
 * Scoped console logger.
 *
 * Every line is prefixed with `[scope]`; the threshold comes from LOG_LEVEL
 * (debug | info | warn | error | silent) and can be changed at runtime.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    case 'silent':
      return 'silent';
    default:
      return undefined;
  }
}

let activeLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`);
    },
    info: (message) => {
      if (enabled('info')) console.log(`${prefix} ${message}`);
    },
    warn: (message) => {
      if (enabled('warn')) console.warn(`${prefix} ⚠️  ${message}`);
    },
    error: (message) => {
      if (enabled('error')) console.error(`${prefix} ❌ ${message}`);
    },
  };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name === 'Error' ? err.message : `${err.name}: ${err.message}`;
  }
  return String(err);
}
