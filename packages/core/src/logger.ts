export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

const PREFIX = '[choreo]';

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    typeof value === 'string' &&
    Object.prototype.hasOwnProperty.call(LEVEL_RANK, value)
  );
}

function levelFromEnv(): LogLevel {
  const raw = process.env.CHOREO_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'warn';
}

let currentLevel: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_RANK[currentLevel] >= LEVEL_RANK[level];
}

export const logger = {
  error(message: string, ...args: unknown[]): void {
    if (enabled('error')) console.error(`${PREFIX} ${message}`, ...args);
  },

  warn(message: string, ...args: unknown[]): void {
    if (enabled('warn')) console.warn(`${PREFIX} ${message}`, ...args);
  },

  info(message: string, ...args: unknown[]): void {
    if (enabled('info')) console.info(`${PREFIX} ${message}`, ...args);
  },

  debug(message: string, ...args: unknown[]): void {
    if (enabled('debug')) console.debug(`${PREFIX} ${message}`, ...args);
  },
};
