export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4
};

export const parseLogLevel = (value?: string): LogLevel | null => {
  if (!value) return null;
  const normalized = value.toLowerCase();
  return isLogLevel(normalized) ? normalized : null;
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

let currentLevel: LogLevel = parseLogLevel(process.env.NAVAL_SIM_LOG_LEVEL) ?? 'warn';

const shouldLog = (level: LogLevel) => LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel];

const logWithLevel =
  (level: LogLevel, method: 'error' | 'warn' | 'info' | 'debug') =>
  (...args: unknown[]) => {
    if (shouldLog(level)) {
      console[method](...args);
    }
  };

export const setLogLevel = (level: LogLevel): void => {
  currentLevel = level;
};

export const logger = {
  error: logWithLevel('error', 'error'),
  warn: logWithLevel('warn', 'warn'),
  info: logWithLevel('info', 'info'),
  debug: logWithLevel('debug', 'debug')
};
