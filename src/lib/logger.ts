/* eslint-disable no-console */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
type Level = Exclude<LogLevel, 'silent'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export const isLogLevel = (value: string): value is LogLevel =>
  value in LEVEL_ORDER;

const initialLevel = (): LogLevel => {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
};

let threshold: LogLevel = initialLevel();

export const setLogLevel = (level: LogLevel): void => {
  threshold = level;
};

export const getLogLevel = (): LogLevel => threshold;

const log = (level: Level, message: string, meta?: Record<string, unknown>) => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }

  const payload = {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...(meta ?? {})
  };

  const line = JSON.stringify(payload);
  if (level === 'warn' || level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) =>
    log('debug', message, meta),
  info: (message: string, meta?: Record<string, unknown>) =>
    log('info', message, meta),
  warn: (message: string, meta?: Record<string, unknown>) =>
    log('warn', message, meta),
  error: (message: string, meta?: Record<string, unknown>) =>
    log('error', message, meta)
};
