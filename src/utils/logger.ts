export type LogLevel = 'info' | 'warn' | 'error';

export interface LogMeta {
  [key: string]: unknown;
}

const isLogLevel = (value: string | undefined): value is LogLevel => {
  return value === 'info' || value === 'warn' || value === 'error';
};

export const levelToNumber = (level: LogLevel): number => {
  switch (level) {
    case 'info':
      return 10;
    case 'warn':
      return 20;
    case 'error':
      return 30;
  }
};

const parseMinLevel = (value: string | undefined): LogLevel => {
  const token = value?.trim().toLowerCase();
  return isLogLevel(token) ? token : 'info';
};

const minLevelNumber = levelToNumber(parseMinLevel(process.env.LOG_LEVEL));

const logWithLevel = (level: LogLevel, message: string, meta?: LogMeta): void => {
  if (levelToNumber(level) < minLevelNumber) return;

  const prefix = level.toUpperCase();
  const logMessage = `[${prefix}] ${message}`;

  if (meta) {
    if (level === 'info') {
      console.log(logMessage, meta);
    } else if (level === 'warn') {
      console.warn(logMessage, meta);
    } else {
      console.error(logMessage, meta);
    }
  } else {
    if (level === 'info') {
      console.log(logMessage);
    } else if (level === 'warn') {
      console.warn(logMessage);
    } else {
      console.error(logMessage);
    }
  }
};

export const logInfo = (message: string, meta?: LogMeta): void => {
  logWithLevel('info', message, meta);
};

export const logWarn = (message: string, meta?: LogMeta): void => {
  logWithLevel('warn', message, meta);
};

export const logError = (message: string, meta?: LogMeta): void => {
  logWithLevel('error', message, meta);
};

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
