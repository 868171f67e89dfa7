type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: string): value is LogLevel =>
  value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

const activeLevel = (): LogLevel => {
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
};

const isEnabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel()];

const formatMessage = (level: LogLevel, message: string): string => {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
};

const formatMeta = (meta: unknown): string => {
  if (meta instanceof Error) {
    return meta.stack || meta.message;
  }
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
};

export const logger = {
  debug: (message: string, meta?: unknown): void => {
    if (isEnabled('debug')) {
      console.debug(formatMessage('debug', message));
      if (meta !== undefined) console.debug(formatMeta(meta));
    }
  },
  info: (message: string, meta?: unknown): void => {
    if (isEnabled('info')) {
      console.info(formatMessage('info', message));
      if (meta !== undefined) console.info(formatMeta(meta));
    }
  },
  warn: (message: string, meta?: unknown): void => {
    if (isEnabled('warn')) {
      console.warn(formatMessage('warn', message));
      if (meta !== undefined) console.warn(formatMeta(meta));
    }
  },
  error: (message: string, error?: unknown): void => {
    console.error(formatMessage('error', message));
    if (error !== undefined) {
      console.error(formatMeta(error));
    }
  },
};
