
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Level from VITE_LOG_LEVEL, else by mode: errors only under test,
 * warnings in production, everything in development.
 */
function resolveLevel(): LogLevel {
  const override = import.meta.env.VITE_LOG_LEVEL;
  if (isLogLevel(override)) return override;
  if (import.meta.env.MODE === 'test') return 'error';
  if (import.meta.env.PROD) return 'warn';
  return 'debug';
}

let currentLevel: LogLevel = resolveLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: unknown, meta?: Record<string, unknown>): void;
}

function write(level: LogLevel, context: string, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;

  const line = `${new Date().toISOString()} ${level.toUpperCase()} [${context}] ${message}`;
  const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
  if (meta) {
    sink(line, meta);
  } else {
    sink(line);
  }
}

export function createLogger(context: string): Logger {
  return {
    debug: (message, meta) => write('debug', context, message, meta),
    info: (message, meta) => write('info', context, message, meta),
    warn: (message, meta) => write('warn', context, message, meta),
    error: (message, error, meta) => {
      const errorMeta = error instanceof Error
        ? { ...meta, error: error.message, stack: error.stack }
        : { ...meta, error };
      write('error', context, message, errorMeta);
    }
  };
}
