export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LoggerOptions {
  /** Lowest level written; defaults to 'info' */
  level?: LogLevel;
  /** Component tag on every line; defaults to 'invoice-bridge' */
  prefix?: string;
}

type EntryLevel = Exclude<LogLevel, 'silent'>;

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

/**
 * Console logger. Each entry is one line:
 * `[timestamp] [LEVEL] [prefix] message {"context":"as json"}`
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? 'info'];
  const prefix = options.prefix ?? 'invoice-bridge';

  const write = (level: EntryLevel, message: string, context: LogContext | undefined): void => {
    if (SEVERITY[level] < threshold) {
      return;
    }
    const suffix = context !== undefined && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    console[level](`[${new Date().toISOString()}] [${level.toUpperCase()}] [${prefix}] ${message}${suffix}`);
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}
