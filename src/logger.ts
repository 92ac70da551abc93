export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/**
 * Leveled console logger.
 * Errors and warnings go out at the default level; debug and info only when asked for.
 */
export function createLogger(level: LogLevel = 'warn', sink: LogSink = console): Logger {
  const enabled = (messageLevel: Exclude<LogLevel, 'silent'>): boolean => SEVERITY[messageLevel] >= SEVERITY[level];

  return {
    debug: (...args: unknown[]) => {
      if (enabled('debug')) {
        sink.debug(...args);
      }
    },
    info: (...args: unknown[]) => {
      if (enabled('info')) {
        sink.info(...args);
      }
    },
    warn: (...args: unknown[]) => {
      if (enabled('warn')) {
        sink.warn(...args);
      }
    },
    error: (...args: unknown[]) => {
      if (enabled('error')) {
        sink.error(...args);
      }
    },
  };
}

export const silentLogger: Logger = createLogger('silent');
