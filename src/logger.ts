/**
 * Namespaced console logger.
 * Lines look like `[2024-01-31T00:00:00.000Z] [WARN] [recurrence] message {"key":"value"}`.
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/** Logger interface */
export interface Logger {
  namespace: string;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Emit debug lines. Default: false. */
  debug?: boolean;
}

export function formatLogLine(level: LogLevel, namespace: string, message: string, data?: Record<string, unknown>, now: Date = new Date()): string {
  const prefix = `[${now.toISOString()}] [${level}] [${namespace}]`;
  if (data) {
    return `${prefix} ${message} ${JSON.stringify(data)}`;
  }
  return `${prefix} ${message}`;
}

/**
 * Creates a namespaced logger.
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? false;

  return {
    namespace,
    info(message: string, data?: Record<string, unknown>): void {
      console.info(formatLogLine('INFO', namespace, message, data));
    },
    warn(message: string, data?: Record<string, unknown>): void {
      console.warn(formatLogLine('WARN', namespace, message, data));
    },
    error(message: string, data?: Record<string, unknown>): void {
      console.error(formatLogLine('ERROR', namespace, message, data));
    },
    debug(message: string, data?: Record<string, unknown>): void {
      if (!debugEnabled) return;
      console.debug(formatLogLine('DEBUG', namespace, message, data));
    },
  };
}
