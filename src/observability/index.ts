/**
 * Observability
 *
 * Logger and metrics hooks shared by every module. The default logger writes
 * one JSON line per entry; metrics default to a no-op collector.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

export interface Metrics {
  incrementCounter(name: string, tags?: Record<string, string>): void;
  recordDuration(name: string, durationMs: number, tags?: Record<string, string>): void;
  recordGauge(name: string, value: number, tags?: Record<string, string>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Create a console logger tagged with a module name
 */
export function createLogger(module: string, minLevel: LogLevel = 'info'): Logger {
  const write = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }
    const line = JSON.stringify({
      level,
      module,
      message,
      ...context,
      timestamp: new Date().toISOString(),
    });
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    debug: (message, context) => write('debug', message, context),
  };
}

export const defaultLogger: Logger = createLogger('staff-occasions');

export const defaultMetrics: Metrics = {
  incrementCounter: () => { /* no-op */ },
  recordDuration: () => { /* no-op */ },
  recordGauge: () => { /* no-op */ },
};
