export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Where formatted lines go. `console` satisfies it. */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** A logger that tags every line with `scope` */
  child(scope: string): Logger;
}

/**
 * Creates a console logger that drops lines below `level`.
 *
 * Lines look like `2024-05-01T12:00:00.000Z INFO [cache] Redis cache enabled`.
 */
export function createLogger(
  level: LogLevel = 'info',
  sink: LogSink = console,
  scope?: string,
  timestamp: () => string = () => new Date().toISOString()
): Logger {
  const threshold = LEVEL_ORDER[level];

  function write(lineLevel: LogLevel, message: string): void {
    if (LEVEL_ORDER[lineLevel] < threshold) return;
    const tag = scope ? ` [${scope}]` : '';
    sink[lineLevel](`${timestamp()} ${lineLevel.toUpperCase()}${tag} ${message}`);
  }

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
    child: (childScope) =>
      createLogger(level, sink, scope ? `${scope}:${childScope}` : childScope, timestamp),
  };
}

/** Discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
