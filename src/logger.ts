/**
 * @module logger
 *
 * Narrow reporting interface the pipeline logs through.
 *
 * The core never touches process-wide logging state: every component takes
 * a {@link Logger} in its options and defaults to {@link silentLogger}.
 * The CLI wires a console logger at the configured level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured context attached to a log line. */
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Parse a level name case-insensitively. `WARNING` and `CRITICAL` are
 * accepted as `warn` and `error`; anything else falls back to `info`.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case 'debug': return 'debug';
    case 'warn':
    case 'warning': return 'warn';
    case 'error':
    case 'critical': return 'error';
    default: return 'info';
  }
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Console logger writing `<iso time> <LEVEL> [<name>] message {fields}`.
 *
 * Lines below `level` are dropped. `warn` and `error` go to stderr.
 *
 * @example
 * ```typescript
 * const log = createConsoleLogger('info', 'downloader');
 * log.info('Downloading zoom level', { z: 12, tiles: 96 });
 * // 2024-05-01T10:00:00.000Z INFO [downloader] Downloading zoom level {"z":12,"tiles":96}
 * ```
 */
export function createConsoleLogger(level: LogLevel = 'info', name = 'tilecrawl'): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (lineLevel: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[lineLevel] < threshold) return;
    const suffix = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
    const line = `${new Date().toISOString()} ${lineLevel.toUpperCase()} [${name}] ${message}${suffix}`;
    if (lineLevel === 'warn' || lineLevel === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  };
}

/**
 * Render an unknown thrown value as a log-friendly message.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error && err.message.trim()) return err.message;
  return String(err);
}
