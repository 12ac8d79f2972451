/**
 * Logging for scenario runs.
 *
 * Thin factory over winston so every component logs with the same format:
 * `2026-01-21T12:00:00.000Z info [scenario] Primary 0 crashed`.
 */

import winston from 'winston';

export type Logger = winston.Logger;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
  /** Minimum level written. Default: 'info'. */
  readonly level?: LogLevel;
  /** Label printed with every line. Default: 'bft-chaos'. */
  readonly label?: string;
}

/**
 * Creates a console logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', label: 'view-change' });
 * logger.info('Replica 0 stopped', { replicaId: 0 });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', label = 'bft-chaos' } = options;

  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.label({ label }),
      winston.format.timestamp(),
      winston.format.printf((info) => {
        const { timestamp, level: lvl, label: lbl, message, ...meta } = info;
        const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} ${lvl} [${String(lbl)}] ${String(message)}${extra}`;
      }),
    ),
    transports: [new winston.transports.Console()],
  });
}

/**
 * Logger that discards everything. Used as the default in tests and by
 * components constructed without a logger.
 */
export function silentLogger(): Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  });
}
