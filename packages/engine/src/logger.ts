import { pino, type Logger } from 'pino';
import type { Config } from './config.js';

/**
 * Structured logger using pino
 *
 * - LOG_LEVEL controls verbosity (trace, debug, info, warn, error, fatal, silent)
 * - ISO timestamps, JSON output
 * - Each engine component derives a child logger with `{ component }`
 */
export function createLogger(config: Pick<Config, 'logLevel'>, bindings: Record<string, unknown> = {}): Logger {
  return pino({
    level: config.logLevel,
    base: { service: 'flowmesh-engine', ...bindings },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export type { Logger };
