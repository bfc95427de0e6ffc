/**
 * Structured logging
 *
 * Built on pino. Everything goes to stderr so `--json` output on stdout
 * stays machine-readable.
 *
 * Configuration:
 *   TRIAGE_LOG_LEVEL   Minimum log level (default: "warn")
 *   TRIAGE_LOG_PRETTY  "true" switches to pino-pretty
 *   TRIAGE_DEBUG       "true" sets level to "debug"
 *
 * Usage:
 *   import { log } from './logger.js';
 *   log.sync.info({ fetched: 42 }, 'list complete');
 *   log.github.warn({ remaining: 12 }, 'rate limit low');
 */

import pino from 'pino';
import type { Logger } from 'pino';

const IS_TEST = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

function resolveLevel(): string {
  if (process.env.TRIAGE_LOG_LEVEL) {
    return process.env.TRIAGE_LOG_LEVEL;
  }
  const debugEnv = (process.env.TRIAGE_DEBUG || '').trim().toLowerCase();
  if (debugEnv && debugEnv !== 'false' && debugEnv !== '0') {
    return 'debug';
  }
  if (IS_TEST) return 'silent';
  return 'warn';
}

function createRootLogger(): Logger {
  const options: pino.LoggerOptions = {
    level: resolveLevel(),
    base: { service: 'triage-inbox' },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Tokens travel in headers; never let one reach a log line
    redact: {
      paths: ['token', '*.token', 'authorization', '*.authorization', 'headers.Authorization'],
      censor: '[REDACTED]',
    },
  };

  if (!IS_TEST && process.env.TRIAGE_LOG_PRETTY === 'true') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

export const rootLogger: Logger = createRootLogger();

/**
 * Subsystem loggers. Each adds a `subsystem` field to every line
 */
export const log = {
  /** SQLite cache */
  db: rootLogger.child({ subsystem: 'db' }),
  /** Sync orchestrator */
  sync: rootLogger.child({ subsystem: 'sync' }),
  /** GitHub REST/GraphQL client */
  github: rootLogger.child({ subsystem: 'github' }),
  /** Worker loop and request handlers */
  worker: rootLogger.child({ subsystem: 'worker' }),
  /** Command-line entry point */
  cli: rootLogger.child({ subsystem: 'cli' }),
  root: rootLogger,
};

export type { Logger };
