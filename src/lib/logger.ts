import pino from 'pino';
import type { Logger } from 'pino';
import { getEnv, type Env } from '@/lib/config/env';

export function createLogger(level: Env['LOG_LEVEL'] = getEnv().LOG_LEVEL): Logger {
  return pino(
    {
      level,
      base: { service: 'frame-reconcile' },
      formatters: {
        level: (label) => ({ level: label })
      },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    // stdout carries command output (query results, db dumps)
    pino.destination(2)
  );
}

export const logger = createLogger();

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export function setVerbose(verbose: boolean) {
  if (verbose && logger.levelVal > logger.levels.values.debug) {
    logger.level = 'debug';
  }
}
