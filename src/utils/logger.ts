import * as dotenv from 'dotenv';
import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(): LevelWithSilent {
  const configured = process.env.LOG_LEVEL;
  const match = LEVELS.find(level => level === configured);
  if (match) {
    return match;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

/**
 * Create logger instance based on environment
 *
 * Logs go to stderr; stdout is reserved for the CLI's per-release status lines.
 */
function createLogger(): Logger {
  // The logger can be the first module to load, before config/env.ts
  dotenv.config();
  const pretty = process.env.LOG_PRETTY === 'true' || process.env.NODE_ENV === 'development';

  const options: pino.LoggerOptions = {
    level: resolveLevel(),
    base: {
      env: process.env.NODE_ENV || 'production',
      service: 'relnotes',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,env,service',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
