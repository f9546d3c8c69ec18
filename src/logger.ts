import pino, { type Logger } from 'pino';

export type LoggerConfig = {
  level?: string;
};

/**
 * The library stays quiet unless `RECORD_DELTA_LOG_LEVEL` asks otherwise.
 */
function createBaseLogger(config: LoggerConfig = {}) {
  const { level = process.env.RECORD_DELTA_LOG_LEVEL || 'silent' } = config;

  return pino({
    name: 'record-delta',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: label => ({ level: label })
    }
  });
}

export const logger: Logger = createBaseLogger();

export type { Logger };

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export function createDifferLogger(component: string): Logger {
  return createChildLogger({ component });
}
