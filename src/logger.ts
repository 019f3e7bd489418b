import pino from 'pino';

/**
 * Root application logger. Level starts at info and is set from configuration
 * once it has been loaded (see configureLogger).
 */
export const logger = pino({
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime
});

/** The slice of the pino API components accept when a logger is injected */
export type Logger = Pick<pino.BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export const configureLogger = (level: string): void => {
  logger.level = level;
};
