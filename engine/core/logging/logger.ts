/**
 * GridCalc Engine - Logging
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface LoggerConfig {
  /** pino level; defaults to LOG_LEVEL or "info" */
  level?: string;
  /** Optional logger name, added to every line */
  name?: string;
  destination?: DestinationStream;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? process.env.LOG_LEVEL ?? 'info',
    base: {
      service: 'gridcalc-engine',
    },
  };
  if (config.name !== undefined) options.name = config.name;

  return config.destination ? pino(options, config.destination) : pino(options);
}

/** Logger that drops everything; used as the default inside tests and libraries */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
