import pino, { type DestinationStream, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export interface LoggingConfig {
  level: LevelWithSilent;
  format: 'json' | 'console';
}

/**
 * Builds the process logger. Output goes to stderr so the stdio transport
 * keeps stdout for protocol frames.
 *
 * @param destination Overrides the output stream (used by tests)
 */
export function createLogger(config: LoggingConfig, destination?: DestinationStream): Logger {
  const options = {
    level: config.level,
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (destination) {
    return pino(options, destination);
  }

  if (config.format === 'console') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: { destination: 2, translateTime: 'SYS:standard' }
      }
    });
  }

  return pino(options, pino.destination(2));
}
