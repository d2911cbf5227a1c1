import pino from 'pino';
import type { LoggingConfig } from '../types/index.js';

const SERVICE_NAME = 'media-drop-uploader';

let logger: pino.Logger | null = null;

function baseOptions(level: string): pino.LoggerOptions {
  return {
    level,
    base: { service: SERVICE_NAME },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Every component logs failures under `error`
    serializers: {
      error: pino.stdSerializers.err,
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  };
}

/**
 * @param destination Write JSON lines here instead of stdout; pretty output
 * is skipped when one is given
 */
export function createLogger(config: LoggingConfig, destination?: pino.DestinationStream): pino.Logger {
  const options = baseOptions(config.level);

  if (destination) {
    return pino(options, destination);
  }

  // Use pino-pretty for development
  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname,service',
        },
      },
    });
  }

  // Production: JSON logging
  return pino(options);
}

export function initLogger(config: LoggingConfig): void {
  logger = createLogger(config);
}

export function getLogger(): pino.Logger {
  if (!logger) {
    // Used before initLogger; tests run with LOG_LEVEL=silent
    logger = pino(baseOptions(process.env.LOG_LEVEL ?? 'info'));
  }
  return logger;
}

// Create child logger with context
export function createChildLogger(context: Record<string, unknown>): pino.Logger {
  return getLogger().child(context);
}
