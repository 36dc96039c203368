import pino from 'pino';
import type { LoggingConfig } from '../types/index.js';
import type { ProcessingJob } from '../models/ProcessingJob.js';

const LOGGER_NAME = 'archive-metadata';

/** Logs go to stderr; stdout is left to the command itself */
const STDERR_FD = 2;

const DEFAULT_LOGGING: LoggingConfig = { level: 'info', pretty: false };

let logger: pino.Logger | null = null;

function loggerOptions(config: LoggingConfig): pino.LoggerOptions {
  return {
    name: LOGGER_NAME,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Errors are logged under `error`, not pino's default `err`
    serializers: {
      error: pino.stdSerializers.err,
    },
  };
}

/**
 * @param destination Overrides stderr; ignored when pretty printing
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream
): pino.Logger {
  const options = loggerOptions(config);

  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: STDERR_FD,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname,name',
        },
      },
    });
  }

  return pino(options, destination ?? pino.destination({ fd: STDERR_FD, sync: true }));
}

export function initLogger(config: LoggingConfig, destination?: pino.DestinationStream): void {
  logger = createLogger(config, destination);
}

export function getLogger(): pino.Logger {
  if (!logger) {
    logger = createLogger(DEFAULT_LOGGING);
  }
  return logger;
}

/**
 * Child logger tagging every line with the job and its file
 */
export function createJobLogger(job: ProcessingJob): pino.Logger {
  return getLogger().child({ jobId: job.id, filePath: job.file.absolutePath });
}
