import pino, { type LevelWithSilent, type Logger, type LoggerOptions } from 'pino';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'ruya-sft';

export interface CliLoggerOptions {
  level?: LevelWithSilent;
  /** Extra destination; records are still written to stdout. */
  logFile?: string;
  service?: string;
}

export function createCliLogger(options: CliLoggerOptions = {}): Logger {
  const service = options.service ?? (process.env.LOG_SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME);
  const loggerOptions: LoggerOptions = {
    level: options.level ?? DEFAULT_LOG_LEVEL,
    base: { service },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: 'message',
  };

  if (!options.logFile) {
    return pino(loggerOptions);
  }

  return pino(
    loggerOptions,
    pino.multistream([
      { level: 'trace', stream: process.stdout },
      { level: 'trace', stream: pino.destination({ dest: options.logFile, mkdir: true, sync: true }) },
    ]),
  );
}

export interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}
