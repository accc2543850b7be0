import winston from 'winston';

import type { LoggingConfig } from './types.js';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

// Human-readable format for development
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;

  if (Object.keys(metadata).length > 0) {
    // Filter out Symbol properties that Winston adds
    const cleanMetadata: Record<string, unknown> = {};
    for (const key of Object.keys(metadata)) {
      if (!key.startsWith('Symbol')) {
        cleanMetadata[key] = metadata[key];
      }
    }
    if (Object.keys(cleanMetadata).length > 0) {
      msg += ` ${JSON.stringify(cleanMetadata)}`;
    }
  }

  return msg;
});

const getLogLevel = (): string => {
  const envLevel = process.env['LOG_LEVEL'];
  if (envLevel) {
    return envLevel.toLowerCase();
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
};

const buildFormat = (format: string | undefined): winston.Logform.Format => {
  const isDev = process.env['NODE_ENV'] !== 'production';

  if (format === 'json' || !isDev) {
    return combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }), json());
  }

  return combine(
    colorize({ all: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    errors({ stack: true }),
    devFormat
  );
};

const buildFileTransports = (logFilePath: string): winston.transport[] => [
  new winston.transports.File({
    filename: logFilePath,
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
    tailable: true,
  }),
  // Separate error log file
  new winston.transports.File({
    filename: logFilePath.replace('.log', '.error.log'),
    level: 'error',
    maxsize: 10 * 1024 * 1024,
    maxFiles: 5,
    tailable: true,
  }),
];

const getTransports = (): winston.transport[] => {
  const transports: winston.transport[] = [new winston.transports.Console()];

  if (process.env['LOG_FILE_ENABLED'] === 'true') {
    transports.push(...buildFileTransports(process.env['LOG_FILE_PATH'] ?? './logs/graphqa.log'));
  }

  return transports;
};

const logger = winston.createLogger({
  level: getLogLevel(),
  format: buildFormat(process.env['LOG_FORMAT']),
  transports: getTransports(),
  exitOnError: false,
});

/**
 * Re-apply a loaded logging section to the shared logger.
 */
export const applyLoggingConfig = (config: LoggingConfig): void => {
  logger.level = config.level;
  logger.format = buildFormat(config.format);

  const hasFileTransport = logger.transports.some(
    (transport) => transport instanceof winston.transports.File
  );
  if (config.fileEnabled && !hasFileTransport) {
    for (const transport of buildFileTransports(config.filePath)) {
      logger.add(transport);
    }
  }
};

// QA pipeline step logger
export interface QAStepLogData {
  requestId: string;
  step: string;
  level?: 'debug' | 'info' | 'warn' | 'error';
  [key: string]: unknown;
}

export const logQAStep = ({ level = 'debug', ...data }: QAStepLogData): void => {
  logger.log(level, `QA ${data.step}`, {
    type: 'qa',
    ...data,
  });
};

// Config logger
export const logConfig = (message: string, data?: Record<string, unknown>): void => {
  logger.info(message, {
    type: 'config',
    ...data,
  });
};

// Startup/shutdown logger
export const logLifecycle = (
  event: 'startup' | 'shutdown' | 'ready' | 'error',
  message: string,
  data?: Record<string, unknown>
): void => {
  const level = event === 'error' ? 'error' : 'info';

  logger.log(level, `[${event.toUpperCase()}] ${message}`, {
    type: 'lifecycle',
    event,
    ...data,
  });
};

// Create a child logger with additional context
export const createChildLogger = (context: Record<string, unknown>): winston.Logger => {
  return logger.child(context);
};

export default logger;
