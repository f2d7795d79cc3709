import pino, { type Level, type Logger as PinoLogger, type LoggerOptions } from 'pino';
import type { LogLevelName } from '../config/schema.js';
import './env.js';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const PINO_LEVELS: Record<LogLevelName, Level> = {
  Critical: 'fatal',
  Error: 'error',
  Warning: 'warn',
  Info: 'info',
  Debug: 'debug',
};

export const toPinoLevel = (level: LogLevelName): Level => PINO_LEVELS[level];

export interface LoggerSettings {
  // pino level name, 'silent' included
  level: string;
  // Log to this file instead of stdout
  file?: string;
}

const buildOptions = (level: string): LoggerOptions => ({
  level,

  // Redact secrets from logs, access tokens end up in query strings and headers
  redact: {
    paths: [
      'token',
      'accessToken',
      'access_token',
      'authorization',
      'secret',
      'req.headers.authorization',
    ],
    censor: '[REDACTED]',
  },

  base: {
    pid: process.pid,
    env: process.env.NODE_ENV || 'development',
  },

  timestamp: pino.stdTimeFunctions.isoTime,
});

const createBaseLogger = (settings: LoggerSettings): PinoLogger => {
  const options = buildOptions(settings.level);

  if (settings.file) {
    return pino(options, pino.destination({ dest: settings.file, mkdir: true, sync: false }));
  }

  // Production: JSON for log aggregators
  // Development: Pretty print for readability
  if (isProduction || isTest) {
    return pino(options);
  }

  return pino({
    ...options,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  });
};

let baseLogger = createBaseLogger({
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
});

// Child loggers are kept so that level changes reach them too
const childLoggers = new Map<string, PinoLogger>();

const getChild = (module: string): PinoLogger => {
  let child = childLoggers.get(module);
  if (!child) {
    child = baseLogger.child({ module });
    childLoggers.set(module, child);
  }
  return child;
};

/**
 * Replace the process logger, e.g. once the configuration file has been read.
 */
export const configureLogger = (settings: LoggerSettings): void => {
  baseLogger = createBaseLogger(settings);
  childLoggers.clear();
};

export const setLogLevel = (level: string): void => {
  baseLogger.level = level;
  for (const child of childLoggers.values()) {
    child.level = level;
  }
};

export const getLogLevel = (): string => baseLogger.level;

// Old API: logger.info('message', { context })
// Pino API: logger.info({ context }, 'message')
const createCompatibleLogger = (resolve: () => PinoLogger) => {
  return {
    debug: (messageOrObj: string | object, context?: Record<string, unknown>) => {
      const pinoLogger = resolve();
      if (typeof messageOrObj === 'object') {
        pinoLogger.debug(messageOrObj);
      } else if (context) {
        pinoLogger.debug(context, messageOrObj);
      } else {
        pinoLogger.debug(messageOrObj);
      }
    },
    info: (messageOrObj: string | object, context?: Record<string, unknown>) => {
      const pinoLogger = resolve();
      if (typeof messageOrObj === 'object') {
        pinoLogger.info(messageOrObj);
      } else if (context) {
        pinoLogger.info(context, messageOrObj);
      } else {
        pinoLogger.info(messageOrObj);
      }
    },
    warn: (messageOrObj: string | object, context?: Record<string, unknown>, error?: Error) => {
      const pinoLogger = resolve();
      if (typeof messageOrObj === 'object') {
        pinoLogger.warn(messageOrObj);
      } else if (error) {
        pinoLogger.warn({ ...context, err: error }, messageOrObj);
      } else if (context) {
        pinoLogger.warn(context, messageOrObj);
      } else {
        pinoLogger.warn(messageOrObj);
      }
    },
    error: (messageOrObj: string | object, context?: Record<string, unknown>, error?: Error) => {
      const pinoLogger = resolve();
      if (typeof messageOrObj === 'object') {
        pinoLogger.error(messageOrObj);
      } else if (error) {
        pinoLogger.error({ ...context, err: error }, messageOrObj);
      } else if (context) {
        pinoLogger.error(context, messageOrObj);
      } else {
        pinoLogger.error(messageOrObj);
      }
    },
    fatal: (message: string, context?: Record<string, unknown>, error?: Error) => {
      resolve().fatal(error ? { ...context, err: error } : { ...context }, message);
    },

    logError: (message: string, error: unknown, context?: Record<string, unknown>) => {
      const err = error instanceof Error ? error : new Error(String(error));
      resolve().error({ ...context, err }, message);
    },

    get pino(): PinoLogger {
      return resolve();
    },
  };
};

export const createChildLogger = (module: string) => createCompatibleLogger(() => getChild(module));

export const wopiLogger = createChildLogger('wopi');
export const storageLogger = createChildLogger('storage');
export const configLogger = createChildLogger('config');

export const logger = createCompatibleLogger(() => baseLogger);
export default logger;

export type Logger = ReturnType<typeof createCompatibleLogger>;
