import pino from 'pino';

const APP_NAME = (process.env.APP_NAME || 'endpoint-config').toUpperCase();

const usePrettyTransport =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: {
    appName: APP_NAME,
  },
  transport: usePrettyTransport
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export default logger;
export { logger };

export type Logger = typeof logger;

/**
 * Logs an error with structured context.
 * If the error is an instance of Error, it's logged under the 'err' key (Pino convention).
 * Otherwise, it's logged under 'errorData'.
 * @param message The primary log message.
 * @param error The error object or data.
 */
export const logErrorContext = (message: string, error: Error | unknown) => {
  const logDetails: { err?: Error; errorData?: unknown } = {};
  if (error instanceof Error) {
    logDetails.err = error;
  } else {
    logDetails.errorData = error;
  }
  logger.error(logDetails, message);
};
