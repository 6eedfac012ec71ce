import pino, { type Logger } from 'pino';

const isDevelopment = (process.env.NODE_ENV || 'development') === 'development';

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'smart-rag-api' },
  ...(isDevelopment && process.env.LOG_PRETTY !== 'false'
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:HH:MM:ss' },
        },
      }
    : {}),
});

export type { Logger };
