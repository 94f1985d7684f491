import pino, { type LoggerOptions, type TransportSingleOptions } from 'pino';

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL?.trim() || 'info',
  redact: {
    paths: [
      'token',
      'secret',
      'credentials.secret',
      'config.credentials.secret',
      'headers.authorization',
      'headers.Authorization',
    ],
    remove: true,
  },
};

const environment = process.env.NODE_ENV;

export const logger =
  environment !== 'production' && environment !== 'test'
    ? pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: { translateTime: 'SYS:standard', destination: 2, ignore: 'pid,hostname' },
        } satisfies TransportSingleOptions,
      })
    : pino(options, pino.destination(2));
