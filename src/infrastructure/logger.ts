import pino, { type LoggerOptions } from 'pino';
import { config } from '../config/env';
import { getPipelineContext } from './requestContext';

export const loggerOptions: LoggerOptions = {
  level: config.LOG_LEVEL,
  transport:
    config.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  redact: [
    'req.headers.authorization',
    'req.headers.cookie',
    'body.bankAccount.value.accountNumber',
    'invoice.bankAccount.value.accountNumber',
  ],
  // Every line logged while a run is executing carries its id.
  mixin() {
    const ctx = getPipelineContext();
    return ctx ? { runId: ctx.runId, jobId: ctx.jobId } : {};
  },
};

export const logger = pino(loggerOptions);
