import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit, { type RateLimitPluginOptions } from '@fastify/rate-limit';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import * as Sentry from '@sentry/node';
import { config } from './config/env';
import type { NotificationReader } from './controllers/notificationController';
import { loggerOptions } from './infrastructure/logger';
import { getRedisClient } from './infrastructure/redis';
import invoiceRoutes from './routes/invoiceRoutes';
import notificationRoutes from './routes/notificationRoutes';
import type { InvoicePipelineService } from './services/InvoicePipelineService';
import { PipelineRunNotFoundError, RunNotCancellableError } from './services/pipeline/errors';

export type AppDeps = {
  pipeline: InvoicePipelineService;
  notifications: NotificationReader;
};

type MappedError = { statusCode: number; code: string };

function mapDomainError(error: Error): MappedError | null {
  if (error instanceof PipelineRunNotFoundError) return { statusCode: 404, code: 'RUN_NOT_FOUND' };
  if (error instanceof RunNotCancellableError) return { statusCode: 409, code: 'RUN_NOT_CANCELLABLE' };
  return null;
}

export function buildApp(deps: AppDeps): FastifyInstance {
  const app = Fastify({
    // Trust X-Forwarded-For so rate limiting keys on the client behind a proxy.
    trustProxy: true,
    logger: loggerOptions,
  });

  app.register(helmet, {
    contentSecurityPolicy: config.NODE_ENV === 'production',
  });

  if (config.ENABLE_RATE_LIMIT === 'true') {
    const rateLimitConfig: RateLimitPluginOptions = {
      max: 100,
      timeWindow: '1 minute',
    };
    if (config.REDIS_URL) {
      rateLimitConfig.redis = getRedisClient();
    }
    app.register(rateLimit, rateLimitConfig);
  }

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  if (config.NODE_ENV !== 'production') {
    app.register(cors, {
      origin: ['http://localhost:3000'],
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    });
  } else {
    app.register(cors, {
      origin: config.FRONTEND_URL ? [config.FRONTEND_URL] : false,
    });
  }

  app.register(invoiceRoutes, { prefix: '/invoices', pipeline: deps.pipeline });
  app.register(notificationRoutes, { prefix: '/notifications', notifications: deps.notifications });

  app.get('/health', async () => {
    return { status: 'ok' };
  });

  app.setErrorHandler((error, request, reply) => {
    if (error.validation || error.code === 'FST_ERR_VALIDATION') {
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error.validation,
        },
      });
    }

    const mapped = mapDomainError(error);
    if (mapped) {
      request.log.info({ event: 'http.domain_error', code: mapped.code }, error.message);
      return reply.status(mapped.statusCode).send({ error: { code: mapped.code, message: error.message } });
    }

    request.log.error(error);
    Sentry.withScope((scope) => {
      scope.setContext('request', { method: request.method, url: request.url });
      scope.setTag('error_code', error.code || 'INTERNAL_ERROR');
      scope.setTag('status_code', String(error.statusCode || 500));
      Sentry.captureException(error);
    });

    const statusCode = error.statusCode || 500;
    return reply.status(statusCode).send({
      error: {
        code: error.code || 'INTERNAL_ERROR',
        message: statusCode >= 500 ? 'Something went wrong' : error.message,
      },
    });
  });

  return app;
}
