import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import * as Sentry from '@sentry/node';
import { ZodError } from 'zod';
import packSizeRoutes from './routes/packSizeRoutes';
import catalogRoutes from './routes/catalogRoutes';
import insightsRoutes from './routes/insightsRoutes';
import { CatalogImportError } from './services/catalogImportService';
import { config } from './config/env';
import { LOG_REDACT, prettyTransport } from './infrastructure/logger';

export function buildApp(): FastifyInstance {
  const app = Fastify({
    trustProxy: true,
    logger: {
      level: config.LOG_LEVEL,
      transport: prettyTransport(),
      redact: LOG_REDACT,
    },
  });

  // Security Headers
  app.register(helmet, {
    contentSecurityPolicy: config.NODE_ENV === 'production',
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  app.register(cors, {
    origin: [config.CORS_ORIGIN],
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  // Catalog CSV uploads
  app.register(multipart, {
    limits: {
      fileSize: config.MAX_IMPORT_BYTES,
      files: 1,
    },
  });

  // Setup Zod validation
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.register(packSizeRoutes, { prefix: '/pack-size' });
  app.register(catalogRoutes, { prefix: '/catalog' });
  app.register(insightsRoutes, { prefix: '/insights' });

  // Health Check
  app.get('/health', async () => {
    return { status: 'ok' };
  });

  // Global Error Handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // The zod validator compiler hands Fastify the ZodError itself; Fastify tags it FST_ERR_VALIDATION.
    if (error instanceof ZodError || error.code === 'FST_ERR_VALIDATION' || error.validation) {
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error instanceof ZodError ? error.issues : error.validation,
        },
      });
    }

    if (error instanceof CatalogImportError) {
      request.log.warn({ err: { message: error.message }, rowErrors: error.rowErrors.length }, 'catalog.import.rejected');
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          details: error.rowErrors,
        },
      });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error(error);
      Sentry.withScope((scope) => {
        scope.setContext('request', { method: request.method, url: request.url });
        scope.setTag('error_code', error.code || 'INTERNAL_ERROR');
        scope.setTag('status_code', String(statusCode));
        Sentry.captureException(error);
      });
    } else {
      request.log.warn({ err: { message: error.message, code: error.code } }, 'request.failed');
    }

    return reply.status(statusCode).send({
      error: {
        code: error.code || 'INTERNAL_ERROR',
        message: statusCode >= 500 ? 'Something went wrong' : error.message,
      },
    });
  });

  return app;
}
