import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import formbody from '@fastify/formbody';
import cookie from '@fastify/cookie';
import helmet from '@fastify/helmet';
import fastifyRawBody from 'fastify-raw-body';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import * as Sentry from '@sentry/node';
import { config } from './config/env';
import { loggerOptions } from './infrastructure/logger';
import { AppError } from './utils/appError';
import webhookRoutes from './routes/webhookRoutes';
import adminRoutes from './routes/adminRoutes';
import dashboardRoutes from './routes/dashboardRoutes';
import inboxRoutes from './routes/inboxRoutes';

const health = async () => ({ ok: true, service: 'wa-broker-desk' });

export function buildApp(): FastifyInstance {
  const app = Fastify({
    trustProxy: true,
    logger: loggerOptions,
  });

  // Security Headers (dashboard and inbox are server-rendered with inline styles/handlers)
  app.register(helmet, {
    contentSecurityPolicy: false,
  });

  // Only the WhatsApp webhook asks for the raw body (signature check)
  app.register(fastifyRawBody, {
    global: false,
    runFirst: true,
  });

  // Dashboard and inbox forms post application/x-www-form-urlencoded
  app.register(formbody);

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.register(cookie, {
    secret: config.SESSION_SECRET,
    parseOptions: {},
  });

  app.register(webhookRoutes, { prefix: '/webhook' });
  app.register(adminRoutes, { prefix: '/admin' });
  app.register(dashboardRoutes);
  app.register(inboxRoutes, { prefix: '/inbox' });

  app.get('/', health);
  app.get('/health', health);

  // Global Error Handler
  app.setErrorHandler((error: FastifyError | AppError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const code = error.code || 'INTERNAL_ERROR';

    if (statusCode >= 500) {
      request.log.error(error);
    } else {
      request.log.warn({ event: 'request.rejected', code, statusCode }, error.message);
    }

    // Client errors are expected traffic; only report server-side failures.
    if (statusCode >= 500) {
      Sentry.withScope((scope) => {
        const agent = request.agent;
        scope.setContext('request', {
          method: request.method,
          url: request.routeOptions.url ?? request.url,
        });
        if (agent) {
          scope.setUser({ id: String(agent.id), tenant_id: agent.tenantId });
        }
        scope.setTag('error_code', code);
        scope.setTag('status_code', String(statusCode));
        Sentry.captureException(error);
      });
    }

    if ('validation' in error && error.validation) {
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error.validation,
        },
      });
    }

    return reply.status(statusCode).send({
      error: {
        code,
        message: statusCode >= 500 ? 'Something went wrong' : error.message,
      },
    });
  });

  return app;
}
