import type { Logger } from '@wellness-automation/shared';
import type { AutomationEngine } from '@wellness-automation/workflow-engine';
import Fastify from 'fastify';

import type { AutomationServiceConfig } from './config.js';
import { EngineError, ERROR_CODES, toErrorResponse } from './errors.js';
import { TokenBucketRateLimiter } from './rate-limiter.js';
import type { ReadinessCheck } from './readiness.js';
import { getCorrelationId, registerHealthRoutes, registerTenantRoutes } from './routes.js';
import type { TickDriver } from './tick-driver.js';

export interface AutomationServiceAppDependencies {
  config: AutomationServiceConfig;
  logger: Logger;
  engine: AutomationEngine;
  tickDriver: TickDriver;
  readinessChecks: ReadinessCheck[];
  rateLimiter?: TokenBucketRateLimiter;
}

export function buildAutomationServiceApp(dependencies: AutomationServiceAppDependencies) {
  const app = Fastify({ logger: false });
  const apiRateLimiter = dependencies.rateLimiter ?? new TokenBucketRateLimiter(600, 60_000);

  app.addHook('onRequest', async (request, reply) => {
    request.correlationId = getCorrelationId(request);
    reply.header('x-correlation-id', request.correlationId);

    if (!request.url.startsWith('/v1/')) {
      return;
    }

    const sourceKey = request.headers['x-forwarded-for'];
    const key = typeof sourceKey === 'string' ? sourceKey : 'local';
    if (!apiRateLimiter.allow(key)) {
      const retryAfter = apiRateLimiter.retryAfterSeconds(key);
      const mapped = toErrorResponse(
        new EngineError(
          ERROR_CODES.RATE_LIMIT_EXCEEDED,
          429,
          `Too many requests. Please retry after ${retryAfter} seconds.`,
          undefined,
          retryAfter,
        ),
      );
      return reply.status(mapped.statusCode).send(mapped.body);
    }

    const authorizationHeader = request.headers.authorization;
    const expectedToken = `Bearer ${dependencies.config.SERVICE_SHARED_TOKEN}`;
    if (authorizationHeader !== expectedToken) {
      const mapped = toErrorResponse(
        new EngineError(ERROR_CODES.UNAUTHORIZED, 401, 'Invalid or missing service bearer token'),
      );
      return reply.status(mapped.statusCode).send(mapped.body);
    }

    const tenantHeader = request.headers['x-tenant-id'];
    if (typeof tenantHeader !== 'string' || tenantHeader.length === 0) {
      const mapped = toErrorResponse(
        new EngineError(
          ERROR_CODES.VALIDATION_ERROR,
          400,
          'Missing required tenant boundary header: x-tenant-id',
        ),
      );
      return reply.status(mapped.statusCode).send(mapped.body);
    }
  });

  app.addHook('onResponse', async (request, reply) => {
    dependencies.logger.info('request complete', {
      correlationId: request.correlationId,
      method: request.method,
      path: request.url,
      statusCode: reply.statusCode,
    });
  });

  app.register(async (instance) => {
    await registerHealthRoutes(instance, dependencies.readinessChecks);
  });

  app.register(async (instance) => {
    await registerTenantRoutes(instance, { engine: dependencies.engine });
  });

  app.addHook('onClose', async () => {
    dependencies.tickDriver.stop();
    await dependencies.engine.drain();
  });

  app.setNotFoundHandler((_request, reply) => {
    const error = new EngineError(ERROR_CODES.ROUTE_NOT_FOUND, 404, 'Route not found');
    const mapped = toErrorResponse(error);
    return reply.status(mapped.statusCode).send(mapped.body);
  });

  app.setErrorHandler((error, request, reply) => {
    const mapped = toErrorResponse(error);

    const fields = {
      correlationId: request.correlationId,
      method: request.method,
      path: request.url,
      statusCode: mapped.statusCode,
      code: mapped.body.error.code,
      message: mapped.body.error.message,
    };
    if (mapped.statusCode >= 500) {
      dependencies.logger.error('request failed', fields);
    } else {
      dependencies.logger.warn('request rejected', fields);
    }

    return reply.status(mapped.statusCode).send(mapped.body);
  });

  return app;
}
