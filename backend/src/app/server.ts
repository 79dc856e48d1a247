/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts.
 * - Global request context is attached here (requestId + host, logs only).
 * - Module routes are registered afterwards via app/routes.ts.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import { logger } from '../shared/logger/logger';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerRequestContext } from '../shared/http/request-context';
import { registerRoutingContext } from '../shared/http/tenant-router';

export async function buildServer(opts: { config: AppConfig }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    bodyLimit: 1024 * 1024,
  });

  // Global context plugins
  registerRequestContext(app);
  registerRoutingContext(app); // filled by the tenant router on routed endpoints only

  registerErrorHandler(app);

  app.addHook('onResponse', async (req, reply) => {
    const routing = req.routingContext;

    logger.info('request', {
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
      tenantId: routing?.target.kind === 'tenant' ? routing.target.tenantId : null,
      env: opts.config.nodeEnv,
    });
  });

  return app;
}
