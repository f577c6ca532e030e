import Fastify, { FastifyInstance, FastifyError } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { Config } from '../config/index.js';
import type { IdentityMiddleware } from '../middleware/authenticate.js';
import type { Logger } from 'pino';
import passthroughRoute from './routes/passthrough.js';

export interface ProxyServerDeps {
  config: Config;
  logger: Logger;
  identityMiddleware: IdentityMiddleware;
}

export async function createProxyServer(deps: ProxyServerDeps): Promise<FastifyInstance> {
  const { config, logger, identityMiddleware } = deps;

  const app = Fastify({
    logger: false, // We use our own logger
    bodyLimit: config.proxy.body_limit,
  });

  // Security headers; the upstream owns its content policy
  await app.register(helmet, {
    contentSecurityPolicy: false,
    // Enable HSTS only in production to avoid issues on non-HTTPS environments
    hsts:
      process.env.NODE_ENV === 'production'
        ? { maxAge: 60 * 60 * 24 * 180, includeSubDomains: true, preload: false }
        : false,
    referrerPolicy: { policy: 'no-referrer' },
  });

  // Every authenticated request can cost a round-trip to the identity authority
  if (config.rate_limit.enabled) {
    await app.register(rateLimit, {
      max: config.rate_limit.max,
      timeWindow: config.rate_limit.window_ms,
      allowList: (request) => request.url.split('?')[0] === '/health',
    });
  }

  // Decorate with dependencies
  app.decorate('config', config);
  app.decorate('proxyLogger', logger);
  app.decorate('identityMiddleware', identityMiddleware);

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    logger.error(
      {
        err: error,
        method: request.method,
        url: request.url,
      },
      'Request error'
    );

    // Don't expose internal errors to clients
    reply.code(error.statusCode || 500).send({
      error: error.statusCode ? error.message : 'Internal Server Error',
    });
  });

  // Health check endpoint
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  await app.register(passthroughRoute);

  return app;
}

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    proxyLogger: Logger;
    identityMiddleware: IdentityMiddleware;
  }
}
