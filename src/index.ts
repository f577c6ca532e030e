import pino from 'pino';
import { loadConfig } from './config/index.js';
import { closeDatabase } from './db/index.js';
import { createIdentityCache } from './cache/index.js';
import { IdentityValidator } from './identity/validator.js';
import { IdentityMiddleware } from './middleware/authenticate.js';
import { createProxyServer } from './proxy/server.js';

const CONFIG_PATH = process.env.CONFIG_PATH || './config/keystone-gate.yaml';

async function main() {
  const config = loadConfig(CONFIG_PATH);

  // Initialize logger
  const usePrettyLogs = config.logging.format === 'pretty' && process.env.NODE_ENV !== 'production';
  const logger = pino({
    level: config.logging.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    transport: usePrettyLogs ? { target: 'pino-pretty' } : undefined,
  });

  if (config.logging.format === 'pretty' && process.env.NODE_ENV === 'production') {
    logger.warn('Pretty logging is not available in production, using JSON format instead');
  }

  logger.info('Starting keystone-gate...');
  logger.info({ configPath: CONFIG_PATH }, 'Configuration loaded');

  const cache = await createIdentityCache(config.cache, logger);
  logger.info(
    { type: config.cache.type, ttlSeconds: config.cache.ttl_seconds },
    cache ? 'Identity cache enabled' : 'Identity cache disabled'
  );

  const validator = new IdentityValidator(
    {
      endpoint: config.identity.endpoint,
      timeoutMs: config.identity.timeout_ms,
      userAgent: config.identity.user_agent,
    },
    logger
  );

  const identityMiddleware = new IdentityMiddleware({
    validator,
    cache,
    cacheTtlMs: config.cache.ttl_seconds * 1000,
    logger,
  });

  const server = await createProxyServer({ config, logger, identityMiddleware });

  // Sweep expired cache entries
  const cleanupTimer = cache
    ? setInterval(async () => {
        try {
          const deleted = await cache.cleanupExpired();
          if (deleted > 0) {
            logger.debug({ deleted }, 'Cleaned up expired identity cache entries');
          }
        } catch (err) {
          logger.error({ err }, 'Identity cache cleanup failed');
        }
      }, config.cache.cleanup_interval_seconds * 1000)
    : null;

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');

    if (cleanupTimer) clearInterval(cleanupTimer);

    await server.close();
    logger.info('HTTP server closed');

    await closeDatabase();
    logger.info('Resources cleaned up');

    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  const { listen_port: port, listen_host: host } = config.proxy;
  await server.listen({ port, host });

  logger.info(
    { port, upstreamUrl: config.proxy.upstream_url, identityEndpoint: config.identity.endpoint },
    'Proxy server started'
  );
}

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
});

main().catch((err) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
