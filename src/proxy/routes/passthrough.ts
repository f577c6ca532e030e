import type { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';

// Hop-by-hop headers are connection-scoped and never forwarded
const HOP_BY_HOP = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'host',
  'content-length',
]);

const METHODS_WITH_BODY = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

function upstreamRequestHeaders(request: FastifyRequest): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(request.headers)) {
    if (value === undefined || HOP_BY_HOP.has(name)) continue;
    headers[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
}

const passthroughRoute: FastifyPluginAsync = async (fastify) => {
  const { config, proxyLogger: logger, identityMiddleware } = fastify;

  // Forward the exact bytes received whatever the content type
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, payload, done) => {
    done(null, payload);
  });

  const forwardUpstream = async (request: FastifyRequest, reply: FastifyReply) => {
    const targetUrl = `${config.proxy.upstream_url.replace(/\/+$/, '')}${request.url}`;

    logger.debug(
      { method: request.method, url: request.url, identityStatus: request.headers['x-identity-status'] },
      'Forwarding to upstream'
    );

    try {
      const fetchOptions: RequestInit = {
        method: request.method,
        headers: upstreamRequestHeaders(request),
        signal: AbortSignal.timeout(config.proxy.timeout_ms),
      };

      if (METHODS_WITH_BODY.has(request.method) && Buffer.isBuffer(request.body)) {
        fetchOptions.body = request.body;
      }

      const response = await fetch(targetUrl, fetchOptions);
      const responseBody = await response.arrayBuffer();

      if (response.status >= 500) {
        logger.warn({ status: response.status, url: request.url }, 'Upstream returned error');
      }

      reply.code(response.status);

      // fetch already decoded the body, so its encoding and length no longer apply
      response.headers.forEach((value, name) => {
        if (HOP_BY_HOP.has(name) || name === 'content-encoding' || name === 'set-cookie') return;
        reply.header(name, value);
      });
      const cookies = response.headers.getSetCookie();
      if (cookies.length > 0) {
        reply.header('set-cookie', cookies);
      }

      return reply.send(Buffer.from(responseBody));
    } catch (err) {
      logger.error({ err, url: request.url }, 'Failed to forward request');
      return reply.code(502).send({ error: 'Failed to forward to upstream' });
    }
  };

  const authenticateAndForward = async (request: FastifyRequest, reply: FastifyReply) => {
    // A client that disconnects early cancels its identity call
    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    });

    return identityMiddleware.handle({ headers: request.headers, signal: controller.signal }, () =>
      forwardUpstream(request, reply)
    );
  };

  fastify.all('/', authenticateAndForward);
  fastify.all('/*', authenticateAndForward);
};

export default passthroughRoute;
