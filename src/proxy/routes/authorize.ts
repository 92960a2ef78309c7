import { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';

const PORT_PATTERN = /^\d{1,5}$/;

/**
 * Port of the client connection. When the address was taken from
 * X-Forwarded-For the socket belongs to the proxy, so the port must come from
 * X-Forwarded-Port; without a valid one the port is unknown.
 */
function clientPort(request: FastifyRequest): number | undefined {
  if (request.ip === request.socket.remoteAddress) {
    return request.socket.remotePort;
  }

  const header = request.headers['x-forwarded-port'];
  if (typeof header !== 'string' || !PORT_PATTERN.test(header.trim())) {
    return undefined;
  }
  const port = parseInt(header, 10);
  return port >= 1 && port <= 65535 ? port : undefined;
}

const authorizeRoute: FastifyPluginAsync = async (fastify) => {
  const { engine } = fastify;

  // Bodies are never inspected; accept every content type as raw bytes
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, payload, done) => {
    done(null, payload);
  });

  const authorize = async (request: FastifyRequest, reply: FastifyReply) => {
    const header = request.headers['proxy-authorization'];
    const decision = await engine.authenticate({
      clientAddress: request.ip,
      clientPort: clientPort(request),
      proxyAuthorization: typeof header === 'string' ? header : undefined,
    });

    if (decision.outcome === 'challenged') {
      const { response } = decision;
      return reply.code(response.statusCode).headers(response.headers).send('');
    }

    if (decision.username !== undefined) {
      reply.header('X-Authenticated-User', decision.username);
    }
    return reply.code(204).send();
  };

  // Every path except /health goes through the gate
  fastify.all('/', authorize);
  fastify.all('/*', authorize);
};

export default authorizeRoute;
