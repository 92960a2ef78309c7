import Fastify, { FastifyInstance, FastifyError } from 'fastify';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import type { AuthEngine } from '../auth/engine.js';

export interface GateServerDeps {
  config: Readonly<Config>;
  engine: AuthEngine;
  logger: Logger;
}

/**
 * Forward-auth endpoint for the proxy data plane. The proxy hands each client
 * request (or a subrequest carrying its headers) to the gate; a 204 means
 * "forward it", a 407 must be relayed to the client as is.
 */
export async function createGateServer(deps: GateServerDeps): Promise<FastifyInstance> {
  const { config, engine, logger } = deps;

  const app = Fastify({
    logger: false, // We use our own logger
    trustProxy: config.server.trust_proxy,
  });

  app.decorate('engine', engine);

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
        ip: request.ip,
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

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString(), ...engine.stats() };
  });

  // Register routes
  await app.register(import('./routes/authorize.js'));

  return app;
}

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    engine: AuthEngine;
  }
}
