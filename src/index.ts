import { pino } from 'pino';
import { resolveConfig } from './config/index.js';
import { createAuthEngine } from './auth/index.js';
import { createDirectoryValidator } from './directory/index.js';
import { createGateServer } from './proxy/server.js';

const CONFIG_PATH = process.env.CONFIG_PATH || './config/proxygate.yaml';

async function main() {
  // File config with environment overrides, frozen for the life of the process
  const config = resolveConfig(CONFIG_PATH);

  // Initialize logger
  const usePrettyLogs = config.logging.format === 'pretty' && process.env.NODE_ENV !== 'production';
  const logger = pino({
    level: config.logging.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    transport: usePrettyLogs ? { target: 'pino-pretty' } : undefined,
    redact: ['req.headers["proxy-authorization"]', 'password'],
  });

  if (config.logging.format === 'pretty' && process.env.NODE_ENV === 'production') {
    logger.warn('Pretty logging is not available in production, using JSON format instead');
  }

  logger.info('Starting ProxyGate...');
  logger.info({ configPath: CONFIG_PATH }, 'Configuration loaded');

  const validator = createDirectoryValidator(config.directory, logger);
  logger.info(
    { validator: validator.name, profile: config.directory.profile },
    'Directory validator initialized'
  );

  const engine = createAuthEngine(config, validator, logger);
  logger.info(
    {
      realm: config.auth.realm,
      cacheTtlSeconds: config.auth.cache_ttl_seconds,
      validationTimeoutMs: config.auth.validation_timeout_ms,
      audit: config.logging.audit,
    },
    'Authentication engine initialized'
  );

  const server = await createGateServer({ config, engine, logger });

  // Sweep expired cache and registry entries
  const cleanupTimer = setInterval(() => {
    try {
      engine.cleanupExpired();
    } catch (err) {
      logger.error({ err }, 'Authentication cache cleanup failed');
    }
  }, config.auth.cleanup_interval_seconds * 1000);
  cleanupTimer.unref();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');

    clearInterval(cleanupTimer);
    await server.close();
    logger.info('HTTP server closed');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  const port = config.server.listen_port;
  await server.listen({ port, host: config.server.host });

  logger.info({ port, host: config.server.host }, 'Gate server started');
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
