import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import type { DirectoryValidator } from '../directory/types.js';
import { ValidationCache } from './cache.js';
import { AuthEngine } from './engine.js';
import { ConnectionRegistry } from './registry.js';

export function createAuthEngine(
  config: Readonly<Config>,
  validator: DirectoryValidator,
  logger: Logger
): AuthEngine {
  return new AuthEngine({
    config: {
      realm: config.auth.realm,
      cacheTtlSeconds: config.auth.cache_ttl_seconds,
      validationTimeoutMs: config.auth.validation_timeout_ms,
      profile: config.directory.profile,
      audit: config.logging.audit,
    },
    cache: new ValidationCache(config.auth.max_cache_entries),
    registry: new ConnectionRegistry(config.registry.max_entries, config.registry.ttl_seconds),
    validator,
    logger,
  });
}
