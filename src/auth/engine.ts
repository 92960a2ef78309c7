import type { Logger } from 'pino';
import { ValidationCache, cacheKey } from './cache.js';
import { buildChallenge } from './challenge.js';
import { decodeBasicToken, extractBasicToken } from './codec.js';
import { ConnectionRegistry, connectionId } from './registry.js';
import type {
  AllowReason,
  AuthDecision,
  AuthEngineConfig,
  AuthRequest,
  AuthState,
  ChallengeReason,
} from './types.js';
import { validateWithSession } from '../directory/session.js';
import type { DirectoryValidator, ValidationRequest, ValidatorOutcome } from '../directory/types.js';

export interface AuthEngineDeps {
  config: AuthEngineConfig;
  cache: ValidationCache;
  registry: ConnectionRegistry;
  validator: DirectoryValidator;
  logger: Logger;
}

export interface AuthEngineStats {
  cacheEntries: number;
  connections: number;
  pendingValidations: number;
}

/**
 * Per-request authentication decision: allow the request through or answer it
 * with a 407 challenge. A positive directory answer is cached per
 * (client address, credential token) for the configured TTL.
 *
 * Concurrent cache misses for the same key share one directory call; the
 * shared call is forgotten once it settles, so failures are never reused.
 */
export class AuthEngine {
  private config: AuthEngineConfig;
  private cache: ValidationCache;
  private registry: ConnectionRegistry;
  private validator: DirectoryValidator;
  private logger: Logger;
  private pending = new Map<string, Promise<ValidatorOutcome>>();

  constructor(deps: AuthEngineDeps) {
    this.config = deps.config;
    this.cache = deps.cache;
    this.registry = deps.registry;
    this.validator = deps.validator;
    this.logger = deps.logger;
  }

  async authenticate(request: AuthRequest): Promise<AuthDecision> {
    const trail: AuthState[] = [];

    const token = extractBasicToken(request.proxyAuthorization);
    if (token === undefined) {
      trail.push('NO_HEADER');
      return this.challenge(request, 'missing_header', trail);
    }
    trail.push('HEADER_PRESENT');

    const key = cacheKey(request.clientAddress, token);
    const tokenHash = key.substring(0, 8);

    const cached = this.cache.lookup(key);
    if (cached.hit) {
      trail.push('CACHE_HIT');
      this.logger.debug({ tokenHash, client: request.clientAddress }, 'Credential served from cache');
      return this.allow(request, 'cached', trail, cached.entry.username);
    }
    trail.push('CACHE_MISS', 'DECODING');

    const decoded = decodeBasicToken(token);
    if (!decoded.ok) {
      this.logger.debug({ tokenHash, error: decoded.error }, 'Malformed Basic credential');
      return this.challenge(request, 'decode_error', trail, decoded.error);
    }
    trail.push('VALIDATING');

    const outcome = await this.validateOnce(key, {
      username: decoded.username,
      password: decoded.password,
      profile: this.config.profile,
    });

    switch (outcome.kind) {
      case 'allow':
        this.cache.put(key, this.config.cacheTtlSeconds, decoded.username);
        if (request.clientPort !== undefined) {
          this.registry.record(connectionId(request.clientAddress, request.clientPort), decoded.username);
        }
        this.logger.debug(
          { tokenHash, username: decoded.username, validator: this.validator.name },
          'Credential validated by directory'
        );
        return this.allow(request, 'validated', trail, decoded.username);

      case 'deny':
        return this.challenge(request, 'validator_deny', trail, undefined, decoded.username);

      case 'indeterminate':
        return this.challenge(request, 'validator_indeterminate', trail, outcome.reason, decoded.username);

      default: {
        const unexpected: never = outcome;
        this.logger.error({ outcome: unexpected, tokenHash }, 'Unexpected directory outcome');
        return this.challenge(request, 'validator_indeterminate', trail, 'unexpected_outcome');
      }
    }
  }

  private validateOnce(key: string, request: ValidationRequest): Promise<ValidatorOutcome> {
    const existing = this.pending.get(key);
    if (existing) {
      return existing;
    }

    const validation = validateWithSession(
      this.validator,
      request,
      this.config.validationTimeoutMs
    ).finally(() => {
      this.pending.delete(key);
    });
    this.pending.set(key, validation);
    return validation;
  }

  private allow(
    request: AuthRequest,
    reason: AllowReason,
    trail: AuthState[],
    username?: string
  ): AuthDecision {
    trail.push('ALLOWED');
    if (this.config.audit) {
      this.logger.info(
        { client: request.clientAddress, port: request.clientPort, username, reason },
        'Proxy authentication succeeded'
      );
    }
    return { outcome: 'allowed', reason, username, trail };
  }

  private challenge(
    request: AuthRequest,
    reason: ChallengeReason,
    trail: AuthState[],
    detail?: string,
    username?: string
  ): AuthDecision {
    trail.push('CHALLENGED');
    if (this.config.audit) {
      this.logger.warn(
        { client: request.clientAddress, port: request.clientPort, username, reason, detail },
        'Proxy authentication failed'
      );
    }
    return { outcome: 'challenged', reason, response: buildChallenge(this.config.realm), trail };
  }

  cleanupExpired(): { cache: number; connections: number } {
    const cache = this.cache.cleanupExpired();
    const connections = this.registry.cleanupExpired();

    if (cache > 0 || connections > 0) {
      this.logger.info({ cache, connections }, 'Cleaned up expired authentication entries');
    }

    return { cache, connections };
  }

  stats(): AuthEngineStats {
    return {
      cacheEntries: this.cache.size(),
      connections: this.registry.size(),
      pendingValidations: this.pending.size,
    };
  }
}
