import type { ChallengeResponse } from './challenge.js';

export interface AuthEngineConfig {
  realm: string;
  cacheTtlSeconds: number;
  validationTimeoutMs: number;
  profile: string;
  audit: boolean;
}

export type AuthState =
  | 'NO_HEADER'
  | 'HEADER_PRESENT'
  | 'CACHE_HIT'
  | 'CACHE_MISS'
  | 'DECODING'
  | 'VALIDATING'
  | 'ALLOWED'
  | 'CHALLENGED';

export interface AuthRequest {
  clientAddress: string;
  clientPort?: number;
  proxyAuthorization: string | undefined;
}

export type AllowReason = 'cached' | 'validated';

export type ChallengeReason =
  | 'missing_header'
  | 'decode_error'
  | 'validator_deny'
  | 'validator_indeterminate';

export type AuthDecision =
  | { outcome: 'allowed'; reason: AllowReason; username?: string; trail: AuthState[] }
  | {
      outcome: 'challenged';
      reason: ChallengeReason;
      response: ChallengeResponse;
      trail: AuthState[];
    };

export interface CacheEntry {
  expiresAt: Date;
  username?: string;
}

export interface ConnectionRecord {
  username: string;
  expiresAt: Date;
}
