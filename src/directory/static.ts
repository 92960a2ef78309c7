import { createHash, timingSafeEqual } from 'crypto';
import type { DirectoryValidator, StaticUser, ValidatorOutcome, ValidationRequest } from './types.js';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Timing-safe string comparison (digests have equal length)
 */
function safeCompare(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

/**
 * In-process validator over a fixed user list, for development setups without
 * a directory agent.
 */
export class StaticDirectoryValidator implements DirectoryValidator {
  readonly name = 'static';
  private users: Map<string, string>;

  constructor(users: StaticUser[]) {
    this.users = new Map(users.map((u) => [u.username, u.password]));
  }

  async validate(request: ValidationRequest): Promise<ValidatorOutcome> {
    const expected = this.users.get(request.username);
    if (expected === undefined) {
      return { kind: 'deny' };
    }
    return safeCompare(request.password, expected) ? { kind: 'allow' } : { kind: 'deny' };
  }
}
