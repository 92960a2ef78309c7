export interface ValidationRequest {
  username: string;
  password: string;
  profile: string;
}

export type ValidatorOutcome =
  | { kind: 'allow' }
  | { kind: 'deny' }
  | { kind: 'indeterminate'; reason: string };

/**
 * Adapter to the system of record for usernames and passwords. Implementations
 * should stop work when `signal` aborts; the session deadline is enforced by
 * the caller either way.
 */
export interface DirectoryValidator {
  readonly name: string;
  validate(request: ValidationRequest, signal: AbortSignal): Promise<ValidatorOutcome>;
}

export interface StaticUser {
  username: string;
  password: string;
}
