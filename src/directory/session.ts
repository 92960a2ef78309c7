import type { DirectoryValidator, ValidationRequest, ValidatorOutcome } from './types.js';

export class SessionTimeoutError extends Error {
  constructor(lifetimeMs: number) {
    super(`Validation session exceeded its ${lifetimeMs}ms lifetime`);
    this.name = 'SessionTimeoutError';
  }
}

/**
 * Bounded-lifetime handle for one validator call. The session aborts its
 * signal when the deadline passes or when it is released, whichever is first.
 */
export class ValidationSession {
  private controller: AbortController;
  private timer: NodeJS.Timeout;
  private released = false;
  readonly expired: Promise<ValidatorOutcome>;

  constructor(lifetimeMs: number) {
    if (!Number.isFinite(lifetimeMs) || lifetimeMs <= 0) {
      throw new RangeError(`Invalid validation session lifetime: ${lifetimeMs}`);
    }
    this.controller = new AbortController();

    let onExpire: (outcome: ValidatorOutcome) => void = () => undefined;
    this.expired = new Promise((resolve) => {
      onExpire = resolve;
    });

    this.timer = setTimeout(() => {
      this.controller.abort(new SessionTimeoutError(lifetimeMs));
      onExpire({ kind: 'indeterminate', reason: 'timeout' });
    }, lifetimeMs);
    this.timer.unref();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isReleased(): boolean {
    return this.released;
  }

  get timedOut(): boolean {
    return this.controller.signal.reason instanceof SessionTimeoutError;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    clearTimeout(this.timer);
    if (!this.controller.signal.aborted) {
      this.controller.abort(new Error('Validation session released'));
    }
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run one validator call inside a session that lives at most `lifetimeMs`.
 * Every failure (timeout, throw, malformed input) maps to `indeterminate`, and
 * the session is released on every path.
 */
export async function validateWithSession(
  validator: DirectoryValidator,
  request: ValidationRequest,
  lifetimeMs: number,
  onSession?: (session: ValidationSession) => void
): Promise<ValidatorOutcome> {
  if (request.username.length === 0) {
    return { kind: 'indeterminate', reason: 'malformed_input' };
  }

  let session: ValidationSession;
  try {
    session = new ValidationSession(lifetimeMs);
  } catch (err) {
    return { kind: 'indeterminate', reason: `session_error: ${describeError(err)}` };
  }
  onSession?.(session);

  try {
    return await Promise.race([validator.validate(request, session.signal), session.expired]);
  } catch (err) {
    if (session.timedOut) {
      return { kind: 'indeterminate', reason: 'timeout' };
    }
    return { kind: 'indeterminate', reason: describeError(err) };
  } finally {
    session.release();
  }
}
