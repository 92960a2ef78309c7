import type { Logger } from 'pino';
import type { DirectoryValidator, ValidationRequest, ValidatorOutcome } from './types.js';

/**
 * Validates credentials against a directory agent exposed over HTTP. The agent
 * receives the credential pair and the validation profile as JSON and answers
 * with a status code: 2xx accepts, 401/403 rejects, anything else is
 * inconclusive.
 */
export class HttpDirectoryValidator implements DirectoryValidator {
  readonly name = 'http';
  private url: string;
  private logger: Logger;

  constructor(url: string, logger: Logger) {
    this.url = url;
    this.logger = logger;
  }

  async validate(request: ValidationRequest, signal: AbortSignal): Promise<ValidatorOutcome> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({
          username: request.username,
          password: request.password,
          profile: request.profile,
        }),
        signal,
      });
    } catch (err) {
      if (signal.aborted) {
        return { kind: 'indeterminate', reason: 'timeout' };
      }
      this.logger.error({ err, profile: request.profile }, 'Directory agent unreachable');
      return { kind: 'indeterminate', reason: 'transport_error' };
    }

    if (response.ok) {
      return { kind: 'allow' };
    }

    if (response.status === 401 || response.status === 403) {
      return { kind: 'deny' };
    }

    this.logger.warn(
      { status: response.status, profile: request.profile },
      'Directory agent returned an unexpected status'
    );
    return { kind: 'indeterminate', reason: `http_${response.status}` };
  }
}
