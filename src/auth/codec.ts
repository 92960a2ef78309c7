const BASIC_PREFIX = 'Basic ';
// Trailing padding is optional; a lone leftover character is never valid
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}(?:==)?|[A-Za-z0-9+/]{3}=?)?$/;

export type DecodeError = 'bad_scheme' | 'bad_base64' | 'missing_separator';

export type DecodeResult =
  | { ok: true; username: string; password: string }
  | { ok: false; error: DecodeError };

/**
 * Return the raw (still encoded) token of a Basic header, or undefined when the
 * header is absent or uses another scheme.
 */
export function extractBasicToken(header: string | undefined): string | undefined {
  if (!header || !header.startsWith(BASIC_PREFIX)) {
    return undefined;
  }
  return header.slice(BASIC_PREFIX.length);
}

export function decodeBasicCredential(header: string): DecodeResult {
  const token = extractBasicToken(header);
  if (token === undefined) {
    return { ok: false, error: 'bad_scheme' };
  }
  return decodeBasicToken(token);
}

/**
 * Decode the token part of a Basic header (the text after "Basic ").
 */
export function decodeBasicToken(token: string): DecodeResult {
  if (token.length === 0 || !BASE64_PATTERN.test(token)) {
    return { ok: false, error: 'bad_base64' };
  }

  const decoded = Buffer.from(token, 'base64').toString('utf-8');

  // Passwords may contain colons, usernames may not
  const separator = decoded.indexOf(':');
  if (separator === -1) {
    return { ok: false, error: 'missing_separator' };
  }

  return {
    ok: true,
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}

export function encodeBasicCredential(username: string, password: string): string {
  return BASIC_PREFIX + Buffer.from(`${username}:${password}`, 'utf-8').toString('base64');
}
