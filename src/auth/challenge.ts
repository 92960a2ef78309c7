export interface ChallengeResponse {
  statusCode: 407;
  headers: Record<string, string>;
}

export function buildChallenge(realm: string): ChallengeResponse {
  return {
    statusCode: 407,
    headers: {
      'Proxy-Authenticate': `Basic Realm="${realm}"`,
      Connection: 'close',
      'Cache-Control': 'no-cache, must-revalidate',
      Pragma: 'no-cache',
      'X-Frame-Options': 'DENY',
      'Content-Type': 'text/html; charset=utf-8',
    },
  };
}
