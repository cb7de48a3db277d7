/**
 * Shared auth types.
 */

/**
 * A validated access token. Only produced by a {@link TokenVerifier} or an OAuth token
 * exchange.
 */
export interface AccessToken {
  token: string;
  clientId: string;
  /** Deduplicated. */
  scopes: string[];
  /** Epoch seconds. */
  expiresAt?: number;
  resource?: string;
}

/**
 * Resolves a bearer token to an {@link AccessToken}.
 *
 * Returns `null` when the token is not valid. Throws only for transport failures
 * (`ConnectionError`, `TimeoutError`).
 */
export interface TokenVerifier {
  verifyToken(token: string): Promise<AccessToken | null>;
}

export function toScopeList(scope: unknown): string[] {
  if (typeof scope === 'string') {
    return [...new Set(scope.split(/\s+/).filter(Boolean))];
  }
  if (Array.isArray(scope)) {
    return [...new Set(scope.filter((entry): entry is string => typeof entry === 'string' && entry.length > 0))];
  }
  return [];
}

export function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
