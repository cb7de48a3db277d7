import { TokenValidationError } from '../errors.js';
import { nowInSeconds, type AccessToken, type TokenVerifier } from './types.js';

/**
 * Strip an optional `Bearer ` prefix from an Authorization header value.
 */
export function extractBearerToken(headerOrToken: string): string {
  return headerOrToken.replace(/^Bearer\s+/i, '').trim();
}

/**
 * Verify a bearer token and enforce expiry and required scopes.
 *
 * @throws {TokenValidationError} when the token is invalid, expired, or lacks a scope
 */
export async function validateMcpToken(
  headerOrToken: string,
  verifier: TokenVerifier,
  requiredScopes: readonly string[] = [],
): Promise<AccessToken> {
  const token = extractBearerToken(headerOrToken);
  if (!token) {
    throw new TokenValidationError('invalid', 'Missing bearer token');
  }

  const accessToken = await verifier.verifyToken(token);
  if (!accessToken) {
    throw new TokenValidationError('invalid', 'Invalid or inactive token');
  }

  if (accessToken.expiresAt !== undefined && accessToken.expiresAt < nowInSeconds()) {
    throw new TokenValidationError('expired', 'Token has expired');
  }

  const missing = requiredScopes.filter(scope => !accessToken.scopes.includes(scope)).sort();
  if (missing.length > 0) {
    throw new TokenValidationError('insufficient_scope', `Missing required scopes: ${missing.join(', ')}`);
  }

  return accessToken;
}
