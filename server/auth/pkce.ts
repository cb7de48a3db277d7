import { createHash, randomBytes } from 'node:crypto';

// === PKCE Helper Functions (RFC 7636) ===

/**
 * Generate a random code verifier for PKCE
 * @returns Base64URL-encoded random string (43 characters)
 */
export function generateCodeVerifier(): string {
  return randomBytes(32).toString('base64url');
}

/**
 * Generate an S256 code challenge from a code verifier
 * @param codeVerifier - The code verifier to hash
 * @returns Base64URL-encoded code challenge
 */
export function generateCodeChallenge(codeVerifier: string): string {
  return createHash('sha256').update(codeVerifier).digest('base64url');
}

/**
 * Opaque value echoed back on the authorization callback.
 */
export function generateState(): string {
  return randomBytes(16).toString('hex');
}
