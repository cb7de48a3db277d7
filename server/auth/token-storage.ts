/**
 * Client-side token storage, keyed by (normalized) resource URL.
 */

import { normalizeResourceUrl } from './resource-url.js';
import { nowInSeconds } from './types.js';

/** Seconds before the real expiry at which a token is already treated as expired. */
export const EXPIRY_BUFFER_SECONDS = 60;

export interface OAuthTokenSet {
  accessToken: string;
  tokenType: string;
  refreshToken?: string;
  scope?: string;
  /** Lifetime in seconds, as returned by the token endpoint. */
  expiresIn?: number;
}

export interface StoredToken extends OAuthTokenSet {
  /** Epoch seconds. */
  issuedAt: number;
  /** Epoch seconds. */
  expiresAt?: number;
}

export interface TokenStorage {
  get(resourceUrl: string): Promise<StoredToken | null>;
  store(resourceUrl: string, tokens: OAuthTokenSet | StoredToken): Promise<StoredToken>;
  remove(resourceUrl: string): Promise<void>;
}

function hasExpiry(tokens: OAuthTokenSet | StoredToken): tokens is StoredToken {
  return 'expiresAt' in tokens && typeof tokens.expiresAt === 'number';
}

/**
 * Stamp `issuedAt` and derive `expiresAt` from `expiresIn` when it is not already known.
 */
export function stampToken(tokens: OAuthTokenSet | StoredToken, now: number = nowInSeconds()): StoredToken {
  const issuedAt = 'issuedAt' in tokens && typeof tokens.issuedAt === 'number' ? tokens.issuedAt : now;
  let expiresAt: number | undefined;
  if (hasExpiry(tokens)) {
    expiresAt = tokens.expiresAt;
  } else if (tokens.expiresIn !== undefined) {
    expiresAt = issuedAt + tokens.expiresIn;
  }
  return { ...tokens, issuedAt, expiresAt };
}

/**
 * A token is expired once `now` passes `expiresAt - 60s`. Tokens with no expiry
 * information count as expired so that callers refresh them.
 */
export function isTokenExpired(token: Pick<StoredToken, 'expiresAt'>, now: number = nowInSeconds()): boolean {
  if (token.expiresAt === undefined) {
    return true;
  }
  return now > token.expiresAt - EXPIRY_BUFFER_SECONDS;
}

export class MemoryTokenStorage implements TokenStorage {
  private readonly tokens = new Map<string, StoredToken>();

  async get(resourceUrl: string): Promise<StoredToken | null> {
    return this.tokens.get(normalizeResourceUrl(resourceUrl)) ?? null;
  }

  async store(resourceUrl: string, tokens: OAuthTokenSet | StoredToken): Promise<StoredToken> {
    const stored = stampToken(tokens);
    this.tokens.set(normalizeResourceUrl(resourceUrl), stored);
    return stored;
  }

  async remove(resourceUrl: string): Promise<void> {
    this.tokens.delete(normalizeResourceUrl(resourceUrl));
  }
}
