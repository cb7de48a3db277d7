/**
 * JWT Token Verifier
 *
 * Verifies self-contained JWT access tokens locally with `jose`. Keys come from an
 * inline JWKS or from a `jwksUri`, which is fetched at most once per cache TTL. When a
 * refetch fails, the previously fetched keys keep being used.
 *
 * Only asymmetric algorithms are accepted: RS256/384/512 and ES256/384/512.
 */

import { createLocalJWKSet, errors as joseErrors, jwtVerify, type JSONWebKeySet, type JWK, type JWTPayload } from 'jose';
import { z } from 'zod';
import { ConfigurationError, ConnectionError } from '../errors.js';
import { logger } from '../observability/logger.js';
import { DEFAULT_HTTP_TIMEOUT_MS, fetchWithTimeout, readJsonBody } from '../utils/http.js';
import { audienceMatches, isSecureEndpoint, normalizeResourceUrl } from './resource-url.js';
import { toScopeList, type AccessToken, type TokenVerifier } from './types.js';

export const SUPPORTED_ALGORITHMS = ['RS256', 'RS384', 'RS512', 'ES256', 'ES384', 'ES512'] as const;
export type SupportedAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

const DEFAULT_JWKS_CACHE_TTL_MS = 5 * 60 * 1000;

const JwkSchema = z.custom<JWK>(
  value => typeof value === 'object' && value !== null && 'kty' in value && typeof value.kty === 'string',
  { message: 'Expected a JSON Web Key with a kty member' },
);

export const JwksSchema = z.object({ keys: z.array(JwkSchema) });

/** A key set, or a single key wrapped into one. */
export const JwksInputSchema = z.union([JwksSchema, JwkSchema.transform(key => ({ keys: [key] }))]);

export interface JwtVerifierOptions {
  jwks?: JSONWebKeySet;
  jwksUri?: string;
  issuer?: string;
  audience?: string | string[];
  /** Protected resource URL; with `validateResource`, `aud` must hierarchically match it. */
  resourceUrl?: string;
  validateResource?: boolean;
  algorithms?: string[];
  jwksCacheTtlMs?: number;
  timeoutMs?: number;
}

interface CachedKeys {
  jwks: JSONWebKeySet;
  fetchedAt: number;
}

function isSupportedAlgorithm(algorithm: string): algorithm is SupportedAlgorithm {
  return SUPPORTED_ALGORITHMS.some(supported => supported === algorithm);
}

export class JwtTokenVerifier implements TokenVerifier {
  private readonly algorithms: SupportedAlgorithm[];
  private readonly resourceUrl?: string;
  private cachedKeys?: CachedKeys;
  /** Shared by concurrent verifications while the key set is being fetched. */
  private keysInFlight?: Promise<JSONWebKeySet>;

  constructor(private readonly options: JwtVerifierOptions) {
    if (!options.jwks && !options.jwksUri) {
      throw new ConfigurationError('JWT verification requires either inline JWKS or a jwks_uri');
    }
    if (options.jwksUri && !isSecureEndpoint(options.jwksUri)) {
      throw new ConfigurationError(`JWKS URI must use HTTPS or a loopback address: ${options.jwksUri}`);
    }
    if (options.validateResource && !options.resourceUrl) {
      throw new ConfigurationError('Resource validation requires a resource URL');
    }

    const requested = options.algorithms ?? [...SUPPORTED_ALGORITHMS];
    const algorithms: SupportedAlgorithm[] = [];
    for (const algorithm of requested) {
      if (!isSupportedAlgorithm(algorithm)) {
        throw new ConfigurationError(`Unsupported JWT algorithm '${algorithm}'`);
      }
      algorithms.push(algorithm);
    }
    this.algorithms = algorithms;
    this.resourceUrl = options.resourceUrl ? normalizeResourceUrl(options.resourceUrl) : undefined;
  }

  async verifyToken(token: string): Promise<AccessToken | null> {
    const keySet = createLocalJWKSet(await this.getKeySet());

    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, keySet, {
        algorithms: this.algorithms,
        issuer: this.options.issuer,
        audience: this.options.audience,
        requiredClaims: ['exp'],
      }));
    } catch (error) {
      if (error instanceof joseErrors.JOSEError) {
        logger.debug('JWT rejected', { code: error.code, reason: error.message });
        return null;
      }
      throw error;
    }

    if (this.options.validateResource && this.resourceUrl && !audienceMatches(payload.aud, this.resourceUrl)) {
      logger.warn('JWT audience does not match protected resource', {
        audience: payload.aud,
        resource: this.resourceUrl,
      });
      return null;
    }

    const scopes = payload.scope !== undefined ? toScopeList(payload.scope) : toScopeList(payload.scopes);

    return {
      token,
      clientId: clientIdFrom(payload),
      scopes,
      expiresAt: payload.exp,
      resource: this.resourceUrl ?? (typeof payload.aud === 'string' ? payload.aud : payload.aud?.[0]),
    };
  }

  private async getKeySet(): Promise<JSONWebKeySet> {
    if (this.options.jwks) {
      return this.options.jwks;
    }
    const ttl = this.options.jwksCacheTtlMs ?? DEFAULT_JWKS_CACHE_TTL_MS;
    if (this.cachedKeys && Date.now() - this.cachedKeys.fetchedAt < ttl) {
      return this.cachedKeys.jwks;
    }

    this.keysInFlight ??= this.refreshKeys().finally(() => {
      this.keysInFlight = undefined;
    });
    return this.keysInFlight;
  }

  private async refreshKeys(): Promise<JSONWebKeySet> {
    try {
      const jwks = await this.fetchKeys();
      this.cachedKeys = { jwks, fetchedAt: Date.now() };
      return jwks;
    } catch (error) {
      if (this.cachedKeys) {
        logger.warn('JWKS refresh failed, using previously fetched keys', {
          jwksUri: this.options.jwksUri,
          error: error instanceof Error ? error.message : String(error),
        });
        return this.cachedKeys.jwks;
      }
      throw error;
    }
  }

  private async fetchKeys(): Promise<JSONWebKeySet> {
    const jwksUri = this.options.jwksUri;
    if (!jwksUri) {
      throw new ConfigurationError('No jwks_uri configured');
    }
    const response = await fetchWithTimeout(
      jwksUri,
      { headers: { Accept: 'application/json' } },
      this.options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS,
      'JWKS fetch',
    );
    if (!response.ok) {
      throw new ConnectionError(`JWKS fetch failed with status ${response.status}`);
    }
    const parsed = JwksSchema.safeParse(await readJsonBody(response));
    if (!parsed.success) {
      throw new ConnectionError(`JWKS response from ${jwksUri} is not a key set`);
    }
    return parsed.data;
  }
}

function clientIdFrom(payload: JWTPayload): string {
  if (typeof payload.client_id === 'string') {
    return payload.client_id;
  }
  if (typeof payload.azp === 'string') {
    return payload.azp;
  }
  return 'unknown';
}
