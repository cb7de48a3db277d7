/**
 * Token Introspection Verifier (RFC 7662)
 *
 * Validates opaque bearer tokens by asking the authorization server about them.
 * When resource validation is enabled, the `aud` (or `resource`) claim of the
 * introspection response must hierarchically match the protected resource URL.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { logger } from '../observability/logger.js';
import { basicAuthorization, DEFAULT_HTTP_TIMEOUT_MS, fetchWithTimeout, readJsonBody } from '../utils/http.js';
import { audienceMatches, isSecureEndpoint, normalizeResourceUrl } from './resource-url.js';
import { toScopeList, type AccessToken, type TokenVerifier } from './types.js';

const IntrospectionResponseSchema = z
  .object({
    active: z.boolean(),
    client_id: z.string().optional(),
    scope: z.string().optional(),
    exp: z.number().optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
    resource: z.string().optional(),
  })
  .passthrough();

export interface IntrospectionVerifierOptions {
  introspectionEndpoint: string;
  clientId?: string;
  clientSecret?: string;
  /** Protected resource this server represents. Required when `validateResource` is set. */
  resourceUrl?: string;
  validateResource?: boolean;
  timeoutMs?: number;
}

export class IntrospectionTokenVerifier implements TokenVerifier {
  private readonly endpoint: string;
  private readonly resourceUrl?: string;

  constructor(private readonly options: IntrospectionVerifierOptions) {
    if (!isSecureEndpoint(options.introspectionEndpoint)) {
      throw new ConfigurationError(
        `Introspection endpoint must use HTTPS or a loopback address: ${options.introspectionEndpoint}`,
      );
    }
    if (options.validateResource && !options.resourceUrl) {
      throw new ConfigurationError('Resource validation requires a resource URL');
    }
    this.endpoint = options.introspectionEndpoint;
    this.resourceUrl = options.resourceUrl ? normalizeResourceUrl(options.resourceUrl) : undefined;
  }

  async verifyToken(token: string): Promise<AccessToken | null> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    };
    if (this.options.clientId && this.options.clientSecret) {
      headers.Authorization = basicAuthorization(this.options.clientId, this.options.clientSecret);
    }

    const response = await fetchWithTimeout(
      this.endpoint,
      { method: 'POST', headers, body: new URLSearchParams({ token }).toString() },
      this.options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS,
      'Token introspection',
    );

    if (response.status !== 200) {
      logger.warn('Token introspection returned non-200 status', { status: response.status });
      return null;
    }

    const parsed = IntrospectionResponseSchema.safeParse(await readJsonBody(response));
    if (!parsed.success) {
      logger.warn('Token introspection returned an unrecognized body');
      return null;
    }

    const claims = parsed.data;
    if (!claims.active) {
      return null;
    }

    if (this.options.validateResource && this.resourceUrl) {
      const audience = claims.aud ?? claims.resource;
      if (!audienceMatches(audience, this.resourceUrl)) {
        logger.warn('Token audience does not match protected resource', {
          audience,
          resource: this.resourceUrl,
        });
        return null;
      }
    }

    return {
      token,
      clientId: claims.client_id ?? 'unknown',
      scopes: toScopeList(claims.scope),
      expiresAt: claims.exp,
      resource: this.resourceUrl ?? claims.resource,
    };
  }
}
