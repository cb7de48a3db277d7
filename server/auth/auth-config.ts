/**
 * `authConfig` map parsing.
 *
 * Server descriptors carry auth settings as a snake_case map. Server side, the keys
 * configure a {@link TokenVerifier}. Client side, they configure how a bearer token is
 * obtained for outbound requests.
 *
 * Recognized keys:
 * - `token_verifier`: `"introspection"` | `"jwt"` (inferred from the other keys when absent)
 * - `introspection_endpoint`, `client_id`, `client_secret`
 * - `jwks_uri` or inline `jwks` (a key set or a single key), `issuer_url`, `audience`, `algorithms`
 * - `required_scopes`, `validate_resource`
 * - `discover_auth`, `scopes`: run OAuth discovery and request these scopes (client side)
 * - `bearer_token`: static token for outbound requests (client side)
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { IntrospectionTokenVerifier } from './introspection-verifier.js';
import { JwksInputSchema, JwtTokenVerifier } from './jwt-verifier.js';
import type { TokenVerifier } from './types.js';

export const AuthConfigSchema = z
  .object({
    token_verifier: z.enum(['introspection', 'jwt']).optional(),
    introspection_endpoint: z.string().url().optional(),
    jwks_uri: z.string().url().optional(),
    jwks: JwksInputSchema.optional(),
    issuer_url: z.string().url().optional(),
    audience: z.union([z.string(), z.array(z.string())]).optional(),
    algorithms: z.array(z.string()).optional(),
    required_scopes: z.array(z.string()).default([]),
    validate_resource: z.boolean().default(false),
    client_id: z.string().min(1).optional(),
    client_secret: z.string().min(1).optional(),
    discover_auth: z.boolean().default(false),
    scopes: z.array(z.string()).default([]),
    bearer_token: z.string().min(1).optional(),
  })
  .strict()
  .transform(raw => ({
    tokenVerifier: raw.token_verifier,
    introspectionEndpoint: raw.introspection_endpoint,
    jwksUri: raw.jwks_uri,
    jwks: raw.jwks,
    issuerUrl: raw.issuer_url,
    audience: raw.audience,
    algorithms: raw.algorithms,
    requiredScopes: raw.required_scopes,
    validateResource: raw.validate_resource,
    clientId: raw.client_id,
    clientSecret: raw.client_secret,
    discoverAuth: raw.discover_auth,
    scopes: raw.scopes,
    bearerToken: raw.bearer_token,
  }));

export type AuthConfigInput = z.input<typeof AuthConfigSchema>;
export type AuthSettings = z.output<typeof AuthConfigSchema>;

export function parseAuthConfig(input: unknown): AuthSettings {
  const result = AuthConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid auth config: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * True when the settings describe how to verify inbound tokens.
 */
export function hasVerifierSettings(settings: AuthSettings): boolean {
  return Boolean(settings.tokenVerifier || settings.introspectionEndpoint || settings.jwksUri || settings.jwks);
}

/**
 * Build the verifier a hosted server uses to protect `resourceUrl`.
 *
 * @throws {ConfigurationError} when the settings do not describe a usable verifier
 */
export function createTokenVerifier(settings: AuthSettings, resourceUrl?: string): TokenVerifier {
  const strategy = settings.tokenVerifier ?? (settings.introspectionEndpoint ? 'introspection' : 'jwt');

  if (strategy === 'introspection') {
    if (!settings.introspectionEndpoint) {
      throw new ConfigurationError("token_verifier 'introspection' requires introspection_endpoint");
    }
    return new IntrospectionTokenVerifier({
      introspectionEndpoint: settings.introspectionEndpoint,
      clientId: settings.clientId,
      clientSecret: settings.clientSecret,
      resourceUrl,
      validateResource: settings.validateResource,
    });
  }

  if (!settings.jwksUri && !settings.jwks) {
    throw new ConfigurationError("token_verifier 'jwt' requires jwks_uri or jwks");
  }
  return new JwtTokenVerifier({
    jwks: settings.jwks,
    jwksUri: settings.jwksUri,
    issuer: settings.issuerUrl,
    audience: settings.audience,
    algorithms: settings.algorithms,
    resourceUrl,
    validateResource: settings.validateResource,
  });
}
