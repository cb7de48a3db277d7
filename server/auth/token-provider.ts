/**
 * Client-side bearer token provider.
 *
 * The SDK's HTTP transports ask an `OAuthClientProvider` for tokens on every outbound
 * request. {@link BearerTokenProvider} answers from an async token source, so a token
 * obtained or refreshed after the transport was created is still picked up.
 *
 * Interactive authorization is owned by {@link OAuthClient}; the SDK-driven redirect
 * path is not used and fails with `OAuthFlowError`.
 */

import type { OAuthClientProvider } from '@modelcontextprotocol/sdk/client/auth.js';
import type { OAuthClientMetadata, OAuthTokens } from '@modelcontextprotocol/sdk/shared/auth.js';
import { DEFAULT_REDIRECT_URI } from '../config/mesh-config.js';
import { OAuthFlowError } from '../errors.js';
import { logger } from '../observability/logger.js';
import type { AuthSettings } from './auth-config.js';
import type { OAuthClient } from './oauth-client.js';

export type AccessTokenSource = () => Promise<string | undefined>;

export class BearerTokenProvider implements OAuthClientProvider {
  constructor(
    private readonly source: AccessTokenSource,
    private readonly redirectUri: string = DEFAULT_REDIRECT_URI,
  ) {}

  get redirectUrl(): string {
    return this.redirectUri;
  }

  get clientMetadata(): OAuthClientMetadata {
    return {
      client_name: 'MCP Client',
      redirect_uris: [this.redirectUri],
      grant_types: ['authorization_code', 'refresh_token'],
      response_types: ['code'],
    };
  }

  clientInformation(): undefined {
    return undefined;
  }

  async tokens(): Promise<OAuthTokens | undefined> {
    const accessToken = await this.source();
    return accessToken ? { access_token: accessToken, token_type: 'Bearer' } : undefined;
  }

  saveTokens(): void {
    logger.debug('Ignoring tokens saved through the transport; OAuthClient owns token storage');
  }

  redirectToAuthorization(authorizationUrl: URL): void {
    throw new OAuthFlowError(`Server requested interactive authorization at ${authorizationUrl.origin}; obtain a token with OAuthClient first`);
  }

  saveCodeVerifier(): void {
    throw new OAuthFlowError('Transport-driven authorization is not supported');
  }

  codeVerifier(): string {
    throw new OAuthFlowError('Transport-driven authorization is not supported');
  }
}

export interface TokenSourceContext {
  /** Resource the token is for (the server URL). */
  resourceUrl: string;
  /** Shared client used when the settings ask for OAuth discovery. */
  oauthClient?: OAuthClient;
}

/**
 * Pick the token source described by a server's auth settings, if any.
 */
export function createTokenSource(settings: AuthSettings | undefined, context: TokenSourceContext): AccessTokenSource | undefined {
  if (!settings) {
    return undefined;
  }
  const bearerToken = settings.bearerToken;
  if (bearerToken) {
    return async () => bearerToken;
  }
  const oauthClient = context.oauthClient;
  if (settings.discoverAuth && oauthClient) {
    return () => oauthClient.getAccessToken(context.resourceUrl, settings.scopes);
  }
  if (settings.discoverAuth) {
    logger.warn('discover_auth is set but no OAuth client is configured', { resource: context.resourceUrl });
  }
  return undefined;
}
