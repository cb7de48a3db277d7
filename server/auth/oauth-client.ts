/**
 * OAuth 2.1 Client (consumer side)
 *
 * Obtains access tokens for protected MCP servers:
 *
 * 1. `discoverAuthorization()` - RFC 9728 protected resource metadata, then RFC 8414
 *    authorization server metadata. A 404 on the resource metadata means the server
 *    accepts unauthenticated requests.
 * 2. `registerClient()` - RFC 7591 dynamic registration when no client_id is configured.
 * 3. `authorizationFlow()` - authorization code + PKCE (S256) with an RFC 8707 `resource`
 *    parameter. The redirect and the callback are pluggable so the flow works without a
 *    browser.
 * 4. `refreshToken()` - refresh grant, also bound to the resource.
 *
 * `getAccessToken()` ties these together: cached token, then refresh, then the full flow.
 */

import {
  OAuthClientInformationSchema,
  OAuthMetadataSchema,
  OAuthProtectedResourceMetadataSchema,
  OAuthTokensSchema,
  type OAuthClientInformation,
  type OAuthMetadata,
  type OAuthProtectedResourceMetadata,
} from '@modelcontextprotocol/sdk/shared/auth.js';
import type { ZodTypeAny, z } from 'zod';
import { DEFAULT_REDIRECT_URI } from '../config/mesh-config.js';
import { ConnectionError, OAuthFlowError, TimeoutError, toErrorMessage } from '../errors.js';
import { describeToken, logger } from '../observability/logger.js';
import { basicAuthorization, DEFAULT_HTTP_TIMEOUT_MS, fetchWithTimeout, readJsonBody } from '../utils/http.js';
import { createLoopbackCallbackReceiver, type CallbackReceiver } from './loopback-callback.js';
import { generateCodeChallenge, generateCodeVerifier, generateState } from './pkce.js';
import { normalizeResourceUrl } from './resource-url.js';
import { isTokenExpired, MemoryTokenStorage, type OAuthTokenSet, type StoredToken, type TokenStorage } from './token-storage.js';

export type RedirectHandler = (authorizationUrl: URL) => void | Promise<void>;

export type AuthorizationDiscovery =
  | { protected: false; resource: string }
  | {
      protected: true;
      resource: string;
      authorizationServer: string;
      resourceMetadata: OAuthProtectedResourceMetadata;
      metadata: OAuthMetadata;
    };

type ProtectedDiscovery = Extract<AuthorizationDiscovery, { protected: true }>;

export interface OAuthClientOptions {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  clientName?: string;
  storage?: TokenStorage;
  redirectHandler?: RedirectHandler;
  callbackReceiver?: CallbackReceiver;
  timeoutMs?: number;
}

/** Registration body sent to RFC 7591 endpoints. */
export function buildRegistrationRequest(redirectUri: string, clientName: string): Record<string, unknown> {
  return {
    client_name: clientName,
    redirect_uris: [redirectUri],
    grant_types: ['authorization_code', 'refresh_token'],
    response_types: ['code'],
    token_endpoint_auth_method: 'client_secret_basic',
    application_type: 'native',
  };
}

/**
 * `/.well-known/{suffix}` inserted between the origin and the path (RFC 8414 / RFC 9728).
 */
export function wellKnownUrl(baseUrl: string, suffix: string): string {
  const url = new URL(baseUrl);
  const path = url.pathname.replace(/\/+$/, '');
  return `${url.origin}/.well-known/${suffix}${path}`;
}

function logRedirect(authorizationUrl: URL): void {
  logger.info('Open this URL to authorize access', { url: authorizationUrl.toString() });
}

export class OAuthClient {
  readonly storage: TokenStorage;
  private readonly redirectUri: string;
  private readonly clientName: string;
  private readonly redirectHandler: RedirectHandler;
  private readonly callbackReceiver: CallbackReceiver;
  private readonly timeoutMs: number;
  private clientInfo?: OAuthClientInformation;
  private readonly discoveries = new Map<string, ProtectedDiscovery>();

  constructor(options: OAuthClientOptions = {}) {
    this.storage = options.storage ?? new MemoryTokenStorage();
    this.redirectUri = options.redirectUri ?? DEFAULT_REDIRECT_URI;
    this.clientName = options.clientName ?? 'MCP Client';
    this.redirectHandler = options.redirectHandler ?? logRedirect;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.callbackReceiver = options.callbackReceiver ?? createLoopbackCallbackReceiver({ redirectUri: this.redirectUri });
    if (options.clientId) {
      this.clientInfo = { client_id: options.clientId, client_secret: options.clientSecret };
    }
  }

  /**
   * Discover how `resourceUrl` is protected.
   *
   * @throws {OAuthFlowError} when metadata cannot be fetched or names no authorization server
   */
  async discoverAuthorization(resourceUrl: string): Promise<AuthorizationDiscovery> {
    const resource = normalizeResourceUrl(resourceUrl);
    const metadataUrl = wellKnownUrl(resource, 'oauth-protected-resource');

    const response = await this.request(metadataUrl, { headers: { Accept: 'application/json' } }, 'Protected resource metadata');
    if (response.status === 404) {
      logger.info('Resource does not advertise OAuth protection', { resource });
      return { protected: false, resource };
    }
    if (!response.ok) {
      throw new OAuthFlowError(`Protected resource metadata request failed with status ${response.status}`);
    }
    const resourceMetadata = await this.parseBody(response, OAuthProtectedResourceMetadataSchema, 'protected resource metadata');

    const authorizationServer = resourceMetadata.authorization_servers?.[0];
    if (!authorizationServer) {
      throw new OAuthFlowError(`Protected resource ${resource} does not name an authorization server`);
    }

    const metadata = await this.fetchAuthorizationServerMetadata(authorizationServer);
    const discovery: ProtectedDiscovery = {
      protected: true,
      resource: resourceMetadata.resource ? normalizeResourceUrl(resourceMetadata.resource) : resource,
      authorizationServer,
      resourceMetadata,
      metadata,
    };
    this.discoveries.set(resource, discovery);
    return discovery;
  }

  /**
   * Dynamic client registration (RFC 7591). The result is reused for later flows.
   */
  async registerClient(registrationEndpoint: string): Promise<OAuthClientInformation> {
    const response = await this.request(
      registrationEndpoint,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify(buildRegistrationRequest(this.redirectUri, this.clientName)),
      },
      'Client registration',
    );
    if (!response.ok) {
      const detail = await response.text();
      throw new OAuthFlowError(`Client registration failed with status ${response.status}: ${detail}`);
    }
    const info = await this.parseBody(response, OAuthClientInformationSchema, 'client registration');
    this.clientInfo = info;
    logger.info('Registered OAuth client', { clientId: info.client_id });
    return info;
  }

  /**
   * Run the authorization code flow with PKCE and store the resulting tokens under
   * `resourceUrl`. The `resource` parameter sent to the authorization server is the one
   * the protected resource metadata names, which may be a parent of `resourceUrl`.
   */
  async authorizationFlow(resourceUrl: string, scopes: readonly string[] = []): Promise<StoredToken> {
    const requested = normalizeResourceUrl(resourceUrl);
    const discovery = await this.discoverAuthorization(requested);
    if (!discovery.protected) {
      throw new OAuthFlowError(`Resource ${discovery.resource} does not require authorization`);
    }

    const client = await this.ensureClient(discovery.metadata);
    const codeVerifier = generateCodeVerifier();
    const state = generateState();

    const authorizationUrl = new URL(discovery.metadata.authorization_endpoint);
    authorizationUrl.searchParams.set('response_type', 'code');
    authorizationUrl.searchParams.set('client_id', client.client_id);
    authorizationUrl.searchParams.set('redirect_uri', this.redirectUri);
    authorizationUrl.searchParams.set('code_challenge', generateCodeChallenge(codeVerifier));
    authorizationUrl.searchParams.set('code_challenge_method', 'S256');
    authorizationUrl.searchParams.set('state', state);
    authorizationUrl.searchParams.set('resource', discovery.resource);
    if (scopes.length > 0) {
      authorizationUrl.searchParams.set('scope', scopes.join(' '));
    }

    // The receiver is listening before the redirect is handed off.
    const controller = new AbortController();
    const [callback] = await Promise.all([
      this.callbackReceiver({ state, signal: controller.signal }),
      Promise.resolve(this.redirectHandler(authorizationUrl)),
    ]).finally(() => controller.abort());

    if (callback.error) {
      throw new OAuthFlowError(`Authorization denied: ${callback.errorDescription ?? callback.error}`);
    }
    if (callback.state !== state) {
      throw new OAuthFlowError('Authorization callback state does not match the request');
    }
    if (!callback.code) {
      throw new OAuthFlowError('Authorization callback did not include a code');
    }

    const tokens = await this.tokenRequest(
      discovery.metadata.token_endpoint,
      {
        grant_type: 'authorization_code',
        code: callback.code,
        redirect_uri: this.redirectUri,
        code_verifier: codeVerifier,
        resource: discovery.resource,
      },
      client,
    );
    logger.info('Authorization code exchanged', { resource: discovery.resource, token: describeToken(tokens.accessToken) });
    return this.storage.store(requested, tokens);
  }

  /**
   * Exchange a refresh token. The previous refresh token is kept when the server does not
   * rotate it.
   */
  async refreshToken(resourceUrl: string, refreshToken: string): Promise<StoredToken> {
    const resource = normalizeResourceUrl(resourceUrl);
    const discovery = this.discoveries.get(resource) ?? (await this.discoverAuthorization(resource));
    if (!discovery.protected) {
      throw new OAuthFlowError(`Resource ${resource} does not require authorization`);
    }
    const client = await this.ensureClient(discovery.metadata);

    const tokens = await this.tokenRequest(
      discovery.metadata.token_endpoint,
      { grant_type: 'refresh_token', refresh_token: refreshToken, resource: discovery.resource },
      client,
    );
    return this.storage.store(resource, { ...tokens, refreshToken: tokens.refreshToken ?? refreshToken });
  }

  /**
   * Cached valid token, else refresh, else the full authorization flow.
   */
  async getAccessToken(resourceUrl: string, scopes: readonly string[] = []): Promise<string> {
    const resource = normalizeResourceUrl(resourceUrl);
    const stored = await this.storage.get(resource);
    if (stored && !isTokenExpired(stored)) {
      return stored.accessToken;
    }

    if (stored?.refreshToken) {
      try {
        const refreshed = await this.refreshToken(resource, stored.refreshToken);
        return refreshed.accessToken;
      } catch (error) {
        logger.warn('Token refresh failed, starting a new authorization flow', {
          resource,
          error: toErrorMessage(error),
        });
      }
    }

    const fresh = await this.authorizationFlow(resource, scopes);
    return fresh.accessToken;
  }

  private async ensureClient(metadata: OAuthMetadata): Promise<OAuthClientInformation> {
    if (this.clientInfo) {
      return this.clientInfo;
    }
    if (!metadata.registration_endpoint) {
      throw new OAuthFlowError('No client_id configured and the authorization server does not support dynamic registration');
    }
    return this.registerClient(metadata.registration_endpoint);
  }

  private async fetchAuthorizationServerMetadata(issuer: string): Promise<OAuthMetadata> {
    const candidates = [wellKnownUrl(issuer, 'oauth-authorization-server'), wellKnownUrl(issuer, 'openid-configuration')];
    for (const candidate of candidates) {
      const response = await this.request(candidate, { headers: { Accept: 'application/json' } }, 'Authorization server metadata');
      if (response.status === 404) {
        continue;
      }
      if (!response.ok) {
        throw new OAuthFlowError(`Authorization server metadata request failed with status ${response.status}`);
      }
      return this.parseBody(response, OAuthMetadataSchema, 'authorization server metadata');
    }
    throw new OAuthFlowError(`Authorization server ${issuer} publishes no metadata`);
  }

  private async tokenRequest(
    tokenEndpoint: string,
    params: Record<string, string>,
    client: OAuthClientInformation,
  ): Promise<OAuthTokenSet> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    };
    const body = new URLSearchParams(params);
    if (client.client_secret) {
      headers.Authorization = basicAuthorization(client.client_id, client.client_secret);
    } else {
      body.set('client_id', client.client_id);
    }

    const response = await this.request(tokenEndpoint, { method: 'POST', headers, body: body.toString() }, 'Token request');
    if (!response.ok) {
      const detail = await response.text();
      throw new OAuthFlowError(`Token request (${params.grant_type}) failed with status ${response.status}: ${detail}`);
    }
    const tokens = await this.parseBody(response, OAuthTokensSchema, 'token response');
    return {
      accessToken: tokens.access_token,
      tokenType: tokens.token_type,
      refreshToken: tokens.refresh_token,
      scope: tokens.scope,
      expiresIn: tokens.expires_in,
    };
  }

  private async request(url: string, init: RequestInit, label: string): Promise<Response> {
    try {
      return await fetchWithTimeout(url, init, this.timeoutMs, label);
    } catch (error) {
      if (error instanceof ConnectionError) {
        throw new OAuthFlowError(error.message, { cause: error });
      }
      if (error instanceof TimeoutError) {
        throw error;
      }
      throw new OAuthFlowError(`${label} failed: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  private async parseBody<T extends ZodTypeAny>(response: Response, schema: T, label: string): Promise<z.output<T>> {
    const result = schema.safeParse(await readJsonBody(response));
    if (!result.success) {
      throw new OAuthFlowError(`Invalid ${label}: ${result.error.message}`);
    }
    return result.data;
  }
}
