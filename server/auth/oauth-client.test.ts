/**
 * OAuth client tests. Authorization server endpoints are served by a routing fetch mock;
 * the redirect and the callback are stubbed.
 */

import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { OAuthFlowError } from '../errors.js';
import type { AuthorizationCallback, CallbackReceiver } from './loopback-callback.js';
import { buildRegistrationRequest, OAuthClient, wellKnownUrl } from './oauth-client.js';
import { generateCodeChallenge } from './pkce.js';
import { MemoryTokenStorage } from './token-storage.js';

const RESOURCE = 'https://mcp.example.com/mcp';
const AUTH_SERVER = 'https://auth.example.com';
const REDIRECT_URI = 'http://127.0.0.1:8765/callback';
const RESOURCE_METADATA_URL = 'https://mcp.example.com/.well-known/oauth-protected-resource/mcp';
const AS_METADATA_URL = 'https://auth.example.com/.well-known/oauth-authorization-server';
const OIDC_METADATA_URL = 'https://auth.example.com/.well-known/openid-configuration';

type Route = () => Response;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') {
    return input;
  }
  return input instanceof URL ? input.href : input.url;
}

describe('OAuthClient', () => {
  const originalFetch = global.fetch;
  const fetchMock = jest.fn<typeof fetch>();
  let routes: Map<string, Route>;

  const asMetadata = {
    issuer: AUTH_SERVER,
    authorization_endpoint: `${AUTH_SERVER}/authorize`,
    token_endpoint: `${AUTH_SERVER}/token`,
    registration_endpoint: `${AUTH_SERVER}/register`,
    response_types_supported: ['code'],
  };

  function callsTo(url: string): Array<RequestInit | undefined> {
    return fetchMock.mock.calls.filter(([input]) => urlOf(input) === url).map(([, init]) => init);
  }

  function formOf(init: RequestInit | undefined): URLSearchParams {
    return new URLSearchParams(typeof init?.body === 'string' ? init.body : '');
  }

  beforeEach(() => {
    routes = new Map<string, Route>([
      [RESOURCE_METADATA_URL, () => json({ resource: RESOURCE, authorization_servers: [AUTH_SERVER] })],
      [AS_METADATA_URL, () => json(asMetadata)],
      [`${AUTH_SERVER}/register`, () => json({ client_id: 'registered-client' }, 201)],
      [
        `${AUTH_SERVER}/token`,
        () => json({ access_token: 'access-1', token_type: 'Bearer', expires_in: 3600, refresh_token: 'refresh-1' }),
      ],
    ]);
    fetchMock.mockReset();
    fetchMock.mockImplementation(async input => {
      const route = routes.get(urlOf(input));
      return route ? route() : new Response('not found', { status: 404 });
    });
    global.fetch = fetchMock;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  describe('wellKnownUrl', () => {
    it('inserts the well-known segment between origin and path', () => {
      expect(wellKnownUrl('https://mcp.example.com/mcp/', 'oauth-protected-resource')).toBe(RESOURCE_METADATA_URL);
      expect(wellKnownUrl(AUTH_SERVER, 'oauth-authorization-server')).toBe(AS_METADATA_URL);
    });
  });

  describe('discoverAuthorization', () => {
    it('reports an unprotected resource on 404', async () => {
      routes.delete(RESOURCE_METADATA_URL);
      const client = new OAuthClient();

      await expect(client.discoverAuthorization(`${RESOURCE}/`)).resolves.toEqual({ protected: false, resource: RESOURCE });
    });

    it('resolves the authorization server metadata', async () => {
      const client = new OAuthClient();

      const discovery = await client.discoverAuthorization(RESOURCE);

      expect(discovery).toMatchObject({
        protected: true,
        resource: RESOURCE,
        authorizationServer: AUTH_SERVER,
        metadata: { token_endpoint: `${AUTH_SERVER}/token` },
      });
    });

    it('falls back to OpenID configuration', async () => {
      routes.delete(AS_METADATA_URL);
      routes.set(OIDC_METADATA_URL, () => json(asMetadata));
      const client = new OAuthClient();

      const discovery = await client.discoverAuthorization(RESOURCE);

      expect(discovery.protected).toBe(true);
      expect(callsTo(OIDC_METADATA_URL)).toHaveLength(1);
    });

    it('fails when no authorization server is named', async () => {
      routes.set(RESOURCE_METADATA_URL, () => json({ resource: RESOURCE }));
      const client = new OAuthClient();

      await expect(client.discoverAuthorization(RESOURCE)).rejects.toThrow(
        `Protected resource ${RESOURCE} does not name an authorization server`,
      );
    });

    it('turns network failures into OAuthFlowError', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
      const client = new OAuthClient();

      const result = client.discoverAuthorization(RESOURCE);

      await expect(result).rejects.toBeInstanceOf(OAuthFlowError);
      await expect(result).rejects.toThrow('Protected resource metadata failed: fetch failed');
    });
  });

  describe('registerClient', () => {
    it('posts a native client registration', async () => {
      const client = new OAuthClient({ redirectUri: REDIRECT_URI, clientName: 'Test Client' });

      const info = await client.registerClient(`${AUTH_SERVER}/register`);

      expect(info.client_id).toBe('registered-client');
      const [init] = callsTo(`${AUTH_SERVER}/register`);
      expect(JSON.parse(typeof init?.body === 'string' ? init.body : '{}')).toEqual(
        buildRegistrationRequest(REDIRECT_URI, 'Test Client'),
      );
    });
  });

  describe('authorizationFlow', () => {
    let redirects: URL[];

    function receiverAnswering(answer: (state: string) => AuthorizationCallback): CallbackReceiver {
      return async ({ state }) => answer(state);
    }

    beforeEach(() => {
      redirects = [];
    });

    it('runs PKCE against the discovered server and stores the tokens', async () => {
      const storage = new MemoryTokenStorage();
      const client = new OAuthClient({
        redirectUri: REDIRECT_URI,
        storage,
        redirectHandler: url => {
          redirects.push(url);
        },
        callbackReceiver: receiverAnswering(state => ({ code: 'auth-code', state })),
      });

      const stored = await client.authorizationFlow(RESOURCE, ['tools:read', 'tools:write']);

      expect(stored).toMatchObject({ accessToken: 'access-1', refreshToken: 'refresh-1', expiresIn: 3600 });
      await expect(storage.get(RESOURCE)).resolves.toEqual(stored);

      const authorizationUrl = redirects[0];
      expect(authorizationUrl.origin + authorizationUrl.pathname).toBe(`${AUTH_SERVER}/authorize`);
      expect(authorizationUrl.searchParams.get('response_type')).toBe('code');
      expect(authorizationUrl.searchParams.get('client_id')).toBe('registered-client');
      expect(authorizationUrl.searchParams.get('redirect_uri')).toBe(REDIRECT_URI);
      expect(authorizationUrl.searchParams.get('code_challenge_method')).toBe('S256');
      expect(authorizationUrl.searchParams.get('resource')).toBe(RESOURCE);
      expect(authorizationUrl.searchParams.get('scope')).toBe('tools:read tools:write');

      const tokenForm = formOf(callsTo(`${AUTH_SERVER}/token`)[0]);
      expect(tokenForm.get('grant_type')).toBe('authorization_code');
      expect(tokenForm.get('code')).toBe('auth-code');
      expect(tokenForm.get('resource')).toBe(RESOURCE);
      expect(tokenForm.get('client_id')).toBe('registered-client');
      expect(generateCodeChallenge(tokenForm.get('code_verifier') ?? '')).toBe(authorizationUrl.searchParams.get('code_challenge'));
    });

    it('uses a configured client instead of registering', async () => {
      const client = new OAuthClient({
        clientId: 'static-client',
        clientSecret: 'test-secret',
        redirectHandler: () => undefined,
        callbackReceiver: receiverAnswering(state => ({ code: 'auth-code', state })),
      });

      await client.authorizationFlow(RESOURCE);

      expect(callsTo(`${AUTH_SERVER}/register`)).toHaveLength(0);
      const [init] = callsTo(`${AUTH_SERVER}/token`);
      expect(init?.headers).toMatchObject({
        Authorization: `Basic ${Buffer.from('static-client:test-secret').toString('base64')}`,
      });
      expect(formOf(init).has('client_id')).toBe(false);
    });

    it('rejects a callback with a different state', async () => {
      const client = new OAuthClient({
        redirectHandler: () => undefined,
        callbackReceiver: receiverAnswering(() => ({ code: 'auth-code', state: 'forged' })),
      });

      await expect(client.authorizationFlow(RESOURCE)).rejects.toThrow('Authorization callback state does not match the request');
      expect(callsTo(`${AUTH_SERVER}/token`)).toHaveLength(0);
    });

    it('surfaces an authorization error from the callback', async () => {
      const client = new OAuthClient({
        redirectHandler: () => undefined,
        callbackReceiver: receiverAnswering(state => ({ state, error: 'access_denied', errorDescription: 'user said no' })),
      });

      await expect(client.authorizationFlow(RESOURCE)).rejects.toThrow('Authorization denied: user said no');
    });

    it('refuses to run against an unprotected resource', async () => {
      routes.delete(RESOURCE_METADATA_URL);
      const client = new OAuthClient({ redirectHandler: () => undefined, callbackReceiver: receiverAnswering(state => ({ state })) });

      await expect(client.authorizationFlow(RESOURCE)).rejects.toThrow(`Resource ${RESOURCE} does not require authorization`);
    });
  });

  describe('refreshToken', () => {
    it('keeps the previous refresh token when the server does not rotate it', async () => {
      routes.set(`${AUTH_SERVER}/token`, () => json({ access_token: 'access-2', token_type: 'Bearer', expires_in: 3600 }));
      const client = new OAuthClient({ clientId: 'static-client', clientSecret: 'test-secret' });

      const refreshed = await client.refreshToken(RESOURCE, 'refresh-old');

      expect(refreshed).toMatchObject({ accessToken: 'access-2', refreshToken: 'refresh-old' });
      const form = formOf(callsTo(`${AUTH_SERVER}/token`)[0]);
      expect(form.get('grant_type')).toBe('refresh_token');
      expect(form.get('refresh_token')).toBe('refresh-old');
      expect(form.get('resource')).toBe(RESOURCE);
    });
  });

  describe('getAccessToken', () => {
    it('returns a cached token without any request', async () => {
      const storage = new MemoryTokenStorage();
      await storage.store(RESOURCE, { accessToken: 'cached', tokenType: 'Bearer', expiresIn: 3600 });
      const client = new OAuthClient({ storage });

      await expect(client.getAccessToken(RESOURCE)).resolves.toBe('cached');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('refreshes an expired token', async () => {
      routes.set(`${AUTH_SERVER}/token`, () => json({ access_token: 'access-2', token_type: 'Bearer', expires_in: 3600 }));
      const storage = new MemoryTokenStorage();
      await storage.store(RESOURCE, { accessToken: 'stale', tokenType: 'Bearer', refreshToken: 'refresh-old', issuedAt: 1, expiresAt: 2 });
      const client = new OAuthClient({ storage, clientId: 'static-client' });

      await expect(client.getAccessToken(RESOURCE)).resolves.toBe('access-2');
      await expect(storage.get(RESOURCE)).resolves.toMatchObject({ accessToken: 'access-2', refreshToken: 'refresh-old' });
    });

    it('falls back to the full flow when the refresh is rejected', async () => {
      let tokenCalls = 0;
      routes.set(`${AUTH_SERVER}/token`, () => {
        tokenCalls += 1;
        return tokenCalls === 1
          ? json({ error: 'invalid_grant' }, 400)
          : json({ access_token: 'access-3', token_type: 'Bearer', expires_in: 3600 });
      });
      const storage = new MemoryTokenStorage();
      await storage.store(RESOURCE, { accessToken: 'stale', tokenType: 'Bearer', refreshToken: 'revoked', issuedAt: 1, expiresAt: 2 });
      const client = new OAuthClient({
        storage,
        clientId: 'static-client',
        redirectHandler: () => undefined,
        callbackReceiver: async ({ state }) => ({ code: 'auth-code', state }),
      });

      await expect(client.getAccessToken(RESOURCE)).resolves.toBe('access-3');
      expect(tokenCalls).toBe(2);
    });

    it('caches under the requested URL when the metadata names a parent resource', async () => {
      routes.set(RESOURCE_METADATA_URL, () => json({ resource: 'https://mcp.example.com', authorization_servers: [AUTH_SERVER] }));
      const storage = new MemoryTokenStorage();
      let callbacks = 0;
      const client = new OAuthClient({
        storage,
        clientId: 'static-client',
        redirectHandler: () => undefined,
        callbackReceiver: async ({ state }) => {
          callbacks += 1;
          return { code: 'auth-code', state };
        },
      });

      await expect(client.getAccessToken(RESOURCE)).resolves.toBe('access-1');
      await expect(client.getAccessToken(RESOURCE)).resolves.toBe('access-1');
      await expect(client.getAccessToken(`${RESOURCE}/`)).resolves.toBe('access-1');

      expect(callbacks).toBe(1);
      await expect(storage.get(RESOURCE)).resolves.toMatchObject({ accessToken: 'access-1' });
      expect(formOf(callsTo(`${AUTH_SERVER}/token`)[0]).get('resource')).toBe('https://mcp.example.com');
    });

    it('refreshes under the requested URL when the metadata names a parent resource', async () => {
      routes.set(RESOURCE_METADATA_URL, () => json({ resource: 'https://mcp.example.com', authorization_servers: [AUTH_SERVER] }));
      routes.set(`${AUTH_SERVER}/token`, () => json({ access_token: 'access-2', token_type: 'Bearer', expires_in: 3600 }));
      const storage = new MemoryTokenStorage();
      await storage.store(RESOURCE, { accessToken: 'stale', tokenType: 'Bearer', refreshToken: 'refresh-old', issuedAt: 1, expiresAt: 2 });
      const client = new OAuthClient({ storage, clientId: 'static-client' });

      await expect(client.getAccessToken(RESOURCE)).resolves.toBe('access-2');
      await expect(client.getAccessToken(RESOURCE)).resolves.toBe('access-2');

      expect(callsTo(`${AUTH_SERVER}/token`)).toHaveLength(1);
      await expect(storage.get('https://mcp.example.com')).resolves.toBeNull();
    });
  });
});
