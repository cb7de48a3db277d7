export * from './errors.js';
export { getMeshConfig, parseMeshConfig, resetMeshConfig, type ConnectionPolicy, type MeshConfig } from './config/mesh-config.js';
export { loadServerDescriptors, parseServerDescriptors, type LoadedDescriptors } from './config/servers-file.js';

export {
  createServerConfig,
  parseServerConfig,
  type Accessibility,
  type Hosting,
  type ServerConfig,
  type ServerConfigInput,
  type TransportKind,
} from './directory/server-config.js';
export { ServerDirectory, type DirectoryFilters } from './directory/server-directory.js';

export { ClientExecutor } from './mcp-client/client-executor.js';
export { ClientManager, type ConnectionCheck } from './mcp-client/client-manager.js';
export { withDeadline } from './mcp-client/deadline.js';
export type {
  McpSession,
  PromptInfo,
  PromptResult,
  ResourceContent,
  ResourceInfo,
  ToolInfo,
  ToolInvocation,
} from './mcp-client/session.js';
export {
  createConnector,
  toTransportSpec,
  type ConnectorFactory,
  type TransportConnector,
  type TransportSpec,
} from './mcp-client/transport-connector.js';

export {
  CapabilityRegistry,
  type CapabilityRegistryOptions,
  type CapabilitySnapshot,
  type DiscoverySummary,
  type ServerListFilters,
  type ToolOutput,
  type ToolSearchHit,
} from './registry/capability-registry.js';
export { RegistryStore } from './registry/registry-store.js';

export {
  createToolServer,
  type HostedPrompt,
  type HostedResource,
  type HostedTool,
  type PromptArgsShape,
  type ToolServerOptions,
} from './mcp-core/server-factory.js';
export { ServerHost, type HostedServerHandle, type HostFunctionOptions, type StopAllResult } from './mcp-core/server-host.js';
export { requireBearerToken } from './mcp-core/bearer-auth.js';

export { createTokenVerifier, parseAuthConfig, type AuthConfigInput, type AuthSettings } from './auth/auth-config.js';
export { EncryptedTokenStorage } from './auth/encrypted-token-storage.js';
export { IntrospectionTokenVerifier } from './auth/introspection-verifier.js';
export { JwtTokenVerifier } from './auth/jwt-verifier.js';
export { createLoopbackCallbackReceiver, type CallbackReceiver } from './auth/loopback-callback.js';
export { OAuthClient, type AuthorizationDiscovery, type RedirectHandler } from './auth/oauth-client.js';
export { generateCodeChallenge, generateCodeVerifier, generateState } from './auth/pkce.js';
export { isSecureEndpoint, normalizeResourceUrl, resourceMatches } from './auth/resource-url.js';
export { BearerTokenProvider } from './auth/token-provider.js';
export { isTokenExpired, MemoryTokenStorage, type StoredToken, type TokenStorage } from './auth/token-storage.js';
export type { AccessToken, TokenVerifier } from './auth/types.js';
export { validateMcpToken } from './auth/validate-token.js';

export {
  createPlatformRegistry,
  PlatformRegistry,
  type HostedContent,
  type PlatformRegistryOptions,
} from './platform/platform-registry.js';
export { logger } from './observability/logger.js';
