/**
 * Platform Registry
 *
 * Entry point for applications: one object wiring a shared {@link ServerDirectory}, a
 * {@link ServerHost} for locally hosted tools and a {@link CapabilityRegistry} for
 * discovery and invocation. Construct it explicitly; there is no global instance.
 *
 * @example
 * const platform = createPlatformRegistry();
 * await platform.registerPlatformTool('echo', {
 *   inputSchema: { text: z.string() },
 *   handler: async ({ text }) => text,
 * }, { host: '127.0.0.1', port: 0 });
 * const result = await platform.invokeTool('echo', 'echo', { text: 'hi' });
 * await platform.cleanup();
 */

import type { AuthConfigInput } from '../auth/auth-config.js';
import { EncryptedTokenStorage } from '../auth/encrypted-token-storage.js';
import { OAuthClient } from '../auth/oauth-client.js';
import { MemoryTokenStorage } from '../auth/token-storage.js';
import { getMeshConfig, type MeshConfig } from '../config/mesh-config.js';
import type { ServerConfig } from '../directory/server-config.js';
import { ServerDirectory } from '../directory/server-directory.js';
import { operationSuccess, toErrorMessage, toOperationFailure, type OperationResult } from '../errors.js';
import type { ToolInfo } from '../mcp-client/session.js';
import type { ConnectorFactory } from '../mcp-client/transport-connector.js';
import type { HostedPrompt, HostedResource, HostedTool } from '../mcp-core/server-factory.js';
import { ServerHost, type HostedServerHandle } from '../mcp-core/server-host.js';
import { logger, setLogLevel } from '../observability/logger.js';
import {
  CapabilityRegistry,
  type ServerListFilters,
  type ToolOutput,
} from '../registry/capability-registry.js';

export type ExternalTransport = 'sse' | 'streamable';

export interface ListenConfig {
  host?: string;
  /** Alias of `host`. */
  ip?: string;
  port: number;
}

/** Resources and prompts served beside a platform tool. */
export interface HostedContent {
  resources?: readonly HostedResource[];
  prompts?: readonly HostedPrompt[];
}

export interface PlatformRegistryOptions {
  /** Overrides values read from the environment. */
  config?: Partial<MeshConfig>;
  directory?: ServerDirectory;
  oauthClient?: OAuthClient;
  connectorFactory?: ConnectorFactory;
  now?: () => Date;
}

export interface HostedServerStatus {
  name: string;
  url: string;
  running: boolean;
}

function createOAuthClient(config: MeshConfig): OAuthClient {
  const storage = config.tokenEncryptionKey && config.registryFile
    ? new EncryptedTokenStorage({ filePath: `${config.registryFile}.tokens`, secret: config.tokenEncryptionKey })
    : new MemoryTokenStorage();
  return new OAuthClient({ redirectUri: config.oauthRedirectUri, storage });
}

export class PlatformRegistry {
  readonly directory: ServerDirectory;
  readonly serverHost: ServerHost;
  readonly registry: CapabilityRegistry;

  constructor(options: PlatformRegistryOptions = {}) {
    const config: MeshConfig = { ...getMeshConfig(), ...options.config };
    setLogLevel(config.logLevel);
    this.directory = options.directory ?? new ServerDirectory();
    this.serverHost = new ServerHost({
      directory: this.directory,
      shutdownGraceMs: config.shutdownGraceMs,
      defaultHost: config.defaultHost,
    });
    this.registry = new CapabilityRegistry({
      directory: this.directory,
      serverHost: this.serverHost,
      cacheTtlSeconds: config.cacheTtlSeconds,
      discoveryTimeoutSeconds: config.discoveryTimeoutSeconds,
      requestTimeoutSeconds: config.requestTimeoutSeconds,
      connectionPolicy: config.connectionPolicy,
      registryFile: config.registryFile,
      oauthClient: options.oauthClient ?? createOAuthClient(config),
      connectorFactory: options.connectorFactory,
      now: options.now,
    });
  }

  /**
   * Host `tool` right away as an internal, local server.
   */
  async registerPlatformTool(
    name: string,
    tool: HostedTool,
    listen: ListenConfig,
    description?: string,
    authConfig?: AuthConfigInput,
    content: HostedContent = {},
  ): Promise<OperationResult<HostedServerHandle>> {
    try {
      const handle = await this.serverHost.hostFunction(name, tool, {
        host: listen.host ?? listen.ip,
        port: listen.port,
        description,
        authConfig,
        resources: content.resources,
        prompts: content.prompts,
      });
      return operationSuccess(name, handle);
    } catch (error) {
      logger.error('Failed to register platform tool', { name, error: toErrorMessage(error) });
      return toOperationFailure(error, name);
    }
  }

  /**
   * Register an external, remote server. Nothing is hosted or contacted.
   */
  registerExternalServer(
    name: string,
    url: string,
    transport: ExternalTransport = 'sse',
    headers?: Record<string, string>,
    authConfig?: AuthConfigInput,
  ): Promise<OperationResult<ServerConfig>> {
    return this.registry.registerServer({
      name,
      accessibility: 'external',
      hosting: 'remote',
      transport,
      url,
      headers,
      authConfig,
    });
  }

  discoverAllTools(forceRefresh = false): Promise<Record<string, ToolInfo[]>> {
    if (forceRefresh) {
      return this.registry.discoverAllCapabilities(true).then(() => this.registry.discoverTools());
    }
    return this.registry.discoverTools();
  }

  invokeTool(serverName: string, toolName: string, args: Record<string, unknown> = {}): Promise<OperationResult<ToolOutput>> {
    return this.registry.invokeTool(serverName, toolName, args);
  }

  listServers(filters: ServerListFilters = {}): ServerConfig[] {
    return this.registry.listServers(filters);
  }

  /**
   * Hosted servers start when they are registered; this reports which of the local,
   * hosted entries in the directory are running.
   */
  startAllServers(): HostedServerStatus[] {
    return this.directory.list({ hosting: 'local', transport: 'streamable' }).flatMap(config => {
      const handle = this.serverHost.get(config.name);
      if (!handle && !config.ephemeral) {
        return [];
      }
      return [{ name: config.name, url: handle?.url ?? config.url ?? '', running: handle !== undefined }];
    });
  }

  async stopServer(name: string): Promise<boolean> {
    return this.registry.stopServer(name);
  }

  async cleanup(): Promise<void> {
    await this.registry.cleanup();
    logger.info('Platform registry cleaned up');
  }
}

export function createPlatformRegistry(options: PlatformRegistryOptions = {}): PlatformRegistry {
  return new PlatformRegistry(options);
}
