/**
 * Capability Registry
 *
 * Owns the runtime side of every server in the shared {@link ServerDirectory}: one
 * {@link ClientManager} per entry (at most one live session) and a TTL-bound
 * {@link CapabilitySnapshot} of its tools, resources and prompts.
 *
 * Connection policy:
 * - `persistent` (default): operations reuse the entry's session until `disconnect`,
 *   `unregisterServer`, `stopServer` or `cleanup`.
 * - `ephemeral`: every operation connects, runs and disconnects through a
 *   {@link ClientExecutor}.
 *
 * All public operations return an {@link OperationResult}; nothing here throws SDK or
 * transport errors at callers. A failed discovery leaves the previous snapshot in place.
 */

import { OAuthClient } from '../auth/oauth-client.js';
import { loadServerDescriptors } from '../config/servers-file.js';
import type { ConnectionPolicy } from '../config/mesh-config.js';
import {
  isServerConfig,
  parseServerConfig,
  type Accessibility,
  type ServerConfig,
  type ServerConfigInput,
  type TransportKind,
} from '../directory/server-config.js';
import { ServerDirectory, type DirectoryFilters } from '../directory/server-directory.js';
import {
  operationSuccess,
  ServerNotFoundError,
  toErrorMessage,
  toOperationFailure,
  type OperationFailure,
  type OperationResult,
} from '../errors.js';
import { ClientExecutor } from '../mcp-client/client-executor.js';
import { ClientManager, type ConnectionCheck } from '../mcp-client/client-manager.js';
import { withDeadline } from '../mcp-client/deadline.js';
import type {
  McpSession,
  PromptInfo,
  PromptResult,
  ResourceContent,
  ResourceInfo,
  ToolContent,
  ToolInfo,
} from '../mcp-client/session.js';
import { createConnector, type ConnectorFactory } from '../mcp-client/transport-connector.js';
import type { ServerHost } from '../mcp-core/server-host.js';
import { logger } from '../observability/logger.js';
import { RegistryStore, type PersistedServer } from './registry-store.js';

export interface CapabilitySnapshot {
  tools: ToolInfo[];
  resources: ResourceInfo[];
  prompts: PromptInfo[];
  lastDiscovery: Date;
}

export interface ToolSearchHit extends ToolInfo {
  serverName: string;
  serverTransport: TransportKind;
}

export interface DiscoverySummary {
  capabilities: Record<string, CapabilitySnapshot>;
  discovered: string[];
  failed: string[];
  failures: Record<string, OperationFailure>;
}

export interface ServerListFilters extends DirectoryFilters {
  enabledOnly?: boolean;
  /** Matches servers carrying at least one of these tags. */
  tags?: string[];
}

/** First text block, else structured content, else the raw content blocks. */
export type ToolOutput = string | Record<string, unknown> | ToolContent;

export interface LoadSummary {
  registered: string[];
  skipped: string[];
}

export interface CapabilityRegistryOptions {
  directory?: ServerDirectory;
  serverHost?: ServerHost;
  cacheTtlSeconds?: number;
  discoveryTimeoutSeconds?: number;
  requestTimeoutSeconds?: number;
  connectionPolicy?: ConnectionPolicy;
  /** Persist configs and snapshots to this file. */
  registryFile?: string;
  store?: RegistryStore;
  oauthClient?: OAuthClient;
  /** Replaces the default transport selection; tests plug fakes in here. */
  connectorFactory?: ConnectorFactory;
  now?: () => Date;
}

interface RegistryEntry {
  config: ServerConfig;
  client: ClientManager;
  executor: ClientExecutor;
  capabilities?: CapabilitySnapshot;
}

export class CapabilityRegistry {
  readonly directory: ServerDirectory;
  readonly connectionPolicy: ConnectionPolicy;
  private readonly serverHost?: ServerHost;
  private readonly store?: RegistryStore;
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly connectorFactory: ConnectorFactory;
  private readonly cacheTtlMs: number;
  private readonly discoveryTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly now: () => Date;

  constructor(options: CapabilityRegistryOptions = {}) {
    this.directory = options.directory ?? new ServerDirectory();
    this.serverHost = options.serverHost;
    this.connectionPolicy = options.connectionPolicy ?? 'persistent';
    this.cacheTtlMs = (options.cacheTtlSeconds ?? 300) * 1000;
    this.discoveryTimeoutMs = (options.discoveryTimeoutSeconds ?? 30) * 1000;
    this.requestTimeoutMs = (options.requestTimeoutSeconds ?? 30) * 1000;
    this.store = options.store ?? (options.registryFile ? new RegistryStore(options.registryFile) : undefined);
    this.now = options.now ?? (() => new Date());

    const oauthClient = options.oauthClient;
    const requestTimeoutMs = this.requestTimeoutMs;
    this.connectorFactory = options.connectorFactory ?? (config => createConnector(config, { oauthClient, requestTimeoutMs }));
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  async registerServer(input: ServerConfig | ServerConfigInput): Promise<OperationResult<ServerConfig>> {
    const name = input.name;
    let config: ServerConfig;
    try {
      config = isServerConfig(input) ? input : parseServerConfig(input);
    } catch (error) {
      logger.error('Failed to register server', { name, error: toErrorMessage(error) });
      return toOperationFailure(error, name);
    }

    this.directory.register(config);
    await this.persist();
    return operationSuccess(config.name, config);
  }

  async unregisterServer(name: string): Promise<boolean> {
    const entry = this.entries.get(name);
    this.entries.delete(name);
    const removed = this.directory.remove(name);
    if (!removed) {
      logger.warn('Server not found in registry', { name });
    }
    if (entry) {
      await entry.client.disconnect();
    }
    if (removed) {
      await this.persist();
    }
    return removed;
  }

  getServer(name: string): ServerConfig | undefined {
    return this.directory.get(name);
  }

  listServers(filters: ServerListFilters = {}): ServerConfig[] {
    const tags = filters.tags ?? [];
    return this.directory
      .list(filters)
      .filter(config => !filters.enabledOnly || config.enabled)
      .filter(config => tags.length === 0 || config.tags.some(tag => tags.includes(tag)));
  }

  /**
   * Register every valid descriptor from a YAML/JSON file.
   */
  async registerServersFromConfig(filePath: string): Promise<LoadSummary> {
    const { configs, rejected } = await loadServerDescriptors(filePath);
    const registered: string[] = [];
    for (const config of configs) {
      this.directory.register(config);
      registered.push(config.name);
    }
    await this.persist();
    return { registered, skipped: rejected };
  }

  /**
   * The stateful client for a server, created on demand.
   *
   * @throws {ServerNotFoundError} when the server is not registered
   */
  getClient(name: string): ClientManager {
    return this.entryFor(name).client;
  }

  // ---------------------------------------------------------------------------
  // Discovery
  // ---------------------------------------------------------------------------

  async discoverCapabilities(name: string, forceRefresh = false): Promise<OperationResult<CapabilitySnapshot>> {
    let entry: RegistryEntry;
    try {
      entry = this.entryFor(name);
    } catch (error) {
      logger.warn('Cannot discover capabilities', { name, error: toErrorMessage(error) });
      return toOperationFailure(error, name);
    }
    if (!entry.config.enabled) {
      return { status: 'error', serverName: name, message: `Server '${name}' is disabled`, errorCode: 'SERVER_DISABLED' };
    }

    if (!forceRefresh && entry.capabilities && this.isFresh(entry.capabilities)) {
      logger.debug('Using cached capabilities', { name });
      return operationSuccess(name, entry.capabilities);
    }

    try {
      if (forceRefresh && this.connectionPolicy === 'persistent') {
        await entry.client.disconnect();
      }
      logger.info('Discovering capabilities', { name });
      const snapshot = await this.useSession(
        entry,
        'Capability discovery',
        async (session, signal) => ({
          tools: await session.listTools({ signal }),
          resources: await session.listResources({ signal }),
          prompts: await session.listPrompts({ signal }),
          lastDiscovery: this.now(),
        }),
        this.discoveryTimeoutMs,
      );
      if (this.entries.get(name) === entry) {
        entry.capabilities = snapshot;
      }
      logger.info('Discovered capabilities', {
        name,
        tools: snapshot.tools.length,
        resources: snapshot.resources.length,
        prompts: snapshot.prompts.length,
      });
      await this.persist();
      return operationSuccess(name, snapshot);
    } catch (error) {
      logger.error('Capability discovery failed', { name, error: toErrorMessage(error) });
      return toOperationFailure(error, name);
    }
  }

  /**
   * Discover every enabled server concurrently. One server's failure never affects the
   * others.
   */
  async discoverAllCapabilities(forceRefresh = false): Promise<DiscoverySummary> {
    const names = this.listServers({ enabledOnly: true }).map(config => config.name);
    const summary: DiscoverySummary = { capabilities: {}, discovered: [], failed: [], failures: {} };
    if (names.length === 0) {
      logger.info('No enabled servers to discover');
      return summary;
    }

    const results = await Promise.allSettled(names.map(name => this.discoverCapabilities(name, forceRefresh)));
    results.forEach((settled, index) => {
      const name = names[index];
      const result: OperationResult<CapabilitySnapshot> =
        settled.status === 'fulfilled' ? settled.value : toOperationFailure(settled.reason, name);
      if (result.status === 'success') {
        summary.capabilities[name] = result.data;
        summary.discovered.push(name);
      } else {
        summary.failures[name] = result;
        summary.failed.push(name);
      }
    });

    logger.info('Capability discovery finished', { discovered: summary.discovered.length, failed: summary.failed.length });
    return summary;
  }

  /**
   * Tools per enabled server. The `external` view hides internal-only servers and the
   * `internal` view hides external-only ones. Servers that fail discovery list no tools.
   */
  async discoverTools(accessibilityFilter?: Accessibility): Promise<Record<string, ToolInfo[]>> {
    const servers = this.listServers({ enabledOnly: true }).filter(config => {
      if (accessibilityFilter === 'external') {
        return config.accessibility !== 'internal';
      }
      if (accessibilityFilter === 'internal') {
        return config.accessibility !== 'external';
      }
      return true;
    });

    const results = await Promise.all(servers.map(config => this.discoverCapabilities(config.name)));
    const tools: Record<string, ToolInfo[]> = {};
    results.forEach((result, index) => {
      tools[servers[index].name] = result.status === 'success' ? result.data.tools : [];
    });
    return tools;
  }

  /**
   * Case-insensitive substring search over cached tool names and descriptions.
   */
  searchTools(query: string): ToolSearchHit[] {
    const needle = query.toLowerCase();
    const hits: ToolSearchHit[] = [];
    for (const config of this.listServers({ enabledOnly: true })) {
      const entry = this.entries.get(config.name);
      if (!entry?.capabilities || entry.config !== config) {
        continue;
      }
      for (const tool of entry.capabilities.tools) {
        const haystack = `${tool.name}\n${tool.description ?? ''}`.toLowerCase();
        if (haystack.includes(needle)) {
          hits.push({ ...tool, serverName: config.name, serverTransport: config.transport });
        }
      }
    }
    return hits;
  }

  getCachedCapabilities(name: string): CapabilitySnapshot | undefined {
    const entry = this.entries.get(name);
    return entry && entry.config === this.directory.get(name) ? entry.capabilities : undefined;
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  async invokeTool(serverName: string, toolName: string, args: Record<string, unknown> = {}): Promise<OperationResult<ToolOutput>> {
    return this.operate(serverName, `Tool '${toolName}'`, async (session, signal) => {
      const result = await session.invokeTool(toolName, args, { signal });
      if (result.isError) {
        return {
          status: 'error',
          serverName,
          message: result.text ?? `Tool '${toolName}' reported an error`,
          errorCode: 'TOOL_ERROR',
        };
      }
      const output: ToolOutput = result.text ?? result.structuredContent ?? result.content;
      return operationSuccess(serverName, output);
    });
  }

  async listResources(serverName: string): Promise<OperationResult<ResourceInfo[]>> {
    return this.operate(serverName, 'resources/list', async (session, signal) =>
      operationSuccess(serverName, await session.listResources({ signal })),
    );
  }

  async readResource(serverName: string, uri: string): Promise<OperationResult<ResourceContent[]>> {
    return this.operate(serverName, `Resource '${uri}'`, async (session, signal) =>
      operationSuccess(serverName, await session.readResource(uri, { signal })),
    );
  }

  async listPrompts(serverName: string): Promise<OperationResult<PromptInfo[]>> {
    return this.operate(serverName, 'prompts/list', async (session, signal) =>
      operationSuccess(serverName, await session.listPrompts({ signal })),
    );
  }

  async getPrompt(serverName: string, promptName: string, args: Record<string, string> = {}): Promise<OperationResult<PromptResult>> {
    return this.operate(serverName, `Prompt '${promptName}'`, async (session, signal) =>
      operationSuccess(serverName, await session.getPrompt(promptName, args, { signal })),
    );
  }

  async testConnection(serverName: string): Promise<OperationResult<ConnectionCheck>> {
    return this.operate(serverName, 'Connection test', async (session, signal) =>
      operationSuccess(serverName, { toolCount: (await session.listTools({ signal })).length }),
    );
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Stop a hosted listener (if this registry's host runs one), disconnect the client
   * and drop the entry.
   */
  async stopServer(name: string): Promise<boolean> {
    const entry = this.entries.get(name);
    this.entries.delete(name);
    if (entry) {
      await entry.client.disconnect();
    }
    let stopped = false;
    if (this.serverHost?.get(name)) {
      stopped = await this.serverHost.stop(name);
    }
    const removed = this.directory.remove(name);
    if (removed) {
      await this.persist();
    }
    return stopped || removed || entry !== undefined;
  }

  /**
   * Disconnect every client and stop every hosted server.
   */
  async cleanup(): Promise<void> {
    const entries = [...this.entries.values()];
    this.entries.clear();
    const results = await Promise.allSettled(entries.map(entry => entry.client.disconnect()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.error('Failed to disconnect client', { name: entries[index].config.name, error: toErrorMessage(result.reason) });
      }
    });
    if (this.serverHost) {
      await this.serverHost.stopAll();
    }
    await this.store?.flush();
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  /**
   * Restore persisted servers and their capability snapshots.
   */
  async load(): Promise<LoadSummary> {
    const summary: LoadSummary = { registered: [], skipped: [] };
    if (!this.store) {
      return summary;
    }
    for (const record of await this.store.load()) {
      const { lastDiscovery, capabilities, ...descriptor } = record;
      let config: ServerConfig;
      try {
        config = parseServerConfig(descriptor);
      } catch (error) {
        logger.warn('Skipping persisted server', { name: record.name, error: toErrorMessage(error) });
        summary.skipped.push(record.name);
        continue;
      }
      this.directory.register(config);
      if (capabilities && lastDiscovery) {
        const entry = this.entryFor(config.name);
        entry.capabilities = { ...capabilities, lastDiscovery: new Date(lastDiscovery) };
      }
      summary.registered.push(config.name);
    }
    return summary;
  }

  /**
   * Write the current (non-ephemeral) servers to the registry file. Failures are logged,
   * not thrown.
   */
  async save(): Promise<void> {
    if (!this.store) {
      return;
    }
    // Snapshot synchronously; the write happens later.
    const records = this.toRecords();
    try {
      await this.store.save(records);
    } catch (error) {
      logger.error('Registry save failed', { filePath: this.store.filePath, error: toErrorMessage(error) });
    }
  }

  private persist(): Promise<void> {
    return this.save();
  }

  private toRecords(): PersistedServer[] {
    return this.directory
      .list()
      .filter(config => !config.ephemeral)
      .map(config => {
        const snapshot = this.getCachedCapabilities(config.name);
        return {
          name: config.name,
          transport: config.transport,
          enabled: config.enabled,
          command: config.command,
          args: config.args.length > 0 ? [...config.args] : undefined,
          url: config.url,
          lastDiscovery: snapshot?.lastDiscovery.toISOString(),
          capabilities: snapshot
            ? { tools: snapshot.tools, resources: snapshot.resources, prompts: snapshot.prompts }
            : undefined,
          description: config.description,
          tags: config.tags.length > 0 ? [...config.tags] : undefined,
          accessibility: config.accessibility,
          hosting: config.hosting,
        };
      });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * The runtime entry for a directory config. An entry whose config was replaced in the
   * directory is discarded (its session closed, its snapshot dropped).
   */
  private entryFor(name: string): RegistryEntry {
    const config = this.directory.get(name);
    const existing = this.entries.get(name);
    if (existing && existing.config === config) {
      return existing;
    }
    if (existing) {
      this.entries.delete(name);
      this.discard(existing);
    }
    if (!config) {
      throw new ServerNotFoundError(name);
    }

    const connector = this.connectorFactory(config);
    const entry: RegistryEntry = {
      config,
      client: new ClientManager(config, connector, { connectTimeoutMs: this.requestTimeoutMs }),
      executor: new ClientExecutor(connector, this.requestTimeoutMs),
    };
    this.entries.set(name, entry);
    return entry;
  }

  private discard(entry: RegistryEntry): void {
    entry.client.disconnect().catch((error: unknown) => {
      logger.warn('Failed to close replaced client', { name: entry.config.name, error: toErrorMessage(error) });
    });
  }

  private isFresh(snapshot: CapabilitySnapshot): boolean {
    return this.now().getTime() - snapshot.lastDiscovery.getTime() < this.cacheTtlMs;
  }

  private useSession<T>(
    entry: RegistryEntry,
    operation: string,
    work: (session: McpSession, signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
  ): Promise<T> {
    if (this.connectionPolicy === 'ephemeral') {
      return entry.executor.run(operation, work, timeoutMs);
    }
    return withDeadline(timeoutMs, `${operation} on '${entry.config.name}'`, signal =>
      entry.client.withSession(session => work(session, signal)),
    );
  }

  private async operate<T>(
    serverName: string,
    operation: string,
    work: (session: McpSession, signal: AbortSignal) => Promise<OperationResult<T>>,
  ): Promise<OperationResult<T>> {
    try {
      const entry = this.entryFor(serverName);
      if (!entry.config.enabled) {
        return { status: 'error', serverName, message: `Server '${serverName}' is disabled`, errorCode: 'SERVER_DISABLED' };
      }
      return await this.useSession(entry, operation, work, this.requestTimeoutMs);
    } catch (error) {
      logger.error('MCP operation failed', { server: serverName, operation, error: toErrorMessage(error) });
      return toOperationFailure(error, serverName);
    }
  }
}
