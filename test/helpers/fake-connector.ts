/**
 * In-process stand-ins for transport connectors and MCP sessions.
 *
 * A FakeConnector hands out FakeSessions over a shared {@link FakeServerState}, so tests
 * can change what the "server" advertises between connects and count connects and closes.
 */

import type { ServerConfig, TransportKind } from '../../server/directory/server-config.js';
import type {
  McpSession,
  PromptInfo,
  PromptResult,
  ResourceContent,
  ResourceInfo,
  ToolInfo,
  ToolInvocation,
} from '../../server/mcp-client/session.js';
import type { ConnectOptions, ConnectorFactory, TransportConnector } from '../../server/mcp-client/transport-connector.js';

export interface FakeServerState {
  tools: ToolInfo[];
  resources: ResourceInfo[];
  prompts: PromptInfo[];
  /** Handler for tools/call; echoes the arguments as JSON text by default. */
  callTool?: (name: string, args: Record<string, unknown>) => ToolInvocation;
  /** Every connect rejects with this error while set. */
  connectError?: Error;
  connectDelayMs?: number;
  connects: number;
  closes: number;
}

export function createServerState(overrides: Partial<FakeServerState> = {}): FakeServerState {
  return { tools: [], resources: [], prompts: [], connects: 0, closes: 0, ...overrides };
}

export function tool(name: string, description?: string): ToolInfo {
  return { name, description, inputSchema: { type: 'object' } };
}

export function textResult(text: string, isError = false): ToolInvocation {
  return { isError, content: [{ type: 'text', text }], text };
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true },
    );
  });
}

export class FakeSession implements McpSession {
  closed = false;

  constructor(
    readonly serverName: string,
    private readonly state: FakeServerState,
  ) {}

  async listTools(): Promise<ToolInfo[]> {
    return [...this.state.tools];
  }

  async invokeTool(name: string, args: Record<string, unknown> = {}): Promise<ToolInvocation> {
    if (this.state.callTool) {
      return this.state.callTool(name, args);
    }
    return textResult(JSON.stringify(args));
  }

  async listResources(): Promise<ResourceInfo[]> {
    return [...this.state.resources];
  }

  async readResource(uri: string): Promise<ResourceContent[]> {
    return [{ uri, mimeType: 'text/plain', text: `contents of ${uri}` }];
  }

  async listPrompts(): Promise<PromptInfo[]> {
    return [...this.state.prompts];
  }

  async getPrompt(name: string, args: Record<string, string> = {}): Promise<PromptResult> {
    return {
      description: name,
      messages: [{ role: 'user', content: { type: 'text', text: `${name}: ${JSON.stringify(args)}` } }],
    };
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.state.closes += 1;
    }
  }
}

export class FakeConnector implements TransportConnector {
  readonly sessions: FakeSession[] = [];

  constructor(
    readonly serverName: string,
    readonly state: FakeServerState,
    readonly kind: TransportKind = 'streamable',
  ) {}

  async connect(options: ConnectOptions = {}): Promise<McpSession> {
    this.state.connects += 1;
    if (this.state.connectDelayMs) {
      await wait(this.state.connectDelayMs, options.signal);
    }
    if (this.state.connectError) {
      throw this.state.connectError;
    }
    const session = new FakeSession(this.serverName, this.state);
    this.sessions.push(session);
    return session;
  }
}

/**
 * Connector factory serving one {@link FakeServerState} per server name. Unknown names
 * get an empty server.
 */
export function createFakeConnectorFactory(states: Record<string, FakeServerState>): ConnectorFactory {
  return (config: ServerConfig) => {
    states[config.name] ??= createServerState();
    return new FakeConnector(config.name, states[config.name], config.transport);
  };
}
