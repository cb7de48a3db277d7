/**
 * Transport Connectors
 *
 * One connector per transport kind, selected once from a validated {@link ServerConfig}:
 *
 * - stdio: spawns `command args` and speaks MCP over its stdin/stdout
 * - sse: event stream (GET) plus POSTed messages
 * - streamable: streamable HTTP with a per-request timeout and a separate, longer bound
 *   on streamed responses (2x the request timeout unless configured)
 *
 * `connect()` is a scoped acquisition. It returns an initialized {@link McpSession}, or
 * it closes whatever it opened before rethrowing, whether the failure was a handshake
 * error, a timeout, or an abort. Connectors never retry.
 *
 * Bearer tokens for HTTP transports come from a token source wrapped in an
 * `OAuthClientProvider`. The SDK asks it for a token on every request.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { OAuthClient } from '../auth/oauth-client.js';
import { BearerTokenProvider, createTokenSource, type AccessTokenSource } from '../auth/token-provider.js';
import type { ServerConfig, TransportKind } from '../directory/server-config.js';
import { ConfigurationError } from '../errors.js';
import { logger } from '../observability/logger.js';
import { toConnectorError } from './connector-errors.js';
import { SdkMcpSession, type McpSession, type RequestTimeouts } from './session.js';

export const CLIENT_INFO = { name: 'mcp-switchboard-client', version: '0.1.0' };
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface StdioSpec {
  kind: 'stdio';
  command: string;
  args: string[];
  env?: Record<string, string>;
  cwd?: string;
  requestTimeoutMs: number;
}

export interface SseSpec {
  kind: 'sse';
  url: URL;
  headers: Record<string, string>;
  requestTimeoutMs: number;
}

export interface StreamableSpec {
  kind: 'streamable';
  url: URL;
  headers: Record<string, string>;
  requestTimeoutMs: number;
  streamReadTimeoutMs: number;
}

export type TransportSpec = StdioSpec | SseSpec | StreamableSpec;

export interface ConnectOptions {
  signal?: AbortSignal;
}

export interface TransportConnector {
  readonly serverName: string;
  readonly kind: TransportKind;
  connect(options?: ConnectOptions): Promise<McpSession>;
}

export interface ConnectorOptions {
  /** Used when the server's auth settings ask for OAuth discovery. */
  oauthClient?: OAuthClient;
  /** Fallback when the config has no `timeout`. */
  requestTimeoutMs?: number;
  /** Streamable only; defaults to twice the request timeout. */
  streamReadTimeoutMs?: number;
}

export type ConnectorFactory = (config: ServerConfig) => TransportConnector;

/**
 * Derive the transport spec, checking the fields each transport needs.
 *
 * @throws {ConfigurationError} before any I/O when a required field is missing
 */
export function toTransportSpec(config: ServerConfig, options: ConnectorOptions = {}): TransportSpec {
  const requestTimeoutMs = config.timeout !== undefined
    ? config.timeout * 1000
    : options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

  switch (config.transport) {
    case 'stdio': {
      if (!config.command) {
        throw new ConfigurationError(`Server '${config.name}': stdio transport requires 'command'`);
      }
      return {
        kind: 'stdio',
        command: config.command,
        args: [...config.args],
        env: config.env ? { ...config.env } : undefined,
        cwd: config.cwd,
        requestTimeoutMs,
      };
    }
    case 'sse':
    case 'streamable': {
      if (!config.url) {
        throw new ConfigurationError(`Server '${config.name}': ${config.transport} transport requires 'url'`);
      }
      const url = new URL(config.url);
      if (config.transport === 'sse') {
        return { kind: 'sse', url, headers: { ...config.headers }, requestTimeoutMs };
      }
      return {
        kind: 'streamable',
        url,
        headers: { ...config.headers },
        requestTimeoutMs,
        streamReadTimeoutMs: options.streamReadTimeoutMs ?? requestTimeoutMs * 2,
      };
    }
  }
}

export abstract class SdkConnector<S extends TransportSpec> implements TransportConnector {
  constructor(
    readonly serverName: string,
    protected readonly spec: S,
  ) {}

  get kind(): TransportKind {
    return this.spec.kind;
  }

  protected abstract createTransport(): Transport;

  protected abstract timeouts(): RequestTimeouts;

  async connect(options: ConnectOptions = {}): Promise<McpSession> {
    const timeouts = this.timeouts();
    const operation = `Connecting to '${this.serverName}' over ${this.spec.kind}`;
    if (options.signal?.aborted) {
      throw toConnectorError(options.signal.reason, operation, timeouts.requestTimeoutMs);
    }

    const transport = this.createTransport();
    const client = new Client(CLIENT_INFO, { capabilities: {} });
    try {
      await client.connect(transport, { signal: options.signal, timeout: timeouts.requestTimeoutMs });
    } catch (error) {
      await closeClient(client, this.serverName);
      throw toConnectorError(error, operation, timeouts.requestTimeoutMs);
    }

    logger.info('Connected to MCP server', {
      server: this.serverName,
      transport: this.spec.kind,
      serverVersion: client.getServerVersion()?.version,
    });
    return new SdkMcpSession(this.serverName, client, timeouts);
  }
}

async function closeClient(client: Client, serverName: string): Promise<void> {
  try {
    await client.close();
  } catch (error) {
    logger.debug('Closing half-open connection failed', {
      server: serverName,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

export class StdioConnector extends SdkConnector<StdioSpec> {
  protected createTransport(): Transport {
    const transport = new StdioClientTransport({
      command: this.spec.command,
      args: this.spec.args,
      env: this.spec.env ? { ...getDefaultEnvironment(), ...this.spec.env } : undefined,
      cwd: this.spec.cwd,
      stderr: 'pipe',
    });
    transport.stderr?.on('data', (chunk: Buffer) => {
      logger.debug('stdio server stderr', { server: this.serverName, output: chunk.toString().trimEnd() });
    });
    return transport;
  }

  protected timeouts(): RequestTimeouts {
    return { requestTimeoutMs: this.spec.requestTimeoutMs };
  }
}

export class SseConnector extends SdkConnector<SseSpec> {
  constructor(serverName: string, spec: SseSpec, private readonly tokenSource?: AccessTokenSource) {
    super(serverName, spec);
  }

  protected createTransport(): Transport {
    return new SSEClientTransport(this.spec.url, {
      authProvider: this.tokenSource ? new BearerTokenProvider(this.tokenSource) : undefined,
      requestInit: { headers: this.spec.headers },
    });
  }

  protected timeouts(): RequestTimeouts {
    return { requestTimeoutMs: this.spec.requestTimeoutMs };
  }
}

export class StreamableConnector extends SdkConnector<StreamableSpec> {
  constructor(serverName: string, spec: StreamableSpec, private readonly tokenSource?: AccessTokenSource) {
    super(serverName, spec);
  }

  protected createTransport(): Transport {
    return new StreamableHTTPClientTransport(this.spec.url, {
      authProvider: this.tokenSource ? new BearerTokenProvider(this.tokenSource) : undefined,
      requestInit: { headers: this.spec.headers },
    });
  }

  protected timeouts(): RequestTimeouts {
    return { requestTimeoutMs: this.spec.requestTimeoutMs, maxTotalTimeoutMs: this.spec.streamReadTimeoutMs };
  }
}

/**
 * Select the connector for a config. Called once per registry entry.
 */
export function createConnector(config: ServerConfig, options: ConnectorOptions = {}): TransportConnector {
  const spec = toTransportSpec(config, options);
  const tokenSource = config.url
    ? createTokenSource(config.authConfig, { resourceUrl: config.url, oauthClient: options.oauthClient })
    : undefined;

  switch (spec.kind) {
    case 'stdio':
      return new StdioConnector(config.name, spec);
    case 'sse':
      return new SseConnector(config.name, spec, tokenSource);
    case 'streamable':
      return new StreamableConnector(config.name, spec, tokenSource);
  }
}
