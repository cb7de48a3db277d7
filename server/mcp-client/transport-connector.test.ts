import { afterEach, describe, expect, it } from '@jest/globals';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { isJSONRPCRequest } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { parseServerConfig, type ServerConfig } from '../directory/server-config.js';
import { ConfigurationError, ConnectionError, TimeoutError } from '../errors.js';
import { createToolServer } from '../mcp-core/server-factory.js';
import type { RequestTimeouts } from './session.js';
import {
  createConnector,
  DEFAULT_REQUEST_TIMEOUT_MS,
  SdkConnector,
  SseConnector,
  StdioConnector,
  StreamableConnector,
  toTransportSpec,
  type StreamableSpec,
} from './transport-connector.js';

const streamable = parseServerConfig({ name: 'search', transport: 'streamable', url: 'https://search.example.com/mcp' });
const stdio = parseServerConfig({ name: 'files', transport: 'stdio', command: 'files-server', args: ['--root', '/tmp'] });

describe('toTransportSpec', () => {
  it('defaults the stream read timeout to twice the request timeout', () => {
    expect(toTransportSpec(streamable)).toMatchObject({
      kind: 'streamable',
      requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
      streamReadTimeoutMs: 2 * DEFAULT_REQUEST_TIMEOUT_MS,
    });
    expect(toTransportSpec(streamable, { requestTimeoutMs: 5000 })).toMatchObject({
      requestTimeoutMs: 5000,
      streamReadTimeoutMs: 10_000,
    });
  });

  it('prefers the config timeout over the connector default', () => {
    const config = parseServerConfig({ name: 'slow', transport: 'sse', url: 'https://slow.example.com/sse', timeout: 15 });

    expect(toTransportSpec(config, { requestTimeoutMs: 5000 })).toMatchObject({ kind: 'sse', requestTimeoutMs: 15_000 });
  });

  it('carries the request timeout for stdio servers', () => {
    expect(toTransportSpec(stdio, { requestTimeoutMs: 90_000 })).toEqual({
      kind: 'stdio',
      command: 'files-server',
      args: ['--root', '/tmp'],
      env: undefined,
      cwd: undefined,
      requestTimeoutMs: 90_000,
    });
  });

  it('rejects configs missing their transport fields', () => {
    const noCommand: ServerConfig = { ...stdio, command: undefined };
    const noUrl: ServerConfig = { ...streamable, url: undefined };

    expect(() => toTransportSpec(noCommand)).toThrow(ConfigurationError);
    expect(() => toTransportSpec(noUrl)).toThrow("Server 'search': streamable transport requires 'url'");
  });
});

describe('createConnector', () => {
  it('selects the connector for the transport', () => {
    const sse = parseServerConfig({ name: 'events', transport: 'sse', url: 'https://events.example.com/sse' });

    expect(createConnector(stdio)).toBeInstanceOf(StdioConnector);
    expect(createConnector(sse)).toBeInstanceOf(SseConnector);
    expect(createConnector(streamable)).toBeInstanceOf(StreamableConnector);
    expect(createConnector(streamable).kind).toBe('streamable');
  });
});

/**
 * Streamable connector whose transport is one end of an in-memory pair; `peer` is the
 * other end.
 */
class InMemoryConnector extends SdkConnector<StreamableSpec> {
  transportsCreated = 0;
  peerClosed = false;
  readonly peer: InMemoryTransport;
  private readonly local: InMemoryTransport;

  constructor() {
    super('memory', {
      kind: 'streamable',
      url: new URL('https://memory.example.com/mcp'),
      headers: {},
      requestTimeoutMs: 1000,
      streamReadTimeoutMs: 2000,
    });
    const [local, peer] = InMemoryTransport.createLinkedPair();
    this.local = local;
    this.peer = peer;
    this.peer.onclose = () => {
      this.peerClosed = true;
    };
  }

  protected createTransport(): Transport {
    this.transportsCreated += 1;
    return this.local;
  }

  protected timeouts(): RequestTimeouts {
    return { requestTimeoutMs: this.spec.requestTimeoutMs, maxTotalTimeoutMs: this.spec.streamReadTimeoutMs };
  }
}

describe('SdkConnector.connect', () => {
  let server: McpServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('returns an initialized session', async () => {
    const connector = new InMemoryConnector();
    server = createToolServer('memory', { inputSchema: { text: z.string() }, handler: args => args.text });
    await server.connect(connector.peer);

    const session = await connector.connect();

    await expect(session.listTools()).resolves.toMatchObject([{ name: 'memory' }]);
    await session.close();
    expect(connector.peerClosed).toBe(true);
  });

  it('closes the transport when the handshake fails', async () => {
    const connector = new InMemoryConnector();
    connector.peer.onmessage = message => {
      if (isJSONRPCRequest(message)) {
        void connector.peer.send({ jsonrpc: '2.0', id: message.id, error: { code: -32603, message: 'boom' } });
      }
    };
    await connector.peer.start();

    const connecting = connector.connect();

    await expect(connecting).rejects.toBeInstanceOf(ConnectionError);
    await expect(connecting).rejects.toThrow("Connecting to 'memory' over streamable failed");
    expect(connector.peerClosed).toBe(true);
  });

  it('closes the transport when the handshake is aborted', async () => {
    const connector = new InMemoryConnector();
    await connector.peer.start();
    const controller = new AbortController();

    const connecting = connector.connect({ signal: controller.signal });
    controller.abort(new TimeoutError('Handshake', 10));

    await expect(connecting).rejects.toBeInstanceOf(TimeoutError);
    expect(connector.peerClosed).toBe(true);
  });

  it('does not open a transport for an already aborted signal', async () => {
    const connector = new InMemoryConnector();

    await expect(connector.connect({ signal: AbortSignal.abort(new TimeoutError('Handshake', 10)) })).rejects.toBeInstanceOf(TimeoutError);
    expect(connector.transportsCreated).toBe(0);
  });
});
