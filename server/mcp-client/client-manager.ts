/**
 * Stateful client for one server: at most one live session, opened lazily and reused
 * until `disconnect()`. Concurrent callers share a single in-flight connect. A failed
 * operation drops the session so the next call reconnects.
 */

import type { ServerConfig } from '../directory/server-config.js';
import { ConnectionError, operationSuccess, toErrorMessage, toOperationFailure, type OperationResult } from '../errors.js';
import { logger } from '../observability/logger.js';
import { withDeadline } from './deadline.js';
import type { McpSession } from './session.js';
import type { TransportConnector } from './transport-connector.js';

export const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;

export interface ClientManagerOptions {
  connectTimeoutMs?: number;
}

export interface ConnectionCheck {
  toolCount: number;
}

export class ClientManager {
  private session?: McpSession;
  private connecting?: Promise<McpSession>;
  /** Bumped by every disconnect; a connect started under an older generation is discarded. */
  private generation = 0;
  private readonly connectTimeoutMs: number;

  constructor(
    readonly config: ServerConfig,
    private readonly connector: TransportConnector,
    options: ClientManagerOptions = {},
  ) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  }

  get serverName(): string {
    return this.config.name;
  }

  get isConnected(): boolean {
    return this.session !== undefined;
  }

  async getSession(): Promise<McpSession> {
    if (this.session) {
      return this.session;
    }
    this.connecting ??= this.openSession();
    return this.connecting;
  }

  /**
   * Run `work` against the live session, connecting first if needed.
   */
  async withSession<T>(work: (session: McpSession) => Promise<T>): Promise<T> {
    const session = await this.getSession();
    try {
      return await work(session);
    } catch (error) {
      await this.dropSession(session, error);
      throw error;
    }
  }

  async reconnect(): Promise<McpSession> {
    await this.disconnect();
    return this.getSession();
  }

  /**
   * Close the live session, if any. Safe to call repeatedly.
   */
  async disconnect(): Promise<void> {
    this.generation += 1;
    this.connecting = undefined;
    const session = this.session;
    this.session = undefined;
    if (session) {
      await session.close();
      logger.info('Disconnected from MCP server', { server: this.serverName });
    }
  }

  async testConnection(): Promise<OperationResult<ConnectionCheck>> {
    try {
      const tools = await this.withSession(session => session.listTools());
      return operationSuccess(this.serverName, { toolCount: tools.length });
    } catch (error) {
      return toOperationFailure(error, this.serverName);
    }
  }

  private async openSession(): Promise<McpSession> {
    const generation = this.generation;
    try {
      const session = await withDeadline(
        this.connectTimeoutMs,
        `Connecting to '${this.serverName}'`,
        signal => this.connector.connect({ signal }),
        { release: late => late.close() },
      );
      if (generation !== this.generation) {
        await session.close();
        throw new ConnectionError(`Connection to '${this.serverName}' was closed while connecting`);
      }
      this.session = session;
      return session;
    } finally {
      if (generation === this.generation) {
        this.connecting = undefined;
      }
    }
  }

  private async dropSession(session: McpSession, cause: unknown): Promise<void> {
    if (this.session !== session) {
      return;
    }
    this.session = undefined;
    logger.warn('Dropping MCP session after a failed operation', {
      server: this.serverName,
      error: toErrorMessage(cause),
    });
    await session.close();
  }
}
