/**
 * Server Host
 *
 * Exposes plain functions as MCP servers over streamable HTTP. Every hosted function gets
 * its own Express listener:
 *
 * - `POST /mcp`: initialize (creates a session) and client-to-server messages
 * - `GET /mcp`: server-to-client event stream for an existing session
 * - `DELETE /mcp`: session termination
 * - `GET /health`: `{ status: 'healthy', server }`
 * - `GET /.well-known/oauth-protected-resource[/mcp]`: only when an auth config is given
 *
 * A hosted server registers itself in the shared {@link ServerDirectory} as an internal,
 * local, streamable entry, so the capability registry discovers and calls it like any
 * other server. Stopping it removes that entry again.
 */

import { randomUUID } from 'node:crypto';
import type { Server } from 'node:http';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import morgan from 'morgan';
import { createTokenVerifier, hasVerifierSettings, parseAuthConfig, type AuthConfigInput } from '../auth/auth-config.js';
import { parseServerConfig, type ServerConfig } from '../directory/server-config.js';
import type { ServerDirectory } from '../directory/server-directory.js';
import { AlreadyHostedError, ConfigurationError, ConnectionError, toErrorMessage } from '../errors.js';
import { logger } from '../observability/logger.js';
import { getVerifiedToken, requireBearerToken, toAuthInfo } from './bearer-auth.js';
import { createToolServer, type HostedPrompt, type HostedResource, type HostedTool } from './server-factory.js';

export const DEFAULT_SHUTDOWN_GRACE_MS = 5000;

export interface HostFunctionOptions {
  /** 0 picks a free port. */
  port?: number;
  host?: string;
  description?: string;
  /** Protects `/mcp` with bearer tokens checked by the configured verifier. */
  authConfig?: AuthConfigInput;
  /** Served next to the tool. */
  resources?: readonly HostedResource[];
  prompts?: readonly HostedPrompt[];
}

export interface HostedServerHandle {
  name: string;
  url: string;
  host: string;
  port: number;
  startedAt: Date;
  config: ServerConfig;
}

export interface ServerHostOptions {
  directory: ServerDirectory;
  shutdownGraceMs?: number;
  defaultHost?: string;
}

export interface StopAllResult {
  stopped: string[];
  failed: string[];
}

interface McpSessionEntry {
  transport: StreamableHTTPServerTransport;
  mcp: McpServer;
}

interface HostedServer {
  handle: HostedServerHandle;
  listener: Server;
  sessions: Map<string, McpSessionEntry>;
}

function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

function boundPort(server: Server, fallback: number): number {
  const address = server.address();
  return typeof address === 'object' && address !== null ? address.port : fallback;
}

/** Hosts like `0.0.0.0` are fine to bind but not to connect to. */
function urlHost(host: string): string {
  if (host === '0.0.0.0' || host === '::') {
    return 'localhost';
  }
  return host.includes(':') ? `[${host}]` : host;
}

function closeListener(server: Server, graceMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      logger.warn('Forcing remaining connections closed', { graceMs });
      server.closeAllConnections();
    }, graceMs);
    server.close(error => {
      clearTimeout(timer);
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
    server.closeIdleConnections();
  });
}

export class ServerHost {
  private readonly directory: ServerDirectory;
  private readonly shutdownGraceMs: number;
  private readonly defaultHost: string;
  private readonly hosted = new Map<string, HostedServer>();
  /** Names between `hostFunction` and a bound listener. */
  private readonly starting = new Set<string>();

  constructor(options: ServerHostOptions) {
    this.directory = options.directory;
    this.shutdownGraceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
    this.defaultHost = options.defaultHost ?? 'localhost';
  }

  /**
   * Start a listener serving `tool` and register it in the directory.
   *
   * @throws {AlreadyHostedError} when `name` is already hosted or starting
   * @throws {ConfigurationError} for an unusable auth config
   * @throws {ConnectionError} when the port cannot be bound
   */
  async hostFunction(name: string, tool: HostedTool, options: HostFunctionOptions = {}): Promise<HostedServerHandle> {
    if (this.hosted.has(name) || this.starting.has(name)) {
      throw new AlreadyHostedError(name);
    }
    const authSettings = options.authConfig ? parseAuthConfig(options.authConfig) : undefined;
    if (authSettings && !hasVerifierSettings(authSettings)) {
      throw new ConfigurationError(`Hosted server '${name}': auth config has no token verifier settings`);
    }

    this.starting.add(name);
    try {
      return await this.start(name, tool, options);
    } finally {
      this.starting.delete(name);
    }
  }

  get(name: string): HostedServerHandle | undefined {
    return this.hosted.get(name)?.handle;
  }

  listHosted(): HostedServerHandle[] {
    return [...this.hosted.values()].map(server => server.handle);
  }

  /**
   * Close every session, stop the listener (forcing connections closed after the grace
   * period) and remove the directory entry.
   *
   * @returns false when nothing is hosted under `name`
   */
  async stop(name: string): Promise<boolean> {
    const server = this.hosted.get(name);
    if (!server) {
      return false;
    }
    this.hosted.delete(name);
    if (this.directory.get(name) === server.handle.config) {
      this.directory.remove(name);
    }

    const sessions = [...server.sessions.values()];
    server.sessions.clear();
    const closed = await Promise.allSettled(sessions.map(async session => {
      await session.transport.close();
      await session.mcp.close();
    }));
    closed.forEach(result => {
      if (result.status === 'rejected') {
        logger.warn('Failed to close hosted session', { name, error: toErrorMessage(result.reason) });
      }
    });

    await closeListener(server.listener, this.shutdownGraceMs);
    logger.info('Stopped hosted server', { name, url: server.handle.url });
    return true;
  }

  async stopAll(): Promise<StopAllResult> {
    const names = [...this.hosted.keys()];
    const results = await Promise.allSettled(names.map(name => this.stop(name)));
    const summary: StopAllResult = { stopped: [], failed: [] };
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        summary.stopped.push(names[index]);
      } else {
        logger.error('Failed to stop hosted server', { name: names[index], error: toErrorMessage(result.reason) });
        summary.failed.push(names[index]);
      }
    });
    return summary;
  }

  private async start(name: string, tool: HostedTool, options: HostFunctionOptions): Promise<HostedServerHandle> {
    const host = options.host ?? this.defaultHost;
    const requestedPort = options.port ?? 0;
    const sessions = new Map<string, McpSessionEntry>();
    const app = express();

    app.use(cors({
      origin: '*',
      methods: ['GET', 'POST', 'OPTIONS', 'DELETE'],
      allowedHeaders: ['Content-Type', 'mcp-session-id', 'Authorization', 'mcp-protocol-version'],
      exposedHeaders: ['mcp-session-id'],
    }));
    app.use(morgan('tiny', {
      stream: { write: (message: string) => logger.http(message.trim(), { server: name }) },
    }));
    app.use(express.json());

    let listener: Server;
    try {
      listener = await listen(app, requestedPort, host);
    } catch (error) {
      throw new ConnectionError(`Cannot host '${name}' on ${host}:${requestedPort}: ${toErrorMessage(error)}`, { cause: error });
    }

    const port = boundPort(listener, requestedPort);
    const origin = `http://${urlHost(host)}:${port}`;
    const url = `${origin}/mcp`;

    // Routes are mounted in the same tick the listener reports ready, so no request sees
    // a half-configured app.
    try {
      this.mountRoutes(app, { name, tool, options, origin, url, sessions });
    } catch (error) {
      await closeListener(listener, 0);
      throw error;
    }

    const config = parseServerConfig({
      name,
      accessibility: 'internal',
      hosting: 'local',
      transport: 'streamable',
      url,
      description: options.description ?? tool.description,
      authConfig: options.authConfig,
      ephemeral: true,
    });
    const handle: HostedServerHandle = { name, url, host, port, startedAt: new Date(), config };
    this.hosted.set(name, { handle, listener, sessions });
    this.directory.register(config);

    logger.info('Hosting function as MCP server', { name, url, protected: options.authConfig !== undefined });
    return handle;
  }

  private mountRoutes(
    app: Express,
    route: {
      name: string;
      tool: HostedTool;
      options: HostFunctionOptions;
      origin: string;
      url: string;
      sessions: Map<string, McpSessionEntry>;
    },
  ): void {
    const { name, tool, options, url, sessions } = route;

    app.get('/health', (_req, res) => {
      res.json({ status: 'healthy', server: name });
    });

    const guards: express.RequestHandler[] = [];
    if (options.authConfig) {
      const settings = parseAuthConfig(options.authConfig);
      const verifier = createTokenVerifier(settings, url);
      const metadataPath = '/.well-known/oauth-protected-resource';
      const metadata = {
        resource: url,
        authorization_servers: settings.issuerUrl ? [settings.issuerUrl] : [],
        scopes_supported: settings.requiredScopes,
        bearer_methods_supported: ['header'],
      };
      app.get([metadataPath, `${metadataPath}/mcp`], (_req, res) => {
        res.json(metadata);
      });
      guards.push(requireBearerToken({
        verifier,
        requiredScopes: settings.requiredScopes,
        resourceMetadataUrl: `${route.origin}${metadataPath}/mcp`,
      }));
    }

    const withAuth = (req: Request): Request => {
      const token = getVerifiedToken(req);
      return token ? Object.assign(req, { auth: toAuthInfo(token) }) : req;
    };

    const handlePost = async (req: Request, res: Response): Promise<void> => {
      const sessionId = req.header('mcp-session-id');
      const existing = sessionId ? sessions.get(sessionId) : undefined;
      if (existing) {
        await existing.transport.handleRequest(withAuth(req), res, req.body);
        return;
      }
      if (sessionId || !isInitializeRequest(req.body)) {
        res.status(400).json({
          jsonrpc: '2.0',
          error: { code: -32000, message: 'Bad Request: No valid session ID provided' },
          id: null,
        });
        return;
      }

      const mcp = createToolServer(name, tool, {
        description: options.description,
        resources: options.resources,
        prompts: options.prompts,
      });
      const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: newSessionId => {
          sessions.set(newSessionId, { transport, mcp });
          logger.debug('Hosted session started', { server: name, sessionId: newSessionId });
        },
      });
      transport.onclose = () => {
        if (transport.sessionId) {
          sessions.delete(transport.sessionId);
        }
      };
      await mcp.connect(transport);
      await transport.handleRequest(withAuth(req), res, req.body);
    };

    const handleSession = async (req: Request, res: Response): Promise<void> => {
      const sessionId = req.header('mcp-session-id');
      const session = sessionId ? sessions.get(sessionId) : undefined;
      if (!session) {
        res.status(400).send('Invalid or missing session ID');
        return;
      }
      await session.transport.handleRequest(withAuth(req), res);
    };

    const post: express.RequestHandler = (req, res, next) => {
      handlePost(req, res).catch(next);
    };
    const session: express.RequestHandler = (req, res, next) => {
      handleSession(req, res).catch(next);
    };
    app.post('/mcp', ...guards, post);
    app.get('/mcp', ...guards, session);
    app.delete('/mcp', ...guards, session);

    app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
      logger.error('Hosted server request failed', { server: name, error: error.message });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    });
  }
}
