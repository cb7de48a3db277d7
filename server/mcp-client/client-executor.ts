/**
 * Stateless client: every call opens a fresh connection and closes it in `finally`.
 * Used for one-shot operations and by registries running the ephemeral connection policy.
 */

import { operationSuccess, toOperationFailure, type OperationResult } from '../errors.js';
import type { ConnectionCheck } from './client-manager.js';
import { withDeadline } from './deadline.js';
import type { McpSession, PromptInfo, PromptResult, ResourceContent, ResourceInfo, ToolInfo, ToolInvocation } from './session.js';
import type { TransportConnector } from './transport-connector.js';

export const DEFAULT_EXECUTION_TIMEOUT_MS = 30_000;

export class ClientExecutor {
  constructor(
    private readonly connector: TransportConnector,
    private readonly timeoutMs: number = DEFAULT_EXECUTION_TIMEOUT_MS,
  ) {}

  get serverName(): string {
    return this.connector.serverName;
  }

  /**
   * Connect, run `work`, and close, all within one deadline.
   */
  async run<T>(operation: string, work: (session: McpSession, signal: AbortSignal) => Promise<T>, timeoutMs = this.timeoutMs): Promise<T> {
    return withDeadline(timeoutMs, `${operation} on '${this.serverName}'`, async signal => {
      const session = await this.connector.connect({ signal });
      try {
        return await work(session, signal);
      } finally {
        await session.close();
      }
    });
  }

  listTools(): Promise<ToolInfo[]> {
    return this.run('tools/list', (session, signal) => session.listTools({ signal }));
  }

  invokeTool(name: string, args: Record<string, unknown> = {}): Promise<ToolInvocation> {
    return this.run(`tools/call ${name}`, (session, signal) => session.invokeTool(name, args, { signal }));
  }

  listResources(): Promise<ResourceInfo[]> {
    return this.run('resources/list', (session, signal) => session.listResources({ signal }));
  }

  readResource(uri: string): Promise<ResourceContent[]> {
    return this.run(`resources/read ${uri}`, (session, signal) => session.readResource(uri, { signal }));
  }

  listPrompts(): Promise<PromptInfo[]> {
    return this.run('prompts/list', (session, signal) => session.listPrompts({ signal }));
  }

  getPrompt(name: string, args: Record<string, string> = {}): Promise<PromptResult> {
    return this.run(`prompts/get ${name}`, (session, signal) => session.getPrompt(name, args, { signal }));
  }

  async testConnection(): Promise<OperationResult<ConnectionCheck>> {
    try {
      const tools = await this.listTools();
      return operationSuccess(this.serverName, { toolCount: tools.length });
    } catch (error) {
      return toOperationFailure(error, this.serverName);
    }
  }
}
