/**
 * Live MCP session wrapper.
 *
 * Exposes the six capability operations on top of an SDK `Client` and returns plain,
 * serializable data instead of SDK result objects. List operations page through
 * `nextCursor` and return `[]` when the server does not advertise the capability.
 */

import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { RequestOptions } from '@modelcontextprotocol/sdk/shared/protocol.js';
import { CallToolResultSchema, type CallToolResult, type PromptMessage } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../observability/logger.js';
import { toConnectorError } from './connector-errors.js';

export interface ToolInfo {
  name: string;
  title?: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

export interface ResourceInfo {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export interface PromptArgumentInfo {
  name: string;
  description?: string;
  required?: boolean;
}

export interface PromptInfo {
  name: string;
  description?: string;
  arguments: PromptArgumentInfo[];
}

export interface ResourceContent {
  uri: string;
  mimeType?: string;
  text?: string;
  /** Base64 payload for binary resources. */
  blob?: string;
}

export interface PromptResult {
  description?: string;
  messages: PromptMessage[];
}

export type ToolContent = CallToolResult['content'];

export interface ToolInvocation {
  isError: boolean;
  content: ToolContent;
  /** First text block, when there is one. */
  text?: string;
  structuredContent?: Record<string, unknown>;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface McpSession {
  readonly serverName: string;
  listTools(options?: CallOptions): Promise<ToolInfo[]>;
  invokeTool(name: string, args?: Record<string, unknown>, options?: CallOptions): Promise<ToolInvocation>;
  listResources(options?: CallOptions): Promise<ResourceInfo[]>;
  readResource(uri: string, options?: CallOptions): Promise<ResourceContent[]>;
  listPrompts(options?: CallOptions): Promise<PromptInfo[]>;
  getPrompt(name: string, args?: Record<string, string>, options?: CallOptions): Promise<PromptResult>;
  close(): Promise<void>;
}

export interface RequestTimeouts {
  /** Per-request timeout. */
  requestTimeoutMs: number;
  /** Upper bound for a request whose timeout keeps being reset by progress. */
  maxTotalTimeoutMs?: number;
}

function isLegacyToolResult(raw: unknown): raw is { toolResult: unknown } {
  return typeof raw === 'object' && raw !== null && 'toolResult' in raw;
}

/**
 * Normalize a `tools/call` result. Results in the legacy `toolResult` shape, and results
 * that are not tool results at all, are wrapped as structured content.
 */
export function normalizeToolResult(raw: unknown): ToolInvocation {
  const parsed = CallToolResultSchema.safeParse(raw);
  // The schema defaults `content` to [], so a legacy result parses as an empty one.
  if (!parsed.success || (parsed.data.content.length === 0 && isLegacyToolResult(raw))) {
    const legacy = isLegacyToolResult(raw) ? raw.toolResult : raw;
    return { isError: false, content: [], structuredContent: { result: legacy } };
  }
  const result = parsed.data;
  const firstText = result.content.find(block => block.type === 'text');
  return {
    isError: result.isError === true,
    content: result.content,
    text: firstText && 'text' in firstText && typeof firstText.text === 'string' ? firstText.text : undefined,
    structuredContent: result.structuredContent,
  };
}

export class SdkMcpSession implements McpSession {
  private closed = false;

  constructor(
    readonly serverName: string,
    private readonly client: Client,
    private readonly timeouts: RequestTimeouts,
  ) {}

  async listTools(options: CallOptions = {}): Promise<ToolInfo[]> {
    if (!this.client.getServerCapabilities()?.tools) {
      return [];
    }
    return this.guard('tools/list', async () => {
      const tools: ToolInfo[] = [];
      let cursor: string | undefined;
      do {
        const page = await this.client.listTools(cursor ? { cursor } : undefined, this.requestOptions(options));
        for (const tool of page.tools) {
          tools.push({ name: tool.name, title: tool.title, description: tool.description, inputSchema: tool.inputSchema });
        }
        cursor = page.nextCursor;
      } while (cursor);
      return tools;
    });
  }

  async invokeTool(name: string, args: Record<string, unknown> = {}, options: CallOptions = {}): Promise<ToolInvocation> {
    return this.guard(`tools/call ${name}`, async () => {
      const raw = await this.client.callTool({ name, arguments: args }, CallToolResultSchema, this.requestOptions(options));
      return normalizeToolResult(raw);
    });
  }

  async listResources(options: CallOptions = {}): Promise<ResourceInfo[]> {
    if (!this.client.getServerCapabilities()?.resources) {
      return [];
    }
    return this.guard('resources/list', async () => {
      const resources: ResourceInfo[] = [];
      let cursor: string | undefined;
      do {
        const page = await this.client.listResources(cursor ? { cursor } : undefined, this.requestOptions(options));
        for (const resource of page.resources) {
          resources.push({
            uri: resource.uri,
            name: resource.name,
            description: resource.description,
            mimeType: resource.mimeType,
          });
        }
        cursor = page.nextCursor;
      } while (cursor);
      return resources;
    });
  }

  async readResource(uri: string, options: CallOptions = {}): Promise<ResourceContent[]> {
    return this.guard(`resources/read ${uri}`, async () => {
      const result = await this.client.readResource({ uri }, this.requestOptions(options));
      return result.contents.map(content => ({
        uri: content.uri,
        mimeType: content.mimeType,
        text: 'text' in content && typeof content.text === 'string' ? content.text : undefined,
        blob: 'blob' in content && typeof content.blob === 'string' ? content.blob : undefined,
      }));
    });
  }

  async listPrompts(options: CallOptions = {}): Promise<PromptInfo[]> {
    if (!this.client.getServerCapabilities()?.prompts) {
      return [];
    }
    return this.guard('prompts/list', async () => {
      const prompts: PromptInfo[] = [];
      let cursor: string | undefined;
      do {
        const page = await this.client.listPrompts(cursor ? { cursor } : undefined, this.requestOptions(options));
        for (const prompt of page.prompts) {
          prompts.push({
            name: prompt.name,
            description: prompt.description,
            arguments: (prompt.arguments ?? []).map(argument => ({
              name: argument.name,
              description: argument.description,
              required: argument.required,
            })),
          });
        }
        cursor = page.nextCursor;
      } while (cursor);
      return prompts;
    });
  }

  async getPrompt(name: string, args: Record<string, string> = {}, options: CallOptions = {}): Promise<PromptResult> {
    return this.guard(`prompts/get ${name}`, async () => {
      const result = await this.client.getPrompt({ name, arguments: args }, this.requestOptions(options));
      return { description: result.description, messages: result.messages };
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.client.close();
    } catch (error) {
      logger.warn('Error while closing MCP session', {
        server: this.serverName,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private requestOptions(options: CallOptions): RequestOptions {
    return {
      signal: options.signal,
      timeout: this.timeouts.requestTimeoutMs,
      maxTotalTimeout: this.timeouts.maxTotalTimeoutMs,
      resetTimeoutOnProgress: this.timeouts.maxTotalTimeoutMs !== undefined,
    };
  }

  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      throw toConnectorError(error, `${operation} on '${this.serverName}'`, this.timeouts.requestTimeoutMs);
    }
  }
}
