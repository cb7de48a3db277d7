/**
 * MCP Server Factory
 *
 * Builds the `McpServer` behind a hosted function. The host creates one instance per
 * session, so every session sees a fresh server with the tool, and any resources and
 * prompts, registered explicitly.
 */

import { McpServer, type PromptCallback, type ReadResourceCallback } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult, GetPromptResult, ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import type { ZodOptional, ZodRawShape, ZodType, ZodTypeDef } from 'zod';
import { toErrorMessage } from '../errors.js';
import { logger } from '../observability/logger.js';

export const HOSTED_SERVER_VERSION = '0.1.0';

/**
 * A plain function exposed as an MCP tool.
 *
 * @example
 * const echo: HostedTool = {
 *   inputSchema: { text: z.string() },
 *   handler: async ({ text }) => text,
 * };
 */
export interface HostedTool {
  handler: (args: Record<string, unknown>) => unknown;
  /** zod shape of the tool arguments; the SDK publishes it as JSON Schema. */
  inputSchema: ZodRawShape;
  /** Tool name; defaults to the server name. */
  name?: string;
  description?: string;
}

/**
 * A fixed-URI resource served as text.
 *
 * @example
 * const readme: HostedResource = { uri: 'docs://readme', mimeType: 'text/markdown', read: () => '# Hello' };
 */
export interface HostedResource {
  uri: string;
  /** Listed name; defaults to the URI. */
  name?: string;
  description?: string;
  mimeType?: string;
  read: (uri: URL) => string | Promise<string>;
}

/** Prompt arguments are strings on the wire. */
export type PromptArgsShape = Record<string, ZodType<string, ZodTypeDef, string> | ZodOptional<ZodType<string, ZodTypeDef, string>>>;

/**
 * A prompt template rendered into a single user message.
 */
export interface HostedPrompt {
  name: string;
  description?: string;
  argsSchema?: PromptArgsShape;
  render: (args: Record<string, string>) => string | Promise<string>;
}

export interface ToolServerOptions {
  description?: string;
  resources?: readonly HostedResource[];
  prompts?: readonly HostedPrompt[];
}

/**
 * Strings become one text item; everything else is serialized as JSON text.
 */
export function toToolContent(value: unknown): CallToolResult {
  const text = typeof value === 'string' ? value : JSON.stringify(value ?? null);
  return { content: [{ type: 'text', text }] };
}

function stringArgs(args: object): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(args)) {
    if (typeof value === 'string') {
      values[key] = value;
    }
  }
  return values;
}

function registerResource(mcp: McpServer, serverName: string, resource: HostedResource): void {
  const read: ReadResourceCallback = async (uri): Promise<ReadResourceResult> => {
    try {
      const text = await resource.read(uri);
      return { contents: [{ uri: uri.href, mimeType: resource.mimeType, text }] };
    } catch (error) {
      logger.warn('Hosted resource failed', { server: serverName, uri: resource.uri, error: toErrorMessage(error) });
      throw error;
    }
  };
  mcp.registerResource(
    resource.name ?? resource.uri,
    resource.uri,
    { description: resource.description, mimeType: resource.mimeType },
    read,
  );
}

function registerPrompt(mcp: McpServer, serverName: string, prompt: HostedPrompt): void {
  const respond = async (args: Record<string, string>): Promise<GetPromptResult> => {
    try {
      const text = await prompt.render(args);
      return {
        description: prompt.description,
        messages: [{ role: 'user', content: { type: 'text', text } }],
      };
    } catch (error) {
      logger.warn('Hosted prompt failed', { server: serverName, prompt: prompt.name, error: toErrorMessage(error) });
      throw error;
    }
  };

  if (prompt.argsSchema) {
    const render: PromptCallback<PromptArgsShape> = args => respond(stringArgs(args));
    mcp.registerPrompt(prompt.name, { description: prompt.description, argsSchema: prompt.argsSchema }, render);
  } else {
    mcp.registerPrompt(prompt.name, { description: prompt.description }, () => respond({}));
  }
}

export function createToolServer(serverName: string, tool: HostedTool, options: ToolServerOptions = {}): McpServer {
  const toolName = tool.name ?? serverName;
  const mcp = new McpServer(
    { name: serverName, version: HOSTED_SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  mcp.registerTool(
    toolName,
    {
      description: tool.description ?? options.description,
      inputSchema: tool.inputSchema,
    },
    async args => {
      try {
        return toToolContent(await tool.handler(args));
      } catch (error) {
        logger.warn('Hosted tool failed', { server: serverName, tool: toolName, error: toErrorMessage(error) });
        return { isError: true, content: [{ type: 'text', text: toErrorMessage(error) }] };
      }
    },
  );

  for (const resource of options.resources ?? []) {
    registerResource(mcp, serverName, resource);
  }
  for (const prompt of options.prompts ?? []) {
    registerPrompt(mcp, serverName, prompt);
  }

  return mcp;
}
