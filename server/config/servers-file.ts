/**
 * Server descriptor files (YAML or JSON).
 *
 * ```yaml
 * mcp_servers:
 *   - name: files
 *     accessibility: internal
 *     hosting: local
 *     config:
 *       command: file-server
 *       args: [--root, /srv]
 *   - name: search
 *     accessibility: external
 *     transport: streamable
 *     url: https://search.example.com/mcp
 *     auth:
 *       bearer_token: ${SEARCH_TOKEN}
 * ```
 *
 * Connection fields may sit on the entry or under a nested `config` map. `auth` and
 * `auth_config` are accepted for `authConfig`. Without a `transport`, entries with a
 * `command` use stdio and the rest use sse. `${VAR}` references in string values are
 * expanded from the environment.
 */

import fs from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { parseServerConfig, type ServerConfig } from '../directory/server-config.js';
import { ConfigurationError, toErrorMessage } from '../errors.js';
import { logger } from '../observability/logger.js';

const DescriptorFileSchema = z.object({
  mcp_servers: z.array(z.record(z.unknown())).default([]),
});

export interface LoadedDescriptors {
  configs: ServerConfig[];
  /** Names (or list positions) of entries that failed validation. */
  rejected: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replace `${NAME}` with the environment value, or an empty string when unset.
 */
export function expandEnvironment(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvironment(item, env));
  }
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, expandEnvironment(item, env)]));
  }
  return value;
}

/**
 * Flatten one file entry into the shape {@link parseServerConfig} takes.
 */
export function toServerDescriptor(entry: Record<string, unknown>): Record<string, unknown> {
  const { config: nested, auth, auth_config: authConfigAlias, ...rest } = entry;
  const descriptor: Record<string, unknown> = { ...(isRecord(nested) ? nested : {}), ...rest };

  const authConfig = descriptor.authConfig ?? auth ?? authConfigAlias;
  if (authConfig !== undefined) {
    descriptor.authConfig = authConfig;
  }
  if (descriptor.transport === undefined) {
    descriptor.transport = typeof descriptor.command === 'string' ? 'stdio' : 'sse';
  }
  return descriptor;
}

/**
 * Parse descriptor text. Invalid entries are logged and reported in `rejected`; they
 * never stop the other entries from loading.
 *
 * @throws {ConfigurationError} when the document itself is unreadable
 */
export function parseServerDescriptors(text: string, source = 'servers file', env: NodeJS.ProcessEnv = process.env): LoadedDescriptors {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse ${source}: ${toErrorMessage(error)}`, { cause: error });
  }

  const parsed = DescriptorFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`${source} must contain an 'mcp_servers' list`);
  }

  const result: LoadedDescriptors = { configs: [], rejected: [] };
  parsed.data.mcp_servers.forEach((entry, index) => {
    const label = typeof entry.name === 'string' ? entry.name : `#${index}`;
    try {
      result.configs.push(parseServerConfig(expandEnvironment(toServerDescriptor(entry), env)));
    } catch (error) {
      logger.error('Skipping server descriptor', { source, server: label, error: toErrorMessage(error) });
      result.rejected.push(label);
    }
  });
  return result;
}

export async function loadServerDescriptors(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<LoadedDescriptors> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read servers file ${filePath}: ${toErrorMessage(error)}`, { cause: error });
  }
  const loaded = parseServerDescriptors(text, filePath, env);
  logger.info('Loaded server descriptors', { filePath, servers: loaded.configs.length, rejected: loaded.rejected.length });
  return loaded;
}
