/**
 * JSON persistence for the capability registry.
 *
 * File format:
 * ```json
 * { "servers": [ { "name": "...", "transport": "stdio", "enabled": true, "lastDiscovery": "2026-01-01T00:00:00.000Z", ... } ],
 *   "updated": "2026-01-01T00:00:00.000Z" }
 * ```
 * Writes are serialized: each save starts after the previous one finished.
 */

import fs from 'node:fs/promises';
import { z } from 'zod';
import { ACCESSIBILITIES, HOSTINGS, TRANSPORTS } from '../directory/server-config.js';
import { toErrorMessage } from '../errors.js';
import { logger } from '../observability/logger.js';
import { isMissingFile, writeFileAtomic } from '../utils/files.js';

const ToolInfoSchema = z.object({
  name: z.string(),
  title: z.string().optional(),
  description: z.string().optional(),
  inputSchema: z.record(z.unknown()).default({ type: 'object' }),
});

const ResourceInfoSchema = z.object({
  uri: z.string(),
  name: z.string(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

const PromptInfoSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  arguments: z
    .array(z.object({ name: z.string(), description: z.string().optional(), required: z.boolean().optional() }))
    .default([]),
});

export const PersistedCapabilitiesSchema = z.object({
  tools: z.array(ToolInfoSchema).default([]),
  resources: z.array(ResourceInfoSchema).default([]),
  prompts: z.array(PromptInfoSchema).default([]),
});

export const PersistedServerSchema = z.object({
  name: z.string(),
  transport: z.enum(TRANSPORTS),
  enabled: z.boolean().default(true),
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  url: z.string().optional(),
  lastDiscovery: z.string().datetime({ offset: true }).optional(),
  capabilities: PersistedCapabilitiesSchema.optional(),
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
  accessibility: z.enum(ACCESSIBILITIES).optional(),
  hosting: z.enum(HOSTINGS).optional(),
});

const RegistryFileSchema = z.object({
  servers: z.array(z.unknown()).default([]),
  updated: z.string().optional(),
});

export type PersistedServer = z.infer<typeof PersistedServerSchema>;
export type PersistedCapabilities = z.infer<typeof PersistedCapabilitiesSchema>;

export interface RegistryDocument {
  servers: PersistedServer[];
  updated: string;
}

export class RegistryStore {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  /**
   * Read persisted servers. A missing file is an empty registry. A file that cannot be
   * read or parsed also loads as empty, with a warning; invalid entries are skipped.
   */
  async load(): Promise<PersistedServer[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn('Registry file cannot be read, ignoring it', { filePath: this.filePath, error: toErrorMessage(error) });
      }
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      logger.warn('Registry file is not valid JSON, ignoring it', { filePath: this.filePath });
      return [];
    }

    const document = RegistryFileSchema.safeParse(raw);
    if (!document.success) {
      logger.warn('Registry file has an unexpected shape, ignoring it', { filePath: this.filePath });
      return [];
    }

    const servers: PersistedServer[] = [];
    for (const raw of document.data.servers) {
      const parsed = PersistedServerSchema.safeParse(raw);
      if (parsed.success) {
        servers.push(parsed.data);
      } else {
        logger.warn('Skipping invalid registry entry', { filePath: this.filePath, issues: parsed.error.message });
      }
    }
    logger.info('Loaded registry', { filePath: this.filePath, servers: servers.length });
    return servers;
  }

  /**
   * Queue a write of `servers`. The returned promise settles when this write is done.
   */
  save(servers: PersistedServer[]): Promise<void> {
    const document: RegistryDocument = { servers, updated: new Date().toISOString() };
    const next = this.writeChain.then(async () => {
      await writeFileAtomic(this.filePath, `${JSON.stringify(document, null, 2)}\n`);
      logger.debug('Saved registry', { filePath: this.filePath, servers: servers.length });
    });
    this.writeChain = next.catch(error => {
      logger.error('Failed to save registry', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    });
    return next;
  }

  /** Settles once every queued write has finished. */
  flush(): Promise<void> {
    return this.writeChain;
  }
}
