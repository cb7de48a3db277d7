/**
 * Server descriptors.
 *
 * A {@link ServerConfig} is only ever produced by {@link createServerConfig} /
 * {@link parseServerConfig}, which enforce the transport invariants:
 * - `stdio` requires `command`
 * - `sse` and `streamable` require an http(s) `url`
 * - `hosting: remote` cannot use `stdio`
 *
 * Validated configs are frozen; re-registering a server means building a new config.
 */

import { z } from 'zod';
import { AuthConfigSchema, type AuthSettings } from '../auth/auth-config.js';
import { ConfigurationError } from '../errors.js';

export const ACCESSIBILITIES = ['internal', 'external', 'both'] as const;
export const HOSTINGS = ['local', 'remote'] as const;
export const TRANSPORTS = ['stdio', 'sse', 'streamable'] as const;

export type Accessibility = (typeof ACCESSIBILITIES)[number];
export type Hosting = (typeof HOSTINGS)[number];
export type TransportKind = (typeof TRANSPORTS)[number];

const HttpUrlSchema = z
  .string()
  .url()
  .refine(value => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' });

function defaultHosting(transport: TransportKind): Hosting {
  return transport === 'stdio' ? 'local' : 'remote';
}

const ServerConfigSchema = z
  .object({
    name: z.string().trim().min(1, 'name is required'),
    accessibility: z.enum(ACCESSIBILITIES).default('both'),
    hosting: z.enum(HOSTINGS).optional(),
    transport: z.enum(TRANSPORTS),
    command: z.string().min(1).optional(),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).optional(),
    cwd: z.string().min(1).optional(),
    url: HttpUrlSchema.optional(),
    headers: z.record(z.string()).default({}),
    /** Per-request timeout in seconds for HTTP transports. */
    timeout: z.number().positive().optional(),
    authConfig: AuthConfigSchema.optional(),
    description: z.string().optional(),
    tags: z.array(z.string()).default([]),
    enabled: z.boolean().default(true),
    ephemeral: z.boolean().default(false),
  })
  .superRefine((config, ctx) => {
    if (config.transport === 'stdio' && !config.command) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['command'], message: "stdio transport requires 'command'" });
    }
    if (config.transport !== 'stdio' && !config.url) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: `${config.transport} transport requires 'url'` });
    }
    if (config.hosting === 'remote' && config.transport === 'stdio') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['hosting'], message: 'remote servers cannot use the stdio transport' });
    }
  })
  .transform(config => ({
    ...config,
    hosting: config.hosting ?? defaultHosting(config.transport),
  }));

export type ServerConfigInput = z.input<typeof ServerConfigSchema>;

export interface ServerConfig {
  readonly name: string;
  readonly accessibility: Accessibility;
  readonly hosting: Hosting;
  readonly transport: TransportKind;
  readonly command?: string;
  readonly args: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
  readonly cwd?: string;
  readonly url?: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly timeout?: number;
  readonly authConfig?: AuthSettings;
  readonly description?: string;
  readonly tags: readonly string[];
  readonly enabled: boolean;
  /** Entries that live only as long as the process (self-hosted servers); never persisted. */
  readonly ephemeral: boolean;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Validate an untyped descriptor (from a file, a persisted registry, a caller).
 *
 * @throws {ConfigurationError} when the descriptor breaks a schema rule or invariant
 */
export function parseServerConfig(input: unknown): ServerConfig {
  const result = ServerConfigSchema.safeParse(input);
  if (!result.success) {
    const name = typeof input === 'object' && input !== null && 'name' in input ? String(input.name) : '(unnamed)';
    throw new ConfigurationError(`Invalid server config '${name}': ${describeIssues(result.error)}`);
  }
  const config: ServerConfig = result.data;
  return Object.freeze(config);
}

export function createServerConfig(input: ServerConfigInput): ServerConfig {
  return parseServerConfig(input);
}

export function isServerConfig(value: ServerConfig | ServerConfigInput): value is ServerConfig {
  return Object.isFrozen(value) && typeof value.hosting === 'string' && Array.isArray(value.tags);
}
