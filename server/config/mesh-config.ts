/**
 * Process-level settings, read from the environment (and `.env` through dotenv).
 *
 * Values are parsed once with zod and cached; call {@link resetMeshConfig} in tests that
 * need a different environment.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { LOG_LEVELS, type LogLevel } from '../observability/logger.js';
import { loadEnvironment } from './env.js';

export const DEFAULT_REDIRECT_URI = 'http://localhost:8080/callback';

const ConnectionPolicySchema = z.enum(['persistent', 'ephemeral']);
export type ConnectionPolicy = z.infer<typeof ConnectionPolicySchema>;

const MeshEnvSchema = z.object({
  MESH_REGISTRY_FILE: z.string().min(1).optional(),
  MESH_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(300),
  MESH_DISCOVERY_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),
  MESH_REQUEST_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),
  MESH_CONNECTION_POLICY: ConnectionPolicySchema.default('persistent'),
  MESH_HOST: z.string().min(1).default('localhost'),
  MESH_SHUTDOWN_GRACE_MS: z.coerce.number().int().nonnegative().default(5000),
  MESH_TOKEN_ENCRYPTION_KEY: z.string().min(16).optional(),
  MESH_OAUTH_REDIRECT_URI: z.string().url().default(DEFAULT_REDIRECT_URI),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface MeshConfig {
  registryFile?: string;
  cacheTtlSeconds: number;
  discoveryTimeoutSeconds: number;
  requestTimeoutSeconds: number;
  connectionPolicy: ConnectionPolicy;
  defaultHost: string;
  shutdownGraceMs: number;
  tokenEncryptionKey?: string;
  oauthRedirectUri: string;
  logLevel: LogLevel;
}

let cached: MeshConfig | undefined;

/**
 * Parse a raw environment into a {@link MeshConfig}. Empty strings count as unset.
 */
export function parseMeshConfig(env: NodeJS.ProcessEnv): MeshConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const result = MeshEnvSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment configuration: ${issues.join('; ')}`);
  }

  const parsed = result.data;
  return {
    registryFile: parsed.MESH_REGISTRY_FILE,
    cacheTtlSeconds: parsed.MESH_CACHE_TTL_SECONDS,
    discoveryTimeoutSeconds: parsed.MESH_DISCOVERY_TIMEOUT_SECONDS,
    requestTimeoutSeconds: parsed.MESH_REQUEST_TIMEOUT_SECONDS,
    connectionPolicy: parsed.MESH_CONNECTION_POLICY,
    defaultHost: parsed.MESH_HOST,
    shutdownGraceMs: parsed.MESH_SHUTDOWN_GRACE_MS,
    tokenEncryptionKey: parsed.MESH_TOKEN_ENCRYPTION_KEY,
    oauthRedirectUri: parsed.MESH_OAUTH_REDIRECT_URI,
    logLevel: parsed.LOG_LEVEL,
  };
}

export function getMeshConfig(env: NodeJS.ProcessEnv = process.env): MeshConfig {
  loadEnvironment();
  cached ??= parseMeshConfig(env);
  return cached;
}

export function resetMeshConfig(): void {
  cached = undefined;
}
