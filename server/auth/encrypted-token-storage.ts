/**
 * Encrypted Token Storage
 *
 * Persists tokens to a JSON file where every entry is an AES-256-GCM encrypted blob of
 * the serialized {@link StoredToken}. The 32-byte key is derived from a passphrase with
 * SHA-256. Blob layout (base64): 12-byte IV, 16-byte auth tag, ciphertext.
 *
 * A blob that fails to decrypt (wrong key, tampering, truncation) is logged and reported
 * as missing, so the caller falls back to refreshing or re-authorizing.
 */

import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'node:crypto';
import fs from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { logger } from '../observability/logger.js';
import { isMissingFile, writeFileAtomic } from '../utils/files.js';
import { normalizeResourceUrl } from './resource-url.js';
import { stampToken, type OAuthTokenSet, type StoredToken, type TokenStorage } from './token-storage.js';

const IV_BYTES = 12;
const TAG_BYTES = 16;
const ALGORITHM = 'aes-256-gcm';

const StoredTokenSchema = z.object({
  accessToken: z.string(),
  tokenType: z.string(),
  refreshToken: z.string().optional(),
  scope: z.string().optional(),
  expiresIn: z.number().optional(),
  issuedAt: z.number(),
  expiresAt: z.number().optional(),
});

const TokenFileSchema = z.record(z.string());

export interface EncryptedTokenStorageOptions {
  filePath: string;
  secret: string;
}

export function deriveKey(secret: string): Buffer {
  return createHash('sha256').update(secret).digest();
}

export function encryptBlob(plaintext: string, key: Buffer): string {
  const iv = randomBytes(IV_BYTES);
  const cipher = createCipheriv(ALGORITHM, key, iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]).toString('base64');
}

export function decryptBlob(blob: string, key: Buffer): string {
  const raw = Buffer.from(blob, 'base64');
  if (raw.length < IV_BYTES + TAG_BYTES) {
    throw new Error('Encrypted token blob is truncated');
  }
  const iv = raw.subarray(0, IV_BYTES);
  const tag = raw.subarray(IV_BYTES, IV_BYTES + TAG_BYTES);
  const decipher = createDecipheriv(ALGORITHM, key, iv);
  decipher.setAuthTag(tag);
  return Buffer.concat([decipher.update(raw.subarray(IV_BYTES + TAG_BYTES)), decipher.final()]).toString('utf8');
}

export class EncryptedTokenStorage implements TokenStorage {
  private readonly key: Buffer;
  private readonly filePath: string;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: EncryptedTokenStorageOptions) {
    if (options.secret.length < 16) {
      throw new ConfigurationError('Token encryption secret must be at least 16 characters');
    }
    this.key = deriveKey(options.secret);
    this.filePath = options.filePath;
  }

  async get(resourceUrl: string): Promise<StoredToken | null> {
    const entries = await this.readEntries();
    const blob = entries[normalizeResourceUrl(resourceUrl)];
    if (blob === undefined) {
      return null;
    }

    try {
      const decoded: unknown = JSON.parse(decryptBlob(blob, this.key));
      return StoredTokenSchema.parse(decoded);
    } catch (error) {
      logger.error('Failed to decrypt stored token', {
        resource: resourceUrl,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async store(resourceUrl: string, tokens: OAuthTokenSet | StoredToken): Promise<StoredToken> {
    const stored = stampToken(tokens);
    const key = normalizeResourceUrl(resourceUrl);
    const blob = encryptBlob(JSON.stringify(stored), this.key);
    await this.update(entries => {
      entries[key] = blob;
    });
    return stored;
  }

  async remove(resourceUrl: string): Promise<void> {
    const key = normalizeResourceUrl(resourceUrl);
    await this.update(entries => {
      delete entries[key];
    });
  }

  private update(mutate: (entries: Record<string, string>) => void): Promise<void> {
    const next = this.writeChain.then(async () => {
      const entries = await this.readEntries();
      mutate(entries);
      await writeFileAtomic(this.filePath, JSON.stringify(entries, null, 2), 0o600);
    });
    this.writeChain = next.catch(error => {
      logger.error('Failed to write token file', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    });
    return next;
  }

  private async readEntries(): Promise<Record<string, string>> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      logger.warn('Token file is not valid JSON, ignoring it', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
    const parsed = TokenFileSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Token file has an unexpected shape, ignoring it', { filePath: this.filePath });
      return {};
    }
    return parsed.data;
  }
}
