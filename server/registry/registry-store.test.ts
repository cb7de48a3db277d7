import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { RegistryStore, type PersistedServer } from './registry-store.js';

const files: PersistedServer = {
  name: 'files',
  transport: 'stdio',
  enabled: true,
  command: 'file-server',
  args: ['--root', '/srv'],
  lastDiscovery: '2026-01-01T00:00:00.000Z',
  capabilities: { tools: [{ name: 'read', inputSchema: { type: 'object' } }], resources: [], prompts: [] },
};

describe('RegistryStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'registry-store-'));
    filePath = path.join(dir, 'nested', 'registry.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('treats a missing file as an empty registry', async () => {
    await expect(new RegistryStore(filePath).load()).resolves.toEqual([]);
  });

  it('round-trips saved servers', async () => {
    const store = new RegistryStore(filePath);

    await store.save([files]);

    await expect(new RegistryStore(filePath).load()).resolves.toEqual([files]);
    const document: { updated?: unknown } = JSON.parse(await fs.readFile(filePath, 'utf8'));
    expect(typeof document.updated).toBe('string');
  });

  it('applies queued writes in order', async () => {
    const store = new RegistryStore(filePath);
    const search: PersistedServer = { name: 'search', transport: 'sse', enabled: true, url: 'https://search.example.com/sse' };

    const first = store.save([files]);
    const second = store.save([files, search]);
    await Promise.all([first, second]);
    await store.flush();

    const loaded = await store.load();
    expect(loaded.map(server => server.name)).toEqual(['files', 'search']);
  });

  it('skips invalid entries', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify({ servers: [files, { name: 'bad', transport: 'carrier-pigeon' }] }));

    await expect(new RegistryStore(filePath).load()).resolves.toEqual([files]);
  });

  it('ignores a file that is not JSON', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '{ not json');

    await expect(new RegistryStore(filePath).load()).resolves.toEqual([]);
  });

  it('loads an unreadable path as an empty registry', async () => {
    await fs.mkdir(filePath, { recursive: true });

    await expect(new RegistryStore(filePath).load()).resolves.toEqual([]);
  });
});
