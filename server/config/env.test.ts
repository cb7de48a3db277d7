import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { loadEnvironment } from './env.js';

describe('loadEnvironment', () => {
  const originalCwd = process.cwd();
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mesh-env-'));
    await fs.writeFile(path.join(dir, '.env'), 'MESH_ENV_TEST_LEVEL=debug\nMESH_ENV_TEST_HOST=from-file\n');
    process.env.MESH_ENV_TEST_HOST = 'from-process';
    process.chdir(dir);
  });

  afterEach(async () => {
    process.chdir(originalCwd);
    delete process.env.MESH_ENV_TEST_LEVEL;
    delete process.env.MESH_ENV_TEST_HOST;
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads .env from the working directory without overriding the process environment', () => {
    loadEnvironment();

    expect(process.env.MESH_ENV_TEST_LEVEL).toBe('debug');
    expect(process.env.MESH_ENV_TEST_HOST).toBe('from-process');
  });
});
