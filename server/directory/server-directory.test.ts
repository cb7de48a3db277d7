import { beforeEach, describe, expect, it } from '@jest/globals';
import { parseServerConfig } from './server-config.js';
import { ServerDirectory } from './server-directory.js';

const files = parseServerConfig({ name: 'files', transport: 'stdio', command: 'file-server', accessibility: 'internal' });
const search = parseServerConfig({ name: 'search', transport: 'sse', url: 'https://search.example.com/sse', accessibility: 'external' });
const hosted = parseServerConfig({
  name: 'echo',
  transport: 'streamable',
  url: 'http://127.0.0.1:9000/mcp',
  hosting: 'local',
  accessibility: 'internal',
});

describe('ServerDirectory', () => {
  let directory: ServerDirectory;

  beforeEach(() => {
    directory = new ServerDirectory();
    [files, search, hosted].forEach(config => directory.register(config));
  });

  it('looks servers up by name', () => {
    expect(directory.get('search')).toBe(search);
    expect(directory.get('missing')).toBeUndefined();
    expect(directory.has('echo')).toBe(true);
    expect(directory.size).toBe(3);
  });

  it('lists entries matching every filter', () => {
    expect(directory.list().map(config => config.name)).toEqual(['files', 'search', 'echo']);
    expect(directory.list({ accessibility: 'internal' }).map(config => config.name)).toEqual(['files', 'echo']);
    expect(directory.list({ accessibility: 'internal', transport: 'streamable' })).toEqual([hosted]);
    expect(directory.list({ hosting: 'remote' })).toEqual([search]);
  });

  it('replaces an entry registered under the same name', () => {
    const moved = parseServerConfig({ name: 'search', transport: 'streamable', url: 'https://search.example.com/mcp' });

    directory.register(moved);

    expect(directory.get('search')).toBe(moved);
    expect(directory.size).toBe(3);
  });

  it('removes entries', () => {
    expect(directory.remove('files')).toBe(true);
    expect(directory.remove('files')).toBe(false);
    expect(directory.has('files')).toBe(false);

    directory.clear();
    expect(directory.list()).toEqual([]);
  });
});
