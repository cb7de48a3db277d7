import { describe, expect, it } from '@jest/globals';
import { createServerState, FakeConnector, textResult, tool } from '../../test/helpers/fake-connector.js';
import { TimeoutError } from '../errors.js';
import { ClientExecutor } from './client-executor.js';

describe('ClientExecutor', () => {
  it('opens and closes a session for every call', async () => {
    const state = createServerState({ tools: [tool('read')] });
    const executor = new ClientExecutor(new FakeConnector('files', state));

    await executor.listTools();
    await executor.listPrompts();

    expect(state.connects).toBe(2);
    expect(state.closes).toBe(2);
  });

  it('closes the session when the work fails', async () => {
    const state = createServerState();
    const executor = new ClientExecutor(new FakeConnector('files', state));

    await expect(
      executor.run('Broken work', async () => {
        throw new Error('bad response');
      }),
    ).rejects.toThrow('bad response');
    expect(state.closes).toBe(1);
  });

  it('passes tool arguments through', async () => {
    const state = createServerState({ callTool: (name, args) => textResult(`${name}:${String(args.path)}`) });
    const executor = new ClientExecutor(new FakeConnector('files', state));

    await expect(executor.invokeTool('read', { path: '/tmp/a' })).resolves.toMatchObject({ isError: false, text: 'read:/tmp/a' });
  });

  it('bounds connect and work by one deadline', async () => {
    const state = createServerState({ connectDelayMs: 200 });
    const executor = new ClientExecutor(new FakeConnector('files', state), 20);

    await expect(executor.listTools()).rejects.toThrow(new TimeoutError("tools/list on 'files'", 20));
  });

  it('reports the tool count from testConnection', async () => {
    const executor = new ClientExecutor(new FakeConnector('files', createServerState({ tools: [tool('a'), tool('b'), tool('c')] })));

    await expect(executor.testConnection()).resolves.toEqual({ status: 'success', serverName: 'files', data: { toolCount: 3 } });
  });
});
