import { describe, expect, it, jest } from '@jest/globals';
import { TimeoutError } from '../errors.js';
import { withDeadline } from './deadline.js';

function delay<T>(ms: number, value: T): Promise<T> {
  return new Promise(resolve => setTimeout(() => resolve(value), ms));
}

describe('withDeadline', () => {
  it('returns the result of work that finishes in time', async () => {
    await expect(withDeadline(200, 'Quick work', async () => 'done')).resolves.toBe('done');
  });

  it('passes work errors through', async () => {
    await expect(
      withDeadline(200, 'Failing work', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
  });

  it('rejects with TimeoutError and aborts the signal', async () => {
    let seen: AbortSignal | undefined;

    const result = withDeadline(20, 'Slow work', signal => {
      seen = signal;
      return delay(200, 'late');
    });

    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow('Slow work timed out after 20ms');
    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBeInstanceOf(TimeoutError);
  });

  it('releases a value that arrives after the deadline', async () => {
    const release = jest.fn<(value: string) => void>();

    await expect(withDeadline(10, 'Slow work', () => delay(50, 'session'), { release })).rejects.toBeInstanceOf(TimeoutError);
    expect(release).not.toHaveBeenCalled();

    await delay(100, undefined);
    expect(release).toHaveBeenCalledWith('session');
  });
});
