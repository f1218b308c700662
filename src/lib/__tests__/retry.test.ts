import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AuthError, TransportError } from '../errors';
import { RetryPolicy } from '../retry';

describe('RetryPolicy', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('retries transient failures with exponential backoff', async () => {
    const sleep = vi.fn(async () => undefined);
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 500, sleep });
    const task = vi
      .fn()
      .mockRejectedValueOnce(new TransportError('network down'))
      .mockRejectedValueOnce(new TransportError('busy', { httpStatus: 503 }))
      .mockResolvedValueOnce('ok');

    await expect(policy.run('test', task)).resolves.toBe('ok');
    expect(task).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[500], [1000]]);
  });

  it('gives up after the last attempt', async () => {
    const sleep = vi.fn(async () => undefined);
    const policy = new RetryPolicy({ maxAttempts: 2, sleep });
    const error = new TransportError('busy', { httpStatus: 502 });
    const task = vi.fn().mockRejectedValue(error);

    await expect(policy.run('test', task)).rejects.toBe(error);
    expect(task).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('does not retry auth failures or client errors', async () => {
    const sleep = vi.fn(async () => undefined);
    const policy = new RetryPolicy({ sleep });

    const auth = vi.fn().mockRejectedValue(new AuthError('bad credentials'));
    await expect(policy.run('login', auth)).rejects.toBeInstanceOf(AuthError);
    expect(auth).toHaveBeenCalledTimes(1);

    const badRequest = vi.fn().mockRejectedValue(new TransportError('bad', { httpStatus: 400 }));
    await expect(policy.run('get', badRequest)).rejects.toBeInstanceOf(TransportError);
    expect(badRequest).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('caps the delay', () => {
    const policy = new RetryPolicy({ baseDelayMs: 1000, factor: 10, maxDelayMs: 5000 });
    expect(policy.delayFor(0)).toBe(1000);
    expect(policy.delayFor(1)).toBe(5000);
  });
});
