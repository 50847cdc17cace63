import { describe, it, expect, vi, afterEach } from 'vitest';
import { withTimeout } from '../../../src/utils/timeout.js';
import { TimeoutError } from '../../../src/kernel/errors.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 100, 'lookup')).resolves.toBe(42);
  });

  it('should pass rejections through', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 100, 'lookup')).rejects.toThrow('boom');
  });

  it('should reject with TimeoutError when the promise is too slow', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 100, 'lookup');
    const assertion = expect(pending).rejects.toMatchObject({
      name: 'TimeoutError',
      operation: 'lookup',
      timeoutMs: 100,
      message: 'lookup timed out after 100ms',
    });

    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });

  it('should clear its timer once the promise settles', async () => {
    vi.useFakeTimers();

    await withTimeout(Promise.resolve('done'), 100, 'lookup');

    expect(vi.getTimerCount()).toBe(0);
  });

  it('should produce an instance of TimeoutError', async () => {
    const error = await withTimeout(new Promise<never>(() => undefined), 5, 'render').catch(
      (caught: unknown) => caught
    );
    expect(error).toBeInstanceOf(TimeoutError);
  });
});
