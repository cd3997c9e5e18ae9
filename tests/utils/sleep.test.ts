import { describe, it, expect, vi, afterEach } from 'vitest';
import { sleep } from '../../src/utils/sleep.js';

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve after the delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('should reject with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);

    controller.abort(new Error('stop'));

    await expect(pending).rejects.toThrow('stop');
  });

  it('should reject immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('already'));

    await expect(sleep(60000, controller.signal)).rejects.toThrow('already');
  });
});
