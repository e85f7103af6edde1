import { retryWithBackoff, Clock, RetryPolicy } from './retry';
import { RetryDeadlineError } from './errors';

/**
 * Virtual clock: sleeping advances time instantly
 */
function createVirtualClock(): Clock & { sleeps: number[] } {
  let now = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      now += ms;
    },
  };
}

const pollPolicy: RetryPolicy = {
  initialDelayMs: 100,
  multiplier: 2,
  maxDelayMs: 2500,
  deadlineMs: 30000,
};

describe('retryWithBackoff', () => {
  it('should return the first successful result without sleeping', async () => {
    const clock = createVirtualClock();
    const operation = jest.fn().mockResolvedValue('done');

    await expect(retryWithBackoff(operation, pollPolicy, { clock })).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should grow the wait by the multiplier until the cap', async () => {
    const clock = createVirtualClock();
    const operation = jest.fn()
      .mockRejectedValueOnce(new Error('not yet'))
      .mockRejectedValueOnce(new Error('not yet'))
      .mockRejectedValueOnce(new Error('not yet'))
      .mockRejectedValueOnce(new Error('not yet'))
      .mockRejectedValueOnce(new Error('not yet'))
      .mockRejectedValueOnce(new Error('not yet'))
      .mockResolvedValue('found');

    await expect(retryWithBackoff(operation, pollPolicy, { clock })).resolves.toBe('found');
    expect(clock.sleeps).toEqual([100, 200, 400, 800, 1600, 2500]);
    expect(operation).toHaveBeenLastCalledWith(7);
  });

  it('should stop exactly at the deadline with RetryDeadlineError', async () => {
    const clock = createVirtualClock();
    const operation = jest.fn<Promise<never>, [number]>().mockRejectedValue(new Error('missing'));

    const error = await retryWithBackoff(operation, pollPolicy, { clock }).catch(e => e);

    expect(error).toBeInstanceOf(RetryDeadlineError);
    expect(error.attempts).toBe(17);
    expect(error.elapsedMs).toBe(30000);
    expect(error.lastError).toEqual(new Error('missing'));
    expect(clock.now()).toBe(30000);
    expect(Math.max(...clock.sleeps)).toBe(2500);
    // last wait is shortened so the loop never runs past the deadline
    expect(clock.sleeps[clock.sleeps.length - 1]).toBe(1900);
  });

  it('should rethrow immediately when shouldRetry rejects the error', async () => {
    const clock = createVirtualClock();
    const fatal = new Error('fatal');
    const operation = jest.fn().mockRejectedValue(fatal);

    await expect(
      retryWithBackoff(operation, pollPolicy, { clock, shouldRetry: () => false }),
    ).rejects.toBe(fatal);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should report each retry to onRetry', async () => {
    const clock = createVirtualClock();
    const onRetry = jest.fn();
    const operation = jest.fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockResolvedValue(1);

    await retryWithBackoff(operation, pollPolicy, { clock, onRetry });

    expect(onRetry).toHaveBeenCalledWith({ attempt: 1, delayMs: 100, error: new Error('first') });
  });
});
