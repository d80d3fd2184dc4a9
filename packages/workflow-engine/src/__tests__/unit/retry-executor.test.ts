import { describe, expect, it, vi } from 'vitest';

import { DEFAULT_RETRY_POLICY, RetryExecutor, getErrorCode } from '../../index.js';

describe('retry executor', () => {
  it('backs off exponentially with bounded jitter', () => {
    const executor = new RetryExecutor({ sleep: async () => undefined, random: () => 0.5 });

    expect(executor.getBackoffDelayMs(1, DEFAULT_RETRY_POLICY)).toBe(1050);
    expect(executor.getBackoffDelayMs(3, DEFAULT_RETRY_POLICY)).toBe(4200);
    expect(executor.getBackoffDelayMs(10, DEFAULT_RETRY_POLICY)).toBe(30000);
  });

  it('classifies errors by code', () => {
    const executor = new RetryExecutor();

    expect(getErrorCode({ code: 'ECONNRESET' })).toBe('ECONNRESET');
    expect(getErrorCode(new Error('plain'))).toBeNull();
    expect(executor.isRetryableError({ code: '503' }, DEFAULT_RETRY_POLICY)).toBe(true);
    expect(executor.isRetryableError({ code: 'INVALID_INPUT' }, DEFAULT_RETRY_POLICY)).toBe(false);
  });

  it('sleeps between retryable attempts and reports exhaustion', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const executor = new RetryExecutor({ sleep, random: () => 0 });

    const result = await executor.run<number>(
      async (attempt) => ({ kind: 'failure', retryable: true, value: attempt }),
      DEFAULT_RETRY_POLICY,
    );

    expect(result).toEqual({ value: 3, attempts: 3, succeeded: false, exhausted: true });
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([1000, 2000]);
  });

  it('stops at the first non-retryable failure', async () => {
    const executor = new RetryExecutor({ sleep: async () => undefined, random: () => 0 });

    const result = await executor.run<string>(async () => ({ kind: 'failure', retryable: false, value: 'bad input' }));

    expect(result).toEqual({ value: 'bad input', attempts: 1, succeeded: false, exhausted: false });
  });

  it('stops retrying once the signal aborts', async () => {
    const controller = new AbortController();
    const executor = new RetryExecutor({
      sleep: async () => {
        controller.abort();
      },
      random: () => 0,
    });

    const result = await executor.run<number>(
      async (attempt) => ({ kind: 'failure', retryable: true, value: attempt }),
      DEFAULT_RETRY_POLICY,
      controller.signal,
    );

    expect(result).toEqual({ value: 1, attempts: 1, succeeded: false, exhausted: false });
  });
});
