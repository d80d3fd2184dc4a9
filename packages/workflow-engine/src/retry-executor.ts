export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  retryableErrorCodes: string[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  retryableErrorCodes: ['NETWORK_ERROR', 'TIMEOUT', 'RATE_LIMIT', 'ECONNRESET', '503', '429'],
};

export interface RetryExecutorDependencies {
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
  random(): number;
}

export type AttemptResult<T> =
  | { kind: 'success'; value: T }
  | { kind: 'failure'; retryable: boolean; value: T };

export interface RetryRunResult<T> {
  value: T;
  attempts: number;
  succeeded: boolean;
  exhausted: boolean;
}

const defaultDependencies: RetryExecutorDependencies = {
  sleep: (ms, signal) =>
    new Promise((resolve) => {
      const timer = setTimeout(resolve, ms);
      signal?.addEventListener(
        'abort',
        () => {
          clearTimeout(timer);
          resolve();
        },
        { once: true },
      );
    }),
  random: () => Math.random(),
};

export function getErrorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return null;
  }

  return typeof error.code === 'string' ? error.code : null;
}

export class RetryExecutor {
  constructor(private readonly dependencies: RetryExecutorDependencies = defaultDependencies) {}

  getBackoffDelayMs(attempt: number, policy: RetryPolicy): number {
    const exponential = policy.initialDelayMs * 2 ** (attempt - 1);
    const capped = Math.min(exponential, policy.maxDelayMs);
    const jitter = Math.floor(capped * 0.1 * this.dependencies.random());
    return Math.min(capped + jitter, policy.maxDelayMs);
  }

  isRetryableError(error: unknown, policy: RetryPolicy): boolean {
    const code = getErrorCode(error);
    return code !== null && policy.retryableErrorCodes.includes(code);
  }

  /**
   * Runs `attempt` until it succeeds, reports a non-retryable failure, the
   * attempt budget is spent, or `signal` aborts. The last attempt's value is
   * returned either way; callers decide what a failure means.
   */
  async run<T>(
    attempt: (attemptNumber: number) => Promise<AttemptResult<T>>,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    signal?: AbortSignal,
  ): Promise<RetryRunResult<T>> {
    let attemptNumber = 1;

    for (;;) {
      const result = await attempt(attemptNumber);
      if (result.kind === 'success') {
        return { value: result.value, attempts: attemptNumber, succeeded: true, exhausted: false };
      }

      const outOfAttempts = attemptNumber >= policy.maxAttempts;
      if (!result.retryable || outOfAttempts || signal?.aborted === true) {
        return {
          value: result.value,
          attempts: attemptNumber,
          succeeded: false,
          exhausted: result.retryable && outOfAttempts,
        };
      }

      await this.dependencies.sleep(this.getBackoffDelayMs(attemptNumber, policy), signal);
      if (signal?.aborted === true) {
        return { value: result.value, attempts: attemptNumber, succeeded: false, exhausted: false };
      }

      attemptNumber += 1;
    }
  }
}
