export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  factor?: number;
  jitterMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (input: { attempt: number; nextDelayMs: number; error: unknown }) => Promise<void> | void;
  sleep?: Sleep;
  random?: () => number;
}

export function backoffDelay(attempt: number, opts: RetryOptions, random: () => number): number {
  const factor = opts.factor ?? 2;
  const jitterMs = opts.jitterMs ?? 0;
  const exponential = opts.baseDelayMs * factor ** (attempt - 1);
  const bounded = Math.min(exponential, opts.maxDelayMs ?? exponential);
  const jitter = Math.floor(random() * jitterMs);
  return Math.max(0, Math.floor(bounded + jitter));
}

export async function retryWithBackoff<T>(
  work: (attempt: number) => Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const sleep = opts.sleep ?? defaultSleep;
  const random = opts.random ?? Math.random;

  let attempt = 0;

  while (true) {
    attempt += 1;

    try {
      return await work(attempt);
    } catch (error) {
      if (attempt >= opts.maxAttempts || (opts.shouldRetry && !opts.shouldRetry(error))) {
        throw error;
      }

      const nextDelayMs = backoffDelay(attempt, opts, random);

      await opts.onRetry?.({ attempt, nextDelayMs, error });
      await sleep(nextDelayMs);
    }
  }
}

export class TimeoutElapsedError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutElapsedError';
  }
}

/**
 * Rejects with TimeoutElapsedError when the work does not settle in time.
 * The underlying promise keeps running; callers treat its outcome as unknown.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutElapsedError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
