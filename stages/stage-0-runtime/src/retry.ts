import { ToolTimeoutError } from "./errors.js";
import type { RetryOptions } from "./types.js";

const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 2,
  backoffMs: 200,
  maxBackoffMs: 2000,
  jitter: 0.2,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function withJitter(value: number, jitter: number): number {
  const delta = value * jitter;
  return value + (Math.random() * 2 - 1) * delta;
}

export function computeBackoff(attempt: number, options: RetryOptions): number {
  if (options.backoffMs <= 0) {
    return 0;
  }
  const rawBackoff = options.backoffMs * Math.pow(2, attempt - 1);
  const cappedBackoff = Math.min(rawBackoff, options.maxBackoffMs ?? rawBackoff);
  const delay = options.jitter
    ? withJitter(cappedBackoff, options.jitter)
    : cappedBackoff;
  return Math.max(0, delay);
}

/**
 * Run `fn` until it resolves or `maxRetries` additional attempts have failed.
 * `fn` receives the 1-based attempt number. The last error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: Partial<RetryOptions>,
  shouldRetry: (error: unknown) => boolean = () => true
): Promise<T> {
  const retry: RetryOptions = { ...DEFAULT_RETRY, ...(options ?? {}) };
  let attempt = 0;

  while (true) {
    attempt += 1;
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt > retry.maxRetries || !shouldRetry(error)) {
        throw error;
      }
      retry.onRetry?.(error, attempt);
      const delay = computeBackoff(attempt, retry);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
}

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs`; the returned
 * promise rejects with ToolTimeoutError at that point. A non-positive timeout
 * disables the timer.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  if (!(timeoutMs > 0)) {
    return fn(controller.signal);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new ToolTimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
