export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Exponential: base * 2^(retry - 1), capped. `retry` counts from 1. */
export function calculateBackoffMs(retry: number, policy: BackoffPolicy): number {
  const backoff = policy.baseDelayMs * Math.pow(2, Math.max(0, retry - 1));
  return Math.min(backoff, policy.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class DeliveryTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Delivery timed out after ${timeoutMs}ms`);
    this.name = 'DeliveryTimeoutError';
  }
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts. The
 * underlying work is not cancelled when it ignores the signal.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
