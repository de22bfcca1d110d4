import { InfrastructureError, throwIfAborted, toCancelled } from '../errors.js';
import { sleep } from '../../utils/sleep.js';
import type { RetryPolicy } from './types.js';

export interface RetryHooks {
  onRetry?: (args: { operation: string; attempt: number; delayMs: number; error: unknown }) => void;
  /** Injected in tests. */
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exp = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jitter = Math.min(1, Math.max(0, policy.jitter));
  return Math.round(exp * (1 - jitter + jitter * random()));
}

/**
 * Runs a backend call, retrying thrown errors with exponential backoff and jitter.
 * Aborts are never retried. Exhaustion becomes an InfrastructureError.
 */
export async function withInfraRetry<T>(
  operation: string,
  policy: RetryPolicy,
  fn: () => Promise<T>,
  signal?: AbortSignal,
  hooks: RetryHooks = {}
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal);
    try {
      return await fn();
    } catch (err) {
      if (signal?.aborted) throw toCancelled(signal);
      if (attempt >= maxAttempts) throw new InfrastructureError(operation, attempt, err);

      const delayMs = backoffDelay(policy, attempt, hooks.random);
      hooks.onRetry?.({ operation, attempt, delayMs, error: err });
      await wait(delayMs, signal);
    }
  }
}
