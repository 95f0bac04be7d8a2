import { setTimeout as delay } from 'timers/promises';
import { getErrorMessage, getErrorStatus } from './error-utils.js';

export type Sleep = (ms: number) => Promise<void>;

export interface RetryPolicy {
  /** One entry per retry; the delay before that retry in milliseconds */
  delaysMs: readonly number[];
  shouldRetry: (error: unknown) => boolean;
  sleep?: Sleep;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export function isRateLimitError(error: unknown): boolean {
  if (!error) return false;

  const status = getErrorStatus(error);
  if (status === 429) return true;

  const message = getErrorMessage(error).toLowerCase();
  return message.includes('rate limit') || message.includes('too many requests');
}

/**
 * Run `fn`, retrying while `shouldRetry` accepts the failure and delays remain.
 * The last failure is rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  const sleep = policy.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= policy.delaysMs.length || !policy.shouldRetry(error)) {
        throw error;
      }

      const delayMs = policy.delaysMs[attempt];
      policy.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs);
    }
  }
}
