/**
 * Retry helper for the per-video routine.
 * Retries only what `shouldRetry` accepts, waiting a fixed delay between attempts.
 */

import { setTimeout as sleep } from "timers/promises";

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  label: string;
  shouldRetry: (error: unknown) => boolean;
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (attempt >= attempts || !options.shouldRetry(error)) {
        throw error;
      }
      console.warn(
        `[retry] ${options.label} [${attempt}/${attempts}] failed, retrying in ${options.delayMs / 1000}s: ${message}`
      );
      if (options.delayMs > 0) {
        await sleep(options.delayMs);
      }
    }
  }
}
