/**
 * Async helpers shared by the coordinator and the orchestrator
 */

import { OperationTimeoutError } from './errors';

export type Clock = () => number;

/**
 * Race a promise against a timer. A non-positive or non-finite timeout
 * disables the race. The losing promise keeps running; callers that can
 * cancel it should do so through their own AbortSignal.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  context: string
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new OperationTimeoutError(context, timeoutMs));
        }, timeoutMs);
      })
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Soft wall-clock budget for one pipeline run
 */
export class Deadline {
  readonly startedAt: number;
  readonly expiresAt: number;

  constructor(
    readonly budgetMs: number,
    private readonly now: Clock = Date.now
  ) {
    this.startedAt = now();
    this.expiresAt = this.startedAt + budgetMs;
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  expired(): boolean {
    return this.now() >= this.expiresAt;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function toSeconds(ms: number): number {
  return Math.round(ms) / 1000;
}
