// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import type { RetryPolicy } from "./config.js";
import { CancelledError, TimeoutError, isForensicError } from "./errors.js";

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Counting semaphore. Unlike a busy check, callers wait in FIFO order for a
 * free slot.
 */
export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
  }

  get inflight(): number {
    return this.active;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.waiters.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.waiters.shift();
    if (next) next();
  }
}

export interface TimeoutOptions {
  parent?: AbortSignal;
  /**
   * Wait for `fn` to settle after the deadline aborts its signal instead of
   * rejecting straight away. For work with side effects that must be either
   * finished or rolled back before the caller hears the result.
   */
  settle?: boolean;
}

/**
 * Runs `fn` under a deadline. The signal handed to `fn` is aborted when the
 * deadline passes or when `parent` aborts, so the operation can kill its child
 * process or close its stream.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions = {}
): Promise<T> {
  const { parent, settle = false } = options;
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(operation, timeoutMs);
      controller.abort(err);
      if (!settle) reject(err);
    }, timeoutMs);
  });

  try {
    const work = fn(controller.signal);
    return await (settle ? work : Promise.race([work, deadline]));
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  error: unknown;
}

/**
 * Retries only errors flagged `retryable`, with exponential backoff capped at
 * `maxDelayMs`. Returns the value and the number of attempts used.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  onRetry?: (event: RetryEvent) => void
): Promise<{ value: T; attempts: number }> {
  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await fn(attempt), attempts: attempt };
    } catch (error) {
      const retryable = isForensicError(error) && error.retryable;
      if (!retryable || attempt >= policy.attempts) {
        throw new RetryExhausted(error, attempt);
      }
      const delayMs = Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
      onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
    }
  }
}

/** Carries the attempt count alongside the final error. */
export class RetryExhausted extends Error {
  constructor(
    readonly error: unknown,
    readonly attempts: number
  ) {
    super(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Ordered map with at most `concurrency` tasks in flight. Results land at the
 * index of their input whatever order the tasks finish in. The first failure
 * stops new tasks from starting and is rethrown once the running ones settle.
 */
export async function mapOrdered<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failure: { error: unknown } | undefined;

  async function lane(): Promise<void> {
    while (!failure && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failure ??= { error };
      }
    }
  }

  const lanes = Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, lane);
  await Promise.all(lanes);
  if (failure) throw failure.error;
  return results;
}

export function throwIfAborted(signal: AbortSignal | undefined, what: string): void {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  if (isForensicError(reason)) throw reason;
  throw new CancelledError(`${what} cancelled`);
}
