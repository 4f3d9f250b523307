/**
 * Bounded-concurrency task pool with run-level cancellation
 */

import { CancellationError } from '../errors.js';

export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
}

/**
 * Combine a caller signal with an optional timeout
 */
export function createRunSignal(signal?: AbortSignal, timeoutMs?: number): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (signal) signals.push(signal);
  if (timeoutMs !== undefined) signals.push(AbortSignal.timeout(timeoutMs));

  if (signals.length <= 1) return signals[0];
  return AbortSignal.any(signals);
}

export function cancellationFrom(signal: AbortSignal): CancellationError {
  const cause: unknown = signal.reason;
  if (cause instanceof Error && cause.name === 'TimeoutError') {
    return new CancellationError('Analysis timed out', { cause });
  }
  return new CancellationError('Analysis cancelled', { cause });
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw cancellationFrom(signal);
}

/**
 * Run `worker` over every item with at most `concurrency` in flight. Each
 * worker writes only its own result slot. Once the signal aborts no new item
 * starts; in-flight items finish and the pool throws CancellationError.
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<R[]> {
  const { signal, onProgress } = options;
  throwIfCancelled(signal);

  const results = new Array<R>(items.length);
  const concurrency = Math.max(1, Math.min(options.concurrency, items.length));
  let next = 0;
  let completed = 0;

  await Promise.all(
    Array.from({ length: concurrency }, async () => {
      while (true) {
        const current = next++;
        if (current >= items.length || signal?.aborted) break;
        const item = items[current];
        if (item === undefined) break;

        results[current] = await worker(item, current);
        completed++;
        onProgress?.(completed, items.length);
      }
    })
  );

  throwIfCancelled(signal);
  return results;
}
