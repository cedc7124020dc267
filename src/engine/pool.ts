/**
 * Bounded worker pool for per-node units.
 */

import { availableParallelism } from "node:os";

/** Upper bound on workers per tier, whatever the host reports. */
export const MAX_PARALLEL_CAP = 32;

/**
 * Effective concurrency ceiling: non-positive or missing values mean "host
 * parallelism", and every value is capped at {@link MAX_PARALLEL_CAP}.
 */
export function resolveMaxParallel(requested?: number): number {
  const base =
    requested === undefined || !Number.isFinite(requested) || requested <= 0
      ? availableParallelism()
      : Math.floor(requested);
  return Math.max(1, Math.min(base, MAX_PARALLEL_CAP));
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 *
 * Results land in the slot of their item, so the output order is the input order
 * whatever order the units finish in. A rejected unit rejects the whole run; callers
 * that want to keep going catch inside `worker`.
 */
export async function runPooled<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  concurrency: number,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let nextIndex = 0;

  const workers = Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, async () => {
    while (nextIndex < items.length) {
      const idx = nextIndex++;
      results[idx] = await worker(items[idx], idx);
    }
  });

  await Promise.all(workers);
  return results;
}
