/**
 * Concurrency Control
 *
 * Bounded worker pool with order-preserving results.
 */

/**
 * Process items with at most `concurrency` operations in flight.
 *
 * Workers drain a shared index; each result is stored at its item's
 * position, so the output order matches the input order regardless of
 * completion order.
 *
 * @template T - Type of input items
 * @template R - Type of result items
 * @param items - Items to process
 * @param fn - Async function applied to each item with its index
 * @param concurrency - Maximum concurrent operations (clamped to at least 1)
 * @returns Results in input order
 *
 * @example
 * ```typescript
 * const outcomes = await processWithConcurrency(inputs, (input) => runJob(input), 5);
 * // outcomes[i] belongs to inputs[i]
 * ```
 */
export async function processWithConcurrency<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number = 3
): Promise<R[]> {
  if (items.length === 0) {
    return [];
  }

  const effectiveConcurrency = Math.max(1, Math.floor(concurrency));

  // Pre-allocate to preserve order
  const results: R[] = new Array(items.length);

  let currentIndex = 0;

  async function processNext(): Promise<void> {
    while (currentIndex < items.length) {
      // Synchronous read-and-increment: no two workers share an index
      const index = currentIndex++;
      results[index] = await fn(items[index], index);
    }
  }

  const workerCount = Math.min(effectiveConcurrency, items.length);
  const workers = Array(workerCount)
    .fill(null)
    .map(() => processNext());

  await Promise.all(workers);

  return results;
}
