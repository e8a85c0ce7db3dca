/**
 * Bounded task pool.
 *
 * Runs `worker` over `items` with at most `concurrency` calls in flight. Each
 * lane pulls the next item only after its current one settles, so no more than
 * `concurrency` promises ever exist at once. Results reach `onSettled` in
 * completion order; JavaScript runs each callback to completion, so the
 * consumer sees one result at a time.
 */

export interface PoolResult<T> {
  /** Items never handed to a worker because the signal aborted first */
  notStarted: T[]
}

export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<R>,
  onSettled: (result: R, item: T) => void,
  signal?: AbortSignal
): Promise<PoolResult<T>> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Pool concurrency must be a positive integer, got ${concurrency}`)
  }

  let next = 0

  const lane = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const item = items[next++]
      const result = await worker(item)
      onSettled(result, item)
    }
  }

  const laneCount = Math.min(concurrency, items.length)
  await Promise.all(Array.from({ length: laneCount }, () => lane()))

  return { notStarted: items.slice(next) }
}
