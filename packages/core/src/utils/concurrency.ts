/**
 * Maps items through an async worker with at most `limit` calls in flight.
 * Results keep input order. The first rejection rejects the run.
 *
 * @example
 * const placed = await runWithConcurrency(orders, 4, (order) => adapter.submitOrder(order))
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++
      const item = items[index]
      if (item === undefined) continue
      results[index] = await worker(item, index)
    }
  }

  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => lane())
  await Promise.all(lanes)
  return results
}
