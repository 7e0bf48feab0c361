// Bounded worker pool. Runs fn over items with at most `concurrency` calls in
// flight and returns the results in input order.

export async function mapWithConcurrency<T, R>({
  items,
  concurrency,
  fn,
}: {
  items: readonly T[]
  concurrency: number
  fn: (item: T, index: number) => Promise<R>
}): Promise<R[]> {
  const results = new Array<R>(items.length)
  let nextIndex = 0

  const worker = async () => {
    while (nextIndex < items.length) {
      const index = nextIndex++
      const item = items[index]
      if (item === undefined) continue
      results[index] = await fn(item, index)
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, items.length))
  await Promise.all(Array.from({ length: workerCount }, () => worker()))
  return results
}
