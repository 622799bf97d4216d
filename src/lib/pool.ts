/**
 * Runs evaluation jobs with at most `concurrency` in flight.
 *
 * Results keep job order. Once a job rejects, idle workers take no further
 * jobs and the pool rejects with that first error.
 * @param concurrency - Maximum number of jobs in flight.
 * @param jobs - Job thunks, started in array order.
 * @param onItem - Called as each job settles successfully.
 */
export async function promisePool<T>(
  concurrency: number,
  jobs: Array<() => Promise<T>>,
  onItem?: (value: T, index: number) => void,
): Promise<T[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("Concurrency must be at least 1")
  }

  const results: T[] = new Array(jobs.length)
  let next = 0
  let failed = false

  async function worker() {
    while (!failed && next < jobs.length) {
      const i = next++
      try {
        results[i] = await jobs[i]()
      } catch (err) {
        failed = true
        throw err
      }
      onItem?.(results[i], i)
    }
  }

  const workers = Math.min(concurrency, jobs.length)
  await Promise.all(Array.from({ length: workers }, () => worker()))
  return results
}
