import { describe, expect, it, vi } from "vitest"
import { promisePool } from "./pool"

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms))
}

describe("promisePool", () => {
  it("keeps results in task order", async () => {
    const tasks = [30, 5, 15].map((ms, i) => async () => {
      await delay(ms)
      return i
    })
    expect(await promisePool(3, tasks)).toEqual([0, 1, 2])
  })

  it("never exceeds the concurrency limit", async () => {
    let active = 0
    let peak = 0
    const tasks = Array.from({ length: 6 }, () => async () => {
      active++
      peak = Math.max(peak, active)
      await delay(5)
      active--
      return true
    })
    await promisePool(2, tasks)
    expect(peak).toBe(2)
  })

  it("reports each finished item", async () => {
    const onItem = vi.fn()
    await promisePool(1, [async () => "a", async () => "b"], onItem)
    expect(onItem.mock.calls).toEqual([
      ["a", 0],
      ["b", 1],
    ])
  })

  it("rejects a concurrency below one", async () => {
    await expect(promisePool(0, [])).rejects.toThrow("Concurrency must be at least 1")
  })

  it("rejects a fractional concurrency", async () => {
    await expect(promisePool(1.5, [])).rejects.toThrow("Concurrency must be at least 1")
  })

  it("returns an empty list for no jobs", async () => {
    expect(await promisePool(4, [])).toEqual([])
  })

  it("starts no further jobs after one fails", async () => {
    const started: number[] = []
    const jobs = [0, 1, 2, 3].map((i) => async () => {
      started.push(i)
      await delay(5)
      if (i === 0) throw new Error("job 0 failed")
      return i
    })
    await expect(promisePool(1, jobs)).rejects.toThrow("job 0 failed")
    await delay(20)
    expect(started).toEqual([0])
  })
})
