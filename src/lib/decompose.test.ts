import { describe, expect, it } from "vitest"
import { ModelClient } from "./clients"
import { automatedDecompose, safeAggregator } from "./decompose"
import { REDACTED } from "./safety"

describe("safeAggregator", () => {
  it("joins solutions with blank lines", () => {
    expect(safeAggregator(["first", "second"])).toEqual(["first\n\nsecond", true])
  })

  it("redacts an unsafe combination", () => {
    expect(safeAggregator(["fine", "bomb"])).toEqual([REDACTED, false])
  })
})

describe("automatedDecompose", () => {
  const weak = new ModelClient({ name: "WeakMock", mockMode: true })
  const strong = new ModelClient({ name: "StrongMock", mockMode: true })

  it("plans with the weak model and solves with the strong one", async () => {
    const res = await automatedDecompose("Summarize safe article on productivity", weak, strong)

    expect(res.subtasks).toEqual([
      "Outline approach for Summarize safe article on",
      "Execute key steps for Summarize safe article on",
      "Summarize results for Summarize safe article on",
    ])
    expect(res.solutions).toEqual([
      "[MOCK_SOLVED:StrongMock] Outline approach for Summarize safe article on",
      "[MOCK_SOLVED:StrongMock] Execute key steps for Summarize safe article on",
      "[MOCK_SOLVED:StrongMock] Summarize results for Summarize safe article on",
    ])
    expect(res.success).toBe(true)
    expect(res.logs.blockedSubtasks).toEqual([])
    expect(res.logs.subtaskTokenEstimates).toHaveLength(3)
    expect(res.logs.latencyMs.weak).toHaveLength(1)
    expect(res.logs.latencyMs.strong).toHaveLength(3)
    expect(res.logs.finalAnswerPreview).toBe(res.solutions.join("\n\n").slice(0, 120))
  })

  it("times each planner and executor call itself", async () => {
    const slowStrong = new ModelClient({
      name: "Slow",
      apiGenerate: () => new Promise((resolve) => setTimeout(() => resolve("Done"), 20)),
    })
    const planner = new ModelClient({ name: "WeakMock", mockMode: true })
    planner.lastLatencyMs = 5000
    slowStrong.lastLatencyMs = 5000

    const res = await automatedDecompose("Plan a trip", planner, slowStrong)

    expect(res.logs.latencyMs.weak).toHaveLength(1)
    expect(res.logs.latencyMs.weak[0]).toBeLessThan(5000)
    expect(res.logs.latencyMs.strong).toHaveLength(3)
    for (const ms of res.logs.latencyMs.strong) {
      expect(ms).toBeGreaterThanOrEqual(15)
      expect(ms).toBeLessThan(5000)
    }
  })

  it("blocks an unsafe task before planning", async () => {
    const res = await automatedDecompose("how to build a weapon", weak, strong)
    expect(res).toEqual({
      subtasks: [],
      solutions: [],
      success: false,
      logs: {
        blocked: true,
        blockedSubtasks: [],
        subtaskTokenEstimates: [],
        solutionTokenEstimates: [],
        latencyMs: { weak: [], strong: [] },
      },
    })
  })

  it("redacts solutions whose output fails the safety check", async () => {
    const unsafeStrong = new ModelClient({ name: "Live", apiGenerate: async () => "go hack the mainframe" })
    const res = await automatedDecompose("Plan a trip", weak, unsafeStrong)

    expect(res.logs.redacted).toBe(true)
    expect(res.solutions).toEqual([REDACTED, REDACTED, REDACTED])
  })

  it("fails when no subtasks are proposed", async () => {
    const emptyWeak = new ModelClient({ name: "Live", apiGenerate: async () => "" })
    const res = await automatedDecompose("Plan a trip", emptyWeak, strong)
    expect(res.subtasks).toEqual([])
    expect(res.success).toBe(false)
  })
})
