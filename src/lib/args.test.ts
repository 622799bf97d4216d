import { describe, expect, it, vi } from "vitest"
import { DEFAULT_MODELS } from "../config/models"
import {
  buildProgram,
  parsePositiveInt,
  toDatasetGenerateArgs,
  toEvalArgs,
  type CommandHandlers,
} from "./args"
import { DEFAULT_RUN_LOG_PATH } from "./pipeline"

function handlers() {
  return {
    run: vi.fn(async () => {}),
    eval: vi.fn(async () => {}),
    report: vi.fn(async () => {}),
    datasetGenerate: vi.fn(async () => {}),
    datasetValidate: vi.fn(async () => {}),
  } satisfies CommandHandlers
}

function argv(...args: string[]) {
  return ["node", "harness", ...args]
}

describe("parsePositiveInt", () => {
  it("parses positive integers", () => {
    expect(parsePositiveInt("trials", "3")).toBe(3)
  })

  it("rejects zero and garbage", () => {
    expect(() => parsePositiveInt("trials", "0")).toThrow("Invalid trials: 0. Must be a positive integer.")
    expect(() => parsePositiveInt("count", "abc")).toThrow("Invalid count: abc. Must be a positive integer.")
  })
})

describe("toEvalArgs", () => {
  it("rejects a non-integer seed", () => {
    expect(() =>
      toEvalArgs({
        trials: "1",
        seed: "x",
        out: "logs",
        concurrency: "1",
        singleModel: "a",
        weakModel: "b",
        strongModel: "c",
      }),
    ).toThrow("Invalid seed: x. Must be an integer.")
  })
})

describe("toDatasetGenerateArgs", () => {
  it("rejects a negative count", () => {
    expect(() => toDatasetGenerateArgs({ out: "dataset", count: "-1" })).toThrow(
      "Invalid count: -1. Must be a non-negative integer.",
    )
  })

  it("rejects unknown categories", () => {
    expect(() => toDatasetGenerateArgs({ out: "dataset", count: "1", categories: ["XX"] })).toThrow(
      "Unsupported category: XX. Expected one of: CF, CFG, DI, DOC, IMS",
    )
  })
})

describe("buildProgram", () => {
  it("parses eval defaults", async () => {
    const h = handlers()
    await buildProgram(h).parseAsync(argv("eval", "--trials", "2"))
    expect(h.eval).toHaveBeenCalledWith({
      tasksFile: undefined,
      limit: undefined,
      trials: 2,
      seed: 42,
      out: "logs",
      concurrency: 1,
      live: false,
      models: DEFAULT_MODELS,
      reportDir: undefined,
      pdf: true,
    })
  })

  it("collects repeated manual subtasks", async () => {
    const h = handlers()
    await buildProgram(h).parseAsync(
      argv("run", "Organize notes", "--strategy", "manual", "--subtask", "a", "--subtask", "b"),
    )
    expect(h.run).toHaveBeenCalledWith({
      prompt: "Organize notes",
      strategy: "manual",
      subtasks: ["a", "b"],
      log: DEFAULT_RUN_LOG_PATH,
      live: false,
      modelA: DEFAULT_MODELS.strong,
      modelB: DEFAULT_MODELS.weak,
    })
  })

  it("ignores subtasks for the automated strategy", async () => {
    const h = handlers()
    await buildProgram(h).parseAsync(argv("run", "Organize notes", "--subtask", "a"))
    expect(h.run.mock.calls[0]).toEqual([expect.objectContaining({ strategy: "automated", subtasks: [] })])
  })

  it("turns off PDF output with --no-pdf", async () => {
    const h = handlers()
    await buildProgram(h).parseAsync(argv("report", "--no-pdf", "--out", "out"))
    expect(h.report).toHaveBeenCalledWith({
      results: "logs/eval_results.jsonl",
      out: "out",
      configFile: undefined,
      pdf: false,
    })
  })

  it("parses dataset subcommands", async () => {
    const h = handlers()
    await buildProgram(h).parseAsync(
      argv("dataset", "generate", "--count", "3", "--categories", "DOC", "IMS", "--offline"),
    )
    expect(h.datasetGenerate).toHaveBeenCalledWith({
      out: "dataset",
      count: 3,
      categories: ["DOC", "IMS"],
      offline: true,
    })

    await buildProgram(h).parseAsync(argv("dataset", "generate", "--count", "0"))
    expect(h.datasetGenerate).toHaveBeenLastCalledWith(expect.objectContaining({ count: 0 }))

    await buildProgram(h).parseAsync(argv("dataset", "validate", "data/set"))
    expect(h.datasetValidate).toHaveBeenCalledWith({ dir: "data/set" })
  })

  it("surfaces flag validation errors", async () => {
    const h = handlers()
    await expect(buildProgram(h).parseAsync(argv("eval", "--concurrency", "0"))).rejects.toThrow(
      "Invalid concurrency: 0. Must be a positive integer.",
    )
    expect(h.eval).not.toHaveBeenCalled()
  })
})
