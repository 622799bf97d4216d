import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { datasetGenerateCommand, datasetValidateCommand, evalCommand, reportCommand, runCommand } from "./commands"
import { pathExists } from "./lib/files"

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "commands-"))
  vi.spyOn(console, "log").mockImplementation(() => {})
  vi.spyOn(console, "error").mockImplementation(() => {})
})

afterEach(async () => {
  vi.restoreAllMocks()
  await rm(dir, { recursive: true, force: true })
})

describe("runCommand", () => {
  it("prints a run summary and appends the run log", async () => {
    const log = path.join(dir, "runs.jsonl")
    await runCommand({
      prompt: "Summarize the quarterly report",
      strategy: "automated",
      subtasks: [],
      log,
      live: false,
      modelA: "unused-a",
      modelB: "unused-b",
    })

    const printed = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]))
    expect(printed.modelA).toBe("ModelA")
    expect(printed.subtasks).toEqual(["Extract key points", "Draft concise summary", "Review for clarity"])
    expect(printed.blockedSubtasks).toEqual([])
    expect(printed.totalTokens).toBe(4 + 11 + 5 + 12 + 4 + 11)
    expect((await readFile(log, "utf8")).trim().split("\n")).toHaveLength(1)
  })
})

describe("evalCommand", () => {
  it("evaluates tasks from a file with mock models", async () => {
    const tasks = path.join(dir, "tasks.jsonl")
    await writeFile(tasks, JSON.stringify({ prompt: "Plan a trip", expected_keywords: ["trip"] }) + "\n", "utf8")
    const out = path.join(dir, "logs")

    await evalCommand({
      tasksFile: tasks,
      trials: 1,
      seed: 42,
      out,
      concurrency: 1,
      live: false,
      models: { single: "s", weak: "w", strong: "t" },
      pdf: false,
    })

    const lines = vi.mocked(console.log).mock.calls.map((c) => String(c[0]))
    expect(lines[0]).toBe("eval: 1 tasks | trials: 1 | seed: 42 | mock models")
    expect(lines).toContain("single_model: acc 100.0% | success 100.0% | tokens 26.0 | n=1")
    expect(await pathExists(path.join(out, "eval_summary.csv"))).toBe(true)
  })

  it("attaches the artifacts written by this run to the report", async () => {
    const out = path.join(dir, "results")
    const rep = path.join(dir, "rep")

    await evalCommand({
      trials: 1,
      seed: 42,
      out,
      concurrency: 1,
      live: false,
      models: { single: "s", weak: "w", strong: "t" },
      reportDir: rep,
      pdf: false,
    })

    const artifacts = path.join(rep, "artifacts")
    const metadata = JSON.parse(await readFile(path.join(artifacts, "metadata.json"), "utf8"))
    expect(metadata.attached).toEqual([
      path.join(artifacts, "eval_results.csv"),
      path.join(artifacts, "eval_summary.csv"),
      path.join(artifacts, "eval_results.jsonl"),
    ])
    expect(await readFile(path.join(artifacts, "eval_results.csv"), "utf8")).toBe(
      await readFile(path.join(out, "eval_results.csv"), "utf8"),
    )
    expect(await readFile(path.join(artifacts, "eval_summary.csv"), "utf8")).toBe(
      await readFile(path.join(out, "eval_summary.csv"), "utf8"),
    )
  })
})

describe("reportCommand", () => {
  it("rejects an invalid config file", async () => {
    const results = path.join(dir, "eval_results.jsonl")
    await writeFile(results, "", "utf8")
    const config = path.join(dir, "config.json")
    await writeFile(config, JSON.stringify({ trials: "three" }), "utf8")

    await expect(
      reportCommand({ results, out: path.join(dir, "report"), configFile: config, pdf: false }),
    ).rejects.toThrow(`Invalid report config ${config}: `)
  })
})

describe("dataset commands", () => {
  it("generates and validates an offline dataset", async () => {
    const out = path.join(dir, "dataset")
    await datasetGenerateCommand({ out, count: 2, categories: ["DI"], offline: true })
    await expect(datasetValidateCommand({ dir: out })).resolves.toBeUndefined()
    expect(vi.mocked(console.log)).toHaveBeenLastCalledWith(`Dataset at ${out} is valid`)
  })

  it("fails for an invalid dataset", async () => {
    await expect(datasetValidateCommand({ dir })).rejects.toThrow(`Dataset at ${dir} has 1 error(s)`)
    expect(vi.mocked(console.error)).toHaveBeenCalledWith("manifest.json missing")
  })
})
