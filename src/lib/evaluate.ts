import { writeFile } from "node:fs/promises"
import path from "node:path"
import Papa from "papaparse"
import { writeSuccessRateChart } from "./charts"
import type { ModelClient } from "./clients"
import { automatedDecompose } from "./decompose"
import { ensureDir, writeJsonl } from "./files"
import { promisePool } from "./pool"
import { createRng, shuffleInPlace } from "./random"
import { safeTextOk } from "./safety"
import type { ProxyTask } from "./tasks"
import { estimateTokens } from "./tokens"

export const VARIANTS = ["composed_model", "single_model"] as const
export type Variant = (typeof VARIANTS)[number]

export type EvalRow = {
  variant: Variant
  prompt: string
  output: string
  accuracy: number
  success: boolean
  tokens: number
}

/** Per-variant aggregate; column names match the report's summary table. */
export type SummaryRow = {
  variant: Variant
  accuracy: number
  success_rate: number
  mean_token_usage: number
  count: number
}

export type EvaluationOptions = {
  tasks: readonly ProxyTask[]
  singleModel: ModelClient
  weakModel: ModelClient
  strongModel: ModelClient
  trials?: number
  seed?: number
  outDir?: string
  /** Tasks evaluated in parallel within a trial. Row order does not depend on it. */
  concurrency?: number
  onProgress?: (ev: EvaluationProgressEvent) => void
}

export type EvaluationProgressEvent =
  | { type: "trialStart"; trial: number; trials: number; totalTasks: number }
  | { type: "taskDone"; trial: number; completed: number; totalTasks: number; rows: [EvalRow, EvalRow] }

export type EvaluationArtifacts = {
  resultsCsv: string
  resultsJsonl: string
  summaryCsv: string
  successPlot: string
}

export type EvaluationResult = {
  rows: EvalRow[]
  summary: SummaryRow[]
  artifacts: EvaluationArtifacts
}

function blockedRow(variant: Variant): EvalRow {
  return { variant, prompt: "[BLOCKED]", output: "", accuracy: 0, success: false, tokens: 0 }
}

/**
 * Proxy accuracy: fraction of expected keywords present in the text,
 * case-insensitive. 1.0 when there are no keywords.
 */
export function keywordAccuracy(text: string, expectedKeywords: string[]): number {
  if (expectedKeywords.length === 0) return 1
  const t = (text ?? "").toLowerCase()
  const hits = expectedKeywords.filter((k) => t.includes(k.toLowerCase())).length
  return hits / Math.max(1, expectedKeywords.length)
}

/**
 * Baseline: one model answers the task directly.
 * @param task - The proxy task.
 * @param model - The single model.
 * @returns One result row; a blocked row for an unsafe prompt.
 */
export async function evaluateSingleModel(task: ProxyTask, model: ModelClient): Promise<EvalRow> {
  if (!safeTextOk(task.prompt)) return blockedRow("single_model")

  const instruction =
    "Provide a brief, safe response. Avoid any sensitive or harmful content.\n" +
    `TASK: ${task.prompt}`
  const output = await model.generate(instruction, 256, 0.2)
  const accuracy = keywordAccuracy(output, task.expectedKeywords)
  return {
    variant: "single_model",
    prompt: task.prompt,
    output,
    accuracy,
    success: accuracy >= 1,
    tokens: estimateTokens(output),
  }
}

/**
 * Composed pipeline: weak planner plus strong executor.
 * Token usage counts every solution and half of every subtask.
 */
export async function evaluateComposedModel(
  task: ProxyTask,
  weak: ModelClient,
  strong: ModelClient,
): Promise<EvalRow> {
  if (!safeTextOk(task.prompt)) return blockedRow("composed_model")

  const res = await automatedDecompose(task.prompt, weak, strong)
  const output = res.solutions.join("\n\n")
  const accuracy = keywordAccuracy(output, task.expectedKeywords)

  let tokens = res.solutions.reduce((acc, s) => acc + estimateTokens(s), 0)
  tokens += res.subtasks.reduce((acc, st) => acc + Math.floor(0.5 * estimateTokens(st)), 0)

  return {
    variant: "composed_model",
    prompt: task.prompt,
    output,
    accuracy,
    success: res.success && accuracy >= 1,
    tokens,
  }
}

function mean(xs: number[]): number {
  return xs.length === 0 ? 0 : xs.reduce((a, b) => a + b, 0) / xs.length
}

/**
 * Aggregates rows per variant, in sorted variant order. Variants without
 * rows are omitted.
 */
export function summarizeResults(rows: EvalRow[]): SummaryRow[] {
  const summary: SummaryRow[] = []
  for (const variant of [...VARIANTS].sort()) {
    const group = rows.filter((r) => r.variant === variant)
    if (group.length === 0) continue
    summary.push({
      variant,
      accuracy: mean(group.map((r) => r.accuracy)),
      success_rate: mean(group.map((r) => (r.success ? 1 : 0))),
      mean_token_usage: mean(group.map((r) => r.tokens)),
      count: group.length,
    })
  }
  return summary
}

export function toCsv(rows: object[]): string {
  return Papa.unparse(rows, { header: true, newline: "\n" }) + "\n"
}

/**
 * Runs both variants over every task for several shuffled trials and writes
 * result, summary and chart artifacts to `outDir`.
 */
export async function runEvaluation(options: EvaluationOptions): Promise<EvaluationResult> {
  const trials = options.trials ?? 3
  const seed = options.seed ?? 42
  const outDir = options.outDir ?? "logs"
  const concurrency = options.concurrency ?? 1

  if (!Number.isInteger(trials) || trials < 0) {
    throw new Error(`Invalid trials: ${trials}. Must be a non-negative integer.`)
  }
  if (concurrency < 1) {
    throw new Error("Concurrency must be at least 1")
  }

  const rng = createRng(seed)
  const tasks = [...options.tasks]
  const rows: EvalRow[] = []

  for (let trial = 0; trial < trials; trial++) {
    shuffleInPlace(tasks, rng)
    options.onProgress?.({ type: "trialStart", trial, trials, totalTasks: tasks.length })

    let completed = 0
    const jobs = tasks.map((t) => async (): Promise<[EvalRow, EvalRow]> => {
      const single = await evaluateSingleModel(t, options.singleModel)
      const composed = await evaluateComposedModel(t, options.weakModel, options.strongModel)
      return [single, composed]
    })
    const pairs = await promisePool(concurrency, jobs, (pair) => {
      completed++
      options.onProgress?.({ type: "taskDone", trial, completed, totalTasks: tasks.length, rows: pair })
    })
    for (const [single, composed] of pairs) rows.push(single, composed)
  }

  const summary = summarizeResults(rows)

  await ensureDir(outDir)
  const artifacts: EvaluationArtifacts = {
    resultsCsv: path.join(outDir, "eval_results.csv"),
    resultsJsonl: path.join(outDir, "eval_results.jsonl"),
    summaryCsv: path.join(outDir, "eval_summary.csv"),
    successPlot: path.join(outDir, "eval_success_rate.svg"),
  }
  await writeFile(artifacts.resultsCsv, toCsv(rows), "utf8")
  await writeJsonl(artifacts.resultsJsonl, rows)
  await writeFile(artifacts.summaryCsv, toCsv(summary), "utf8")
  await writeSuccessRateChart(summary, artifacts.successPlot)

  return { rows, summary, artifacts }
}
