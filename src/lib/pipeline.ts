import { randomUUID } from "node:crypto"
import { ModelAClient, ModelBClient, UnsafeOutputError, type ModelCaller } from "./clients"
import { JsonlLogger, nowIso, type RunLog, type SubtaskLog } from "./runLog"
import { isSafeText, REDACTED, SafeContentError, safeTextOk } from "./safety"
import { estimateTokens } from "./tokens"

export const STRATEGIES = ["manual", "automated"] as const
export type Strategy = (typeof STRATEGIES)[number]

export function isStrategy(x: unknown): x is Strategy {
  return x === "manual" || x === "automated"
}

export type Pipeline = {
  taskName: string
  prompt: string
  /** Executes subtasks. Defaults to {@link ModelAClient}. */
  modelA?: ModelCaller
  /** Proposes subtasks for the automated strategy. Defaults to {@link ModelBClient}. */
  modelB?: ModelCaller
  manualSubtasks?: string[]
}

export const DEFAULT_RUN_LOG_PATH = "logs/experiment_runs.jsonl"

/** Splits ModelB suggestions into one subtask per non-empty line. */
export function parseSuggestions(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/^[ \t-]+|[ \t-]+$/g, ""))
    .filter(Boolean)
}

export function manualDecompose(p: Pipeline): string[] {
  return (p.manualSubtasks ?? []).filter(Boolean)
}

export async function automatedDecompose(p: Pipeline, modelB: ModelCaller): Promise<string[]> {
  const suggestionPrompt =
    "Propose 3-6 safe, high-level subtasks (bulleted) to solve this task. " +
    "Avoid any sensitive or dangerous content. Task: " +
    p.prompt
  const raw = await modelB.call(suggestionPrompt)
  return parseSuggestions(raw).filter((s) => safeTextOk(s))
}

/**
 * Decomposes the pipeline's prompt, executes every safe subtask with ModelA
 * and appends the resulting run to the log.
 * @param p - The pipeline to run.
 * @param strategy - How subtasks are obtained.
 * @param logger - Destination of the run log.
 * @returns The run log that was written.
 */
export async function runPipeline(
  p: Pipeline,
  strategy: Strategy = "automated",
  logger: JsonlLogger = new JsonlLogger(DEFAULT_RUN_LOG_PATH),
): Promise<RunLog> {
  if (!isStrategy(strategy)) {
    throw new Error(`Invalid strategy: ${String(strategy)}. Must be 'manual' or 'automated'.`)
  }

  const modelA = p.modelA ?? new ModelAClient()
  const modelB = p.modelB ?? new ModelBClient()
  const base = {
    runId: randomUUID(),
    strategy,
    modelA: modelA.name,
    modelB: modelB.name,
  }

  if (!safeTextOk(p.prompt)) {
    const log: RunLog = {
      ...base,
      timestamp: nowIso(),
      prompt: REDACTED,
      blockedSubtasks: ["[prompt blocked]"],
      subtasks: [],
    }
    await logger.logRun(log)
    return log
  }

  const subtasks = strategy === "manual" ? manualDecompose(p) : await automatedDecompose(p, modelB)

  const blockedSubtasks: string[] = []
  const subtaskLogs: SubtaskLog[] = []

  for (const s of subtasks) {
    if (!safeTextOk(s)) {
      blockedSubtasks.push(s)
      continue
    }
    try {
      const output = await modelA.call(s)
      // callers that are not ModelClient do not check their own output
      isSafeText(output, { context: "pipeline:model_a_output" })
      subtaskLogs.push({
        subtask: s,
        output,
        redacted: false,
        promptTokens: estimateTokens(s),
        completionTokens: estimateTokens(output),
      })
    } catch (err) {
      if (!(err instanceof SafeContentError || err instanceof UnsafeOutputError)) throw err
      blockedSubtasks.push(`[output blocked for subtask: ${s.slice(0, 60)}]`)
    }
  }

  const log: RunLog = {
    ...base,
    timestamp: nowIso(),
    prompt: p.prompt,
    blockedSubtasks,
    subtasks: subtaskLogs,
  }
  await logger.logRun(log)
  return log
}
