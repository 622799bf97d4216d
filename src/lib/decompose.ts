import { UnsafeOutputError, type ModelClient } from "./clients"
import { REDACTED, SafeContentError, safeTextOk } from "./safety"
import { estimateTokens } from "./tokens"

export type DecompositionLogs = {
  blocked?: boolean
  redacted?: boolean
  blockedSubtasks: string[]
  subtaskTokenEstimates: number[]
  solutionTokenEstimates: number[]
  latencyMs: { weak: number[]; strong: number[] }
  finalAnswerPreview?: string
}

export type DecompositionResult = {
  subtasks: string[]
  solutions: string[]
  success: boolean
  logs: DecompositionLogs
}

/**
 * Joins subtask solutions into a final answer.
 * @returns The answer and true, or the redaction placeholder and false when
 * the combined text is unsafe.
 */
export function safeAggregator(solutions: string[]): [string, boolean] {
  const text = solutions.join("\n\n")
  if (!safeTextOk(text)) return [REDACTED, false]
  return [text, true]
}

/**
 * Composed pipeline: the weak model plans subtasks, the strong model solves
 * each one, and the solutions are aggregated.
 * @param taskPrompt - The top-level task.
 * @param weak - Planner client.
 * @param strong - Executor client.
 */
export async function automatedDecompose(
  taskPrompt: string,
  weak: ModelClient,
  strong: ModelClient,
): Promise<DecompositionResult> {
  const logs: DecompositionLogs = {
    blockedSubtasks: [],
    subtaskTokenEstimates: [],
    solutionTokenEstimates: [],
    latencyMs: { weak: [], strong: [] },
  }

  if (!safeTextOk(taskPrompt)) {
    logs.blocked = true
    return { subtasks: [], solutions: [], success: false, logs }
  }

  // lastLatencyMs on a shared client may belong to another task
  const planStart = performance.now()
  const proposed = await weak.proposeSubtasks(taskPrompt, 6)
  logs.latencyMs.weak.push(performance.now() - planStart)

  const subtasks: string[] = []
  for (const st of proposed) {
    if (!safeTextOk(st)) {
      logs.blockedSubtasks.push(st)
      continue
    }
    subtasks.push(st)
    logs.subtaskTokenEstimates.push(estimateTokens(st))
  }

  const solutions: string[] = []
  for (const st of subtasks) {
    let solution: string
    const solveStart = performance.now()
    try {
      const out = await strong.solveSubtask(st)
      if (safeTextOk(out)) {
        solution = out
      } else {
        logs.redacted = true
        solution = REDACTED
      }
    } catch (err) {
      if (!(err instanceof UnsafeOutputError || err instanceof SafeContentError)) throw err
      logs.redacted = true
      solution = REDACTED
    }
    solutions.push(solution)
    logs.latencyMs.strong.push(performance.now() - solveStart)
    logs.solutionTokenEstimates.push(estimateTokens(solution))
  }

  const [finalAnswer, ok] = safeAggregator(solutions)
  logs.finalAnswerPreview = finalAnswer.slice(0, 120)

  return {
    subtasks,
    solutions,
    success: ok && subtasks.length === solutions.length && solutions.length > 0,
    logs,
  }
}
