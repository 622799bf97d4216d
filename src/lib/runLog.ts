import { appendJsonl } from "./files"

export type SubtaskLog = {
  subtask: string
  output: string
  redacted: boolean
  promptTokens: number
  completionTokens: number
}

export type RunLog = {
  runId: string
  timestamp: string
  strategy: string
  modelA: string
  modelB: string
  prompt: string
  blockedSubtasks: string[]
  subtasks: SubtaskLog[]
}

/** Prompt plus completion tokens over every executed subtask. */
export function totalTokens(run: RunLog): number {
  return run.subtasks.reduce((acc, s) => acc + s.promptTokens + s.completionTokens, 0)
}

export function nowIso(): string {
  return new Date().toISOString()
}

/**
 * Appends one run per line to a JSONL file.
 */
export class JsonlLogger {
  constructor(readonly logPath: string) {
    if (!logPath || typeof logPath !== "string") {
      throw new Error("Log path must be a non-empty string")
    }
  }

  async logRun(run: RunLog): Promise<void> {
    await appendJsonl(this.logPath, run)
  }
}
