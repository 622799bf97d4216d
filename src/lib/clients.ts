import { isSafeText, safeTextOk, SafeContentError } from "./safety"
import { estimateTokens } from "./tokens"

/**
 * Minimal model surface used by the pipeline: a named caller that maps a
 * prompt to a completion.
 */
export interface ModelCaller {
  readonly name: string
  call(prompt: string): Promise<string>
}

export type ApiGenerateFn = (
  prompt: string,
  maxTokens: number,
  temperature: number,
) => Promise<string>

/** Raised when a model output fails the safety check. */
export class UnsafeOutputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "UnsafeOutputError"
  }
}

/** Deterministic executor stub. */
export class ModelAClient implements ModelCaller {
  constructor(readonly name = "ModelA") {}

  async call(prompt: string): Promise<string> {
    return `Processed safely by ${this.name}: ${prompt.trim().slice(0, 200)}`
  }
}

/** Deterministic planner stub: suggests bullets from prompt keywords. */
export class ModelBClient implements ModelCaller {
  constructor(readonly name = "ModelB") {}

  async call(prompt: string): Promise<string> {
    const base = prompt.toLowerCase()
    let suggestions: string[] = []
    if (base.includes("summar")) {
      suggestions.push("Extract key points", "Draft concise summary", "Review for clarity")
    }
    if (base.includes("analy") || base.includes("classif")) {
      suggestions.push(
        "Define evaluation criteria",
        "Collect safe examples",
        "Run analysis and aggregate findings",
      )
    }
    if (suggestions.length === 0) {
      suggestions = ["Outline safe subtasks", "Execute each subtask", "Synthesize final answer"]
    }
    return suggestions.map((s) => `- ${s}`).join("\n")
  }
}

export type ModelClientOptions = {
  name?: string
  apiGenerate?: ApiGenerateFn
  mockMode?: boolean
}

/**
 * Strips bullet markers and `N. ` enumerations from a model's list output.
 * @param text - Raw model output.
 * @returns Non-empty cleaned lines.
 */
export function parseBulletList(text: string): string[] {
  const items: string[] = []
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim()
    if (!line) continue
    let cleaned: string
    if (line[0] === "-" || line[0] === "*") {
      cleaned = line.replace(/^[-*\s]+/, "").trim()
    } else if (/^\d/.test(line)) {
      const dot = line.indexOf(". ")
      cleaned = dot === -1 ? line : line.slice(dot + 2)
    } else {
      cleaned = line
    }
    if (cleaned) items.push(cleaned)
  }
  return items
}

/**
 * Wraps an LLM call with output safety checks and per-call telemetry.
 *
 * In mock mode every response is deterministic and no API is touched, which
 * keeps evaluations reproducible. Otherwise `apiGenerate` performs the call.
 */
export class ModelClient {
  readonly name: string
  readonly mockMode: boolean
  private readonly apiGenerate?: ApiGenerateFn

  lastTokensUsed = 0
  lastLatencyMs = 0

  constructor(options: ModelClientOptions = {}) {
    this.name = options.name ?? "ModelClient"
    this.mockMode = options.mockMode ?? false
    this.apiGenerate = options.apiGenerate
  }

  private mockGenerate(prompt: string, maxTokens: number): string {
    const body = prompt.trim().replace(/\n/g, " ")
    const maxChars = Math.max(0, maxTokens * 4)
    const content = (maxChars ? body.slice(0, maxChars) : body) || "(empty prompt)"
    return `[MOCK:${this.name}] ${content}`
  }

  /**
   * Generates a completion and records token usage and latency.
   * @throws UnsafeOutputError if the output fails the safety check.
   */
  async generate(prompt: string, maxTokens = 256, temperature = 0.7): Promise<string> {
    const start = performance.now()

    let output: string
    if (this.mockMode) {
      output = this.mockGenerate(prompt, maxTokens)
    } else {
      if (!this.apiGenerate) {
        throw new Error(`No API generate function configured for ${this.name} and mock mode is off`)
      }
      output = await this.apiGenerate(prompt, maxTokens, temperature)
    }

    this.lastLatencyMs = Math.max(0, performance.now() - start)
    this.lastTokensUsed = estimateTokens(output)

    try {
      isSafeText(output, { context: `generate:${this.name}` })
    } catch (err) {
      if (err instanceof SafeContentError) {
        throw new UnsafeOutputError("Model output failed safety check", { cause: err })
      }
      throw err
    }

    return output
  }

  /**
   * Asks the (weak) model for short, benign subtasks of a task.
   * @param taskPrompt - The top-level task.
   * @param maxItems - Upper bound on returned subtasks.
   * @returns Safe subtasks of at most 200 characters, or [] for an unsafe task.
   */
  async proposeSubtasks(taskPrompt: string, maxItems = 5): Promise<string[]> {
    if (!safeTextOk(taskPrompt)) return []

    let items: string[]
    if (this.mockMode) {
      const topic = taskPrompt.trim().split(" ").slice(0, 4).join(" ") || "task"
      items = [
        `Outline approach for ${topic}`,
        `Execute key steps for ${topic}`,
        `Summarize results for ${topic}`,
      ]
    } else {
      const instruction =
        "Propose 3-6 SAFE, high-level, benign subtasks as short bullets. " +
        "No sensitive, harmful, or dangerous content. Return only the bullets.\n" +
        `TASK: ${taskPrompt}`
      const text = await this.generate(instruction, 256, 0.2)
      items = parseBulletList(text)
    }

    const safeItems: string[] = []
    for (const raw of items) {
      const item = raw.trim()
      if (!item || !safeTextOk(item)) continue
      safeItems.push(item.slice(0, 200))
      if (safeItems.length >= maxItems) break
    }
    return safeItems
  }

  /**
   * Asks the (strong) model to solve one benign subtask.
   * @throws SafeContentError if the subtask itself is unsafe.
   * @throws UnsafeOutputError if the live output is unsafe.
   */
  async solveSubtask(subtaskPrompt: string, maxTokens = 256, temperature = 0.2): Promise<string> {
    if (!safeTextOk(subtaskPrompt)) {
      throw new SafeContentError("Subtask prompt failed safety check")
    }

    if (this.mockMode) {
      const body = subtaskPrompt.trim().replace(/\n/g, " ")
      return `[MOCK_SOLVED:${this.name}] ${body.slice(0, 180)}`
    }

    const instruction =
      "Safely and concisely complete the following benign subtask. " +
      "Avoid any sensitive, harmful, or dangerous content. " +
      "Focus on generic, constructive guidance.\n" +
      `SUBTASK: ${subtaskPrompt}`
    return this.generate(instruction, maxTokens, temperature)
  }
}

/**
 * Adapts a {@link ModelClient} to the pipeline's {@link ModelCaller} surface.
 */
export function asModelCaller(client: ModelClient, maxTokens = 256, temperature = 0.2): ModelCaller {
  return {
    name: client.name,
    call: (prompt) => client.generate(prompt, maxTokens, temperature),
  }
}
