import { z } from "zod"
import { readJsonlFile } from "./readJsonl"

export type ProxyTask = {
  prompt: string
  expectedKeywords: string[]
}

const TaskRowSchema = z
  .object({
    prompt: z.string().trim().min(1, "prompt must be a non-empty string"),
    expected_keywords: z.array(z.string()).optional(),
    expectedKeywords: z.array(z.string()).optional(),
  })
  .transform(
    (row): ProxyTask => ({
      prompt: row.prompt,
      expectedKeywords: row.expectedKeywords ?? row.expected_keywords ?? [],
    }),
  )

export const DEFAULT_TASKS: readonly ProxyTask[] = [
  {
    prompt: "Summarize safe article on productivity",
    expectedKeywords: ["productivity", "summarize"],
  },
  {
    prompt: "Classify safe customer feedback into themes",
    expectedKeywords: ["feedback", "themes"],
  },
  {
    prompt: "Outline safe steps for data cleaning",
    expectedKeywords: ["steps", "cleaning"],
  },
]

/**
 * Loads and validates proxy tasks from a JSONL file.
 * Each row needs `prompt` and may carry `expected_keywords` (or
 * `expectedKeywords`).
 * @param filePath - Path to the JSONL task file.
 * @param limit - Maximum number of tasks to load.
 * @throws Error naming the line of the first malformed row.
 */
export async function loadTasks(filePath: string, limit?: number): Promise<ProxyTask[]> {
  const tasks: ProxyTask[] = []

  for await (const [line, row] of readJsonlFile(filePath, limit)) {
    const parsed = TaskRowSchema.safeParse(row)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue.path.length ? `${issue.path.join(".")}: ` : ""
      throw new Error(`Invalid task on line ${line} of ${filePath}: ${where}${issue.message}`)
    }
    tasks.push(parsed.data)
  }

  if (tasks.length === 0) {
    throw new Error(`No tasks found in ${filePath}`)
  }
  return tasks
}
