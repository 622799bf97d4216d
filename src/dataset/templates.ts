import { z } from "zod"
import type { Category, ItemExpected, ItemInput } from "./schema"

export const DocSynthesisSchema = z.object({
  title: z.string().describe("Short safe title"),
  bullets: z.array(z.string()).default([]).describe("3-6 concise bullets"),
})

export const IncidentSummarySchema = z.object({
  summary: z.string(),
  lessons: z.array(z.string()).default([]),
})

export type DocSynthesis = z.infer<typeof DocSynthesisSchema>
export type IncidentSummary = z.infer<typeof IncidentSummarySchema>

const GREET_SNIPPET = [
  "function greet(n: number) {",
  "  // prints a greeting n times",
  "  for (let i = 0; i < n; i++) {",
  '    console.log("hello")',
  "  }",
  "}",
  "",
].join("\n")

const SERVICE_CONFIG = [
  "service:",
  "  retries: 3",
  "  timeout: 2s",
  "logging:",
  "  level: INFO",
  "",
].join("\n")

const CSV_HEADERS = ["User ID", "Email Address", "Signup Date"]

/**
 * Builds the model-facing input for an item of the given category.
 */
export function makeInput(category: Category): ItemInput {
  switch (category) {
    case "CF":
      return {
        taskPrompt: `Refactor this simple TypeScript function to be more readable (no external calls):\n\n${GREET_SNIPPET}`,
        attachments: { "snippet.ts": GREET_SNIPPET },
      }
    case "CFG":
      return {
        taskPrompt: `Review this YAML config and suggest benign, safe corrections to improve clarity (no commands).\n\n${SERVICE_CONFIG}`,
        attachments: { "config.yaml": SERVICE_CONFIG },
      }
    case "DI":
      return {
        taskPrompt: `Normalize this small CSV header list to snake_case and sort alphabetically: ${CSV_HEADERS.join(", ")}`,
        attachments: {},
      }
    case "DOC":
      return {
        taskPrompt: "Draft a short documentation section summarizing the module purpose and usage.",
        attachments: {},
      }
    case "IMS":
      return {
        taskPrompt:
          "Provide a benign incident summary about a minor service slowdown and list 3 lessons learned.",
        attachments: {},
      }
  }
}

export function makeExpected(category: Category): ItemExpected {
  switch (category) {
    case "CF":
      return {
        description: "Refactored code should be clearer and keep behavior.",
        checks: { contains: "function greet" },
      }
    case "CFG":
      return { description: "Config suggestions should be benign and clear.", checks: { contains: "logging" } }
    case "DI":
      return { description: "Headers snake_case and sorted.", checks: { contains: "user_id" } }
    case "DOC":
      return { description: "Concise documentation bullets.", checks: { min_bullets: "3" } }
    case "IMS":
      return { description: "Benign incident summary with lessons.", checks: { contains: "lessons" } }
  }
}

export const DOC_FALLBACK: DocSynthesis = {
  title: "Benign Documentation",
  bullets: ["Overview", "Usage", "Examples"],
}

export const INCIDENT_FALLBACK: IncidentSummary = {
  summary: "Minor slowdown resolved with retry policy.",
  lessons: ["Improve monitoring", "Tune timeouts", "Document runbooks"],
}

export function renderDoc(doc: DocSynthesis): string {
  return `# ${doc.title}\n\n${doc.bullets.map((b) => `- ${b}`).join("\n")}`
}

export function renderIncident(incident: IncidentSummary): string {
  return `${incident.summary}\n\n${incident.lessons.map((l) => `- ${l}`).join("\n")}`
}

export const GENERIC_TARGET = "Provide a short, safe response."
