/**
 * Default OpenRouter model IDs for the three evaluation roles.
 * Override per run with `--single-model`, `--weak-model` and `--strong-model`.
 */
const MODEL_CONFIG = [
  {
    role: "single",
    id: "meta-llama/llama-3.3-70b-instruct:free",
    alias: "SingleMock",
  },
  {
    role: "weak",
    id: "google/gemma-3-12b-it:free",
    alias: "WeakMock",
  },
  {
    role: "strong",
    id: "mistralai/mistral-small-3.1-24b-instruct:free",
    alias: "StrongMock",
  },
] as const

export type ModelRole = (typeof MODEL_CONFIG)[number]["role"]

export const DEFAULT_MODELS = MODEL_CONFIG.reduce<Record<ModelRole, string>>(
  (acc, entry) => {
    acc[entry.role] = entry.id
    return acc
  },
  { single: "", weak: "", strong: "" },
)

/** Names given to the deterministic mock clients of each role. */
export const MOCK_NAMES = MODEL_CONFIG.reduce<Record<ModelRole, string>>(
  (acc, entry) => {
    acc[entry.role] = entry.alias
    return acc
  },
  { single: "", weak: "", strong: "" },
)

/** Model used for structured dataset generation. */
export function structuredModelId(): string {
  return process.env.HARNESS_STRUCTURED_MODEL?.trim() || "openai/gpt-4o-mini"
}
