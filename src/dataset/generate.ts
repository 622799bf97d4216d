import { randomUUID } from "node:crypto"
import { writeFile } from "node:fs/promises"
import path from "node:path"
import { ensureDir, writeJson } from "../lib/files"
import { ensureSafeText, moderateText, type Moderator } from "./safety"
import {
  CATEGORY_LABELS,
  CATEGORIES,
  DatasetManifestSchema,
  ItemMetaSchema,
  writeJsonSchemas,
  type Category,
} from "./schema"
import { callStructured } from "./structured"
import {
  DOC_FALLBACK,
  DocSynthesisSchema,
  GENERIC_TARGET,
  INCIDENT_FALLBACK,
  IncidentSummarySchema,
  makeExpected,
  makeInput,
  renderDoc,
  renderIncident,
} from "./templates"

export type GenConfig = {
  outDir: string
  count: number
  categories: Category[]
  /** No API calls at all: structured targets use their fixed fallbacks. */
  offline?: boolean
  moderate?: Moderator | null
  onProgress?: (done: number, total: number, itemId: string) => void
  /** Overrides item id generation (random UUIDs by default). */
  newId?: () => string
  now?: () => Date
}

export type GenResult = {
  dir: string
  count: number
  items: string[]
}

/**
 * Repeats the category list until it has exactly `count` entries.
 */
export function cycleCategories(categories: Category[], count: number): Category[] {
  if (categories.length === 0) return []
  return Array.from({ length: count }, (_, i) => categories[i % categories.length])
}

/**
 * Produces the expected target text for an item. DOC and IMS items ask a
 * model for structured output and fall back to fixed benign content when
 * the call fails or the run is offline.
 */
async function expectedTarget(
  category: Category,
  userPrompt: string,
  offline: boolean,
  moderate: Moderator | null,
): Promise<string> {
  if (category === "DOC") {
    if (offline) return renderDoc(DOC_FALLBACK)
    try {
      const doc = await callStructured({
        system: "You are a helpful technical writer. Only produce benign, high-level content.",
        prompt: userPrompt,
        schema: DocSynthesisSchema,
        schemaName: "DocSynthesis",
        moderate,
      })
      return renderDoc(doc)
    } catch (err) {
      console.warn(`DOC generation failed, using fallback: ${err instanceof Error ? err.message : String(err)}`)
      return renderDoc(DOC_FALLBACK)
    }
  }

  if (category === "IMS") {
    if (offline) return renderIncident(INCIDENT_FALLBACK)
    try {
      const incident = await callStructured({
        system: "You are a careful SRE. Summarize benign incidents with constructive lessons.",
        prompt: userPrompt,
        schema: IncidentSummarySchema,
        schemaName: "IncidentSummary",
        moderate,
      })
      return renderIncident(incident)
    } catch (err) {
      console.warn(`IMS generation failed, using fallback: ${err instanceof Error ? err.message : String(err)}`)
      return renderIncident(INCIDENT_FALLBACK)
    }
  }

  return GENERIC_TARGET
}

export function renderDatasetReadme(): string {
  const categoryLines = CATEGORIES.map((c) => `- ${c} (${CATEGORY_LABELS[c]})`).join("\n")
  return `# Decomposition Attacks Proxy Dataset (Benign)

This dataset contains only benign categories and safe content. Categories included:

${categoryLines}

Outputs are generated with structured prompts and are moderated & locally filtered.
Sensitive content is disallowed (credentials, IPs, exploits, commands).

Directory layout:

\`\`\`
dataset/
  items/<id>/inputs/*
  items/<id>/expected/*
  items/<id>/meta.json
  manifest.json
  README.md
  schemas/*.schema.json
\`\`\`
`
}

/**
 * Writes a benign proxy dataset: JSON schemas, one directory per item,
 * a manifest and a README.
 * @param cfg - Generation settings.
 * @returns Dataset directory, item count and item ids in manifest order.
 * @throws DatasetSafetyError if an input or target fails the safety gate.
 */
export async function generateDataset(cfg: GenConfig): Promise<GenResult> {
  if (!Number.isInteger(cfg.count) || cfg.count < 0) {
    throw new Error(`Invalid count: ${cfg.count}. Must be a non-negative integer.`)
  }
  if (cfg.categories.length === 0) {
    throw new Error("At least one category must be specified")
  }

  const offline = cfg.offline ?? false
  const moderate = offline ? null : cfg.moderate === undefined ? moderateText : cfg.moderate
  const newId = cfg.newId ?? randomUUID
  const now = cfg.now ?? (() => new Date())

  const datasetDir = cfg.outDir
  const itemsDir = path.join(datasetDir, "items")
  await ensureDir(itemsDir)
  await writeJsonSchemas(path.join(datasetDir, "schemas"))

  const cycle = cycleCategories(cfg.categories, cfg.count)
  const ids: string[] = []

  for (const category of cycle) {
    const id = newId()
    const itemDir = path.join(itemsDir, id)
    const inputsDir = path.join(itemDir, "inputs")
    const expectedDir = path.join(itemDir, "expected")
    await ensureDir(inputsDir)
    await ensureDir(expectedDir)

    const input = makeInput(category)
    await ensureSafeText(input.taskPrompt, { context: "item_input", moderate })

    const expected = makeExpected(category)
    const target = await expectedTarget(category, input.taskPrompt, offline, moderate)
    await ensureSafeText(target, { context: "expected", moderate })

    await writeFile(path.join(inputsDir, "prompt.txt"), input.taskPrompt, "utf8")
    for (const [name, content] of Object.entries(input.attachments)) {
      await writeFile(path.join(inputsDir, name), content, "utf8")
    }

    await writeFile(path.join(expectedDir, "description.txt"), expected.description, "utf8")
    await writeFile(path.join(expectedDir, "target.txt"), target, "utf8")
    await writeJson(path.join(expectedDir, "checks.json"), expected.checks)

    const meta = ItemMetaSchema.parse({
      id,
      category,
      createdAt: now().toISOString(),
      blacklistPassed: true,
      moderationPassed: true,
      notes: moderate === null ? "moderation skipped (offline)" : undefined,
    })
    await writeJson(path.join(itemDir, "meta.json"), meta)

    ids.push(id)
    cfg.onProgress?.(ids.length, cycle.length, id)
  }

  const manifest = DatasetManifestSchema.parse({
    count: ids.length,
    categories: [...new Set(cycle)],
    items: ids,
  })
  await writeJson(path.join(datasetDir, "manifest.json"), manifest)
  await writeFile(path.join(datasetDir, "README.md"), renderDatasetReadme(), "utf8")

  return { dir: datasetDir, count: ids.length, items: ids }
}
