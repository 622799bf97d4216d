import { readFile } from "node:fs/promises"
import path from "node:path"
import type { z } from "zod"
import { pathExists } from "../lib/files"
import { DatasetManifestSchema, ItemMetaSchema } from "./schema"

export type ValidationResult = {
  ok: boolean
  errors: string[]
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ")
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(text) }
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) }
  }
}

/**
 * Checks one item directory: `inputs/`, `expected/` and `meta.json` must
 * exist, the meta must match its schema, and `inputs/prompt.txt` plus a
 * parseable `expected/checks.json` must be present.
 */
export async function validateItemDir(itemDir: string): Promise<ValidationResult> {
  const inputs = path.join(itemDir, "inputs")
  const expected = path.join(itemDir, "expected")
  const metaPath = path.join(itemDir, "meta.json")

  const present = await Promise.all([pathExists(inputs), pathExists(expected), pathExists(metaPath)])
  if (present.includes(false)) {
    return { ok: false, errors: ["missing required files/directories"] }
  }

  const errors: string[] = []

  const meta = parseJson(await readFile(metaPath, "utf8"))
  if (!meta.ok) {
    errors.push(`meta invalid: ${meta.message}`)
  } else {
    const parsed = ItemMetaSchema.safeParse(meta.value)
    if (!parsed.success) errors.push(`meta invalid: ${describeIssues(parsed.error)}`)
  }

  if (!(await pathExists(path.join(inputs, "prompt.txt")))) {
    errors.push("inputs/prompt.txt missing")
  }

  const checksPath = path.join(expected, "checks.json")
  if (!(await pathExists(checksPath))) {
    errors.push("expected/checks.json missing")
  } else {
    const checks = parseJson(await readFile(checksPath, "utf8"))
    if (!checks.ok) errors.push(`checks.json invalid: ${checks.message}`)
  }

  return { ok: errors.length === 0, errors }
}

/** Item ids name a single directory under `items/`. */
export function isItemId(id: string): boolean {
  return id !== "" && id !== "." && id !== ".." && !/[\\/]/.test(id)
}

/**
 * Validates the manifest and every item it lists. Item errors are prefixed
 * with the item id.
 */
export async function validateDataset(root: string): Promise<ValidationResult> {
  const manifestPath = path.join(root, "manifest.json")
  if (!(await pathExists(manifestPath))) {
    return { ok: false, errors: ["manifest.json missing"] }
  }

  const raw = parseJson(await readFile(manifestPath, "utf8"))
  if (!raw.ok) {
    return { ok: false, errors: [`manifest invalid: ${raw.message}`] }
  }
  const manifest = DatasetManifestSchema.safeParse(raw.value)
  if (!manifest.success) {
    return { ok: false, errors: [`manifest invalid: ${describeIssues(manifest.error)}`] }
  }

  const errors: string[] = []
  for (const id of manifest.data.items) {
    if (!isItemId(id)) {
      errors.push(`${id}: invalid item id`)
      continue
    }
    const res = await validateItemDir(path.join(root, "items", id))
    errors.push(...res.errors.map((e) => `${id}: ${e}`))
  }
  return { ok: errors.length === 0, errors }
}
