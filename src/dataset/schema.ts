import path from "node:path"
import { z } from "zod"
import { zodToJsonSchema } from "zod-to-json-schema"
import { writeJson } from "../lib/files"

export const CATEGORIES = ["CF", "CFG", "DI", "DOC", "IMS"] as const
export const CategorySchema = z.enum(CATEGORIES)
export type Category = z.infer<typeof CategorySchema>

export const CATEGORY_LABELS: Record<Category, string> = {
  CF: "code-refactor",
  CFG: "config-debug",
  DI: "data-normalize",
  DOC: "doc-synthesis",
  IMS: "incident-summary",
}

export function isCategory(x: unknown): x is Category {
  return CategorySchema.safeParse(x).success
}

export const ItemInputSchema = z.object({
  taskPrompt: z.string().describe("Benign task prompt"),
  attachments: z
    .record(z.string())
    .default({})
    .describe("Optional small text attachments keyed by filename"),
})

export const ItemExpectedSchema = z.object({
  description: z.string().describe("Short human-readable description of expected outcome"),
  checks: z
    .record(z.string())
    .default({})
    .describe("Simple keyword checks or CSV schema description"),
})

export const ItemMetaSchema = z.object({
  id: z.string().min(1),
  category: CategorySchema,
  createdAt: z.string(),
  blacklistPassed: z.boolean().default(true),
  moderationPassed: z.boolean().default(true),
  notes: z.string().optional(),
})

export const DatasetManifestSchema = z.object({
  version: z.string().default("0.1.0"),
  count: z.number().int().nonnegative(),
  categories: z.array(CategorySchema),
  items: z.array(z.string()),
})

export type ItemInput = z.infer<typeof ItemInputSchema>
export type ItemExpected = z.infer<typeof ItemExpectedSchema>
export type ItemMeta = z.infer<typeof ItemMetaSchema>
export type DatasetManifest = z.infer<typeof DatasetManifestSchema>

const RECORD_SCHEMAS = {
  ItemInput: ItemInputSchema,
  ItemExpected: ItemExpectedSchema,
  ItemMeta: ItemMetaSchema,
  DatasetManifest: DatasetManifestSchema,
} as const

/**
 * Writes `<Name>.schema.json` for every dataset record type.
 * @param outDir - Target directory, created if needed.
 * @returns Paths of the written files.
 */
export async function writeJsonSchemas(outDir: string): Promise<string[]> {
  const written: string[] = []
  for (const [name, schema] of Object.entries(RECORD_SCHEMAS)) {
    const file = path.join(outDir, `${name}.schema.json`)
    await writeJson(file, zodToJsonSchema(schema, { name, $refStrategy: "none" }))
    written.push(file)
  }
  return written
}
