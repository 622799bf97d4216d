import { access, appendFile, mkdir, writeFile } from "node:fs/promises"
import path from "node:path"

/**
 * Ensures a directory exists, creating it recursively if necessary.
 * @param dir - The directory path to ensure.
 */
export async function ensureDir(dir: string) {
  if (!dir || typeof dir !== "string") {
    throw new Error("Path must be a non-empty string")
  }
  await mkdir(dir, { recursive: true })
}

/**
 * Writes an array of objects to a JSONL file, replacing its contents.
 * @param file - The file path to write to.
 * @param rows - Array of objects to serialize.
 */
export async function writeJsonl(file: string, rows: unknown[]) {
  if (!file || typeof file !== "string") {
    throw new Error("Path must be a non-empty string")
  }
  if (!Array.isArray(rows)) {
    throw new Error("Rows must be an array")
  }
  const content = rows.map((r) => JSON.stringify(r)).join("\n") + (rows.length ? "\n" : "")
  await ensureDir(path.dirname(file))
  await writeFile(file, content, "utf8")
}

/**
 * Appends one JSON line to a file, creating parent directories.
 */
export async function appendJsonl(file: string, row: unknown) {
  await ensureDir(path.dirname(file))
  await appendFile(file, JSON.stringify(row) + "\n", "utf8")
}

/** Writes pretty-printed JSON followed by a newline. */
export async function writeJson(file: string, value: unknown) {
  await ensureDir(path.dirname(file))
  await writeFile(file, JSON.stringify(value, null, 2) + "\n", "utf8")
}

/** True when the path can be accessed. */
export async function pathExists(p: string): Promise<boolean> {
  try {
    await access(p)
    return true
  } catch {
    return false
  }
}
