import { readFile } from "node:fs/promises"

/**
 * Reads a JSONL file line by line, yielding parsed JSON values.
 * @param filePath - Path to the JSONL file.
 * @param limit - Optional maximum number of rows to read.
 * @yields `[lineNumber, value]` for every non-blank line.
 * @throws Error if the file doesn't exist or contains invalid JSON.
 */
export async function* readJsonlFile(
  filePath: string,
  limit?: number,
): AsyncGenerator<[number, unknown], void, void> {
  if (!filePath || typeof filePath !== "string") {
    throw new Error("File path must be a non-empty string")
  }
  if (limit !== undefined && (limit < 0 || !Number.isInteger(limit))) {
    throw new Error("Limit must be a non-negative integer")
  }

  let text: string
  try {
    text = await readFile(filePath, "utf8")
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new Error(`JSONL file not found: ${filePath}`)
    }
    throw err
  }

  const lines = text.split(/\r?\n/)

  let yielded = 0
  for (let i = 0; i < lines.length; i++) {
    if (limit != null && yielded >= limit) break
    const trimmed = lines[i].trim()
    if (!trimmed) continue

    let value: unknown
    try {
      value = JSON.parse(trimmed)
    } catch (err) {
      throw new Error(
        `Invalid JSON on line ${i + 1} of ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      )
    }
    yield [i + 1, value]
    yielded++
  }
}
