import { execFile } from "node:child_process"
import { copyFile, writeFile } from "node:fs/promises"
import path from "node:path"
import { promisify } from "node:util"
import { z } from "zod"
import { writeMeanTokensChart, writeSuccessRateChart } from "./charts"
import { summarizeResults, VARIANTS, type EvalRow } from "./evaluate"
import { ensureDir, pathExists, writeJson } from "./files"
import { readJsonlFile } from "./readJsonl"

const execFileAsync = promisify(execFile)

export const ReportConfigSchema = z
  .object({
    introduction: z.string().optional(),
    models: z
      .object({
        single: z.string().optional(),
        weak: z.string().optional(),
        strong: z.string().optional(),
      })
      .optional(),
    trials: z.number().int().nonnegative().optional(),
    seed: z.number().int().optional(),
  })
  .passthrough()

export type ReportConfig = z.infer<typeof ReportConfigSchema>

const EvalRowSchema = z.object({
  variant: z.enum(VARIANTS),
  prompt: z.string(),
  output: z.string(),
  accuracy: z.number(),
  success: z.boolean(),
  tokens: z.number(),
})

export const DEFAULT_ATTACH_CANDIDATES = [
  "logs/experiment_runs.jsonl",
  "logs/eval_results.csv",
  "logs/eval_summary.csv",
]

export type ReportOptions = {
  /** Existing files among these are copied into `artifacts/`. */
  attachCandidates?: string[]
  /** Try converting the report to PDF with pandoc. Defaults to true. */
  pdf?: boolean
  now?: () => Date
}

export type ReportResult = {
  reportMd: string
  reportPdf: string | null
  artifactsDir: string
  attached: string[]
}

function formatCell(v: unknown): string {
  if (typeof v === "number") {
    if (!Number.isFinite(v)) return "0"
    return Number.isInteger(v) ? String(v) : String(Number(v.toFixed(4)))
  }
  return String(v ?? "")
    .replace(/\|/g, "\\|")
    .replace(/\r?\n/g, "<br>")
}

/**
 * Renders rows as a GitHub-flavored Markdown table.
 * @param rows - Records to render.
 * @param columns - Column order; defaults to the keys of the first row.
 * @param maxRows - Rows shown before a truncation note is appended.
 * @returns Markdown table, or `(no data)` when there are no rows.
 */
export function renderMarkdownTable<T extends object>(
  rows: T[],
  columns?: Array<keyof T & string>,
  maxRows = 50,
): string {
  if (rows.length === 0) return "(no data)"
  const cols: string[] = columns ?? Object.keys(rows[0])
  const shown = rows.slice(0, maxRows)

  const lines: string[] = []
  lines.push(`| ${cols.join(" | ")} |`)
  lines.push(`| ${cols.map(() => "---").join(" | ")} |`)
  for (const row of shown) {
    const record = new Map<string, unknown>(Object.entries(row))
    lines.push(`| ${cols.map((c) => formatCell(record.get(c))).join(" | ")} |`)
  }
  if (rows.length > maxRows) {
    lines.push("")
    lines.push(`> Note: showing first ${maxRows} of ${rows.length} rows.`)
  }
  return lines.join("\n")
}

async function attachLogs(candidates: string[], artifactsDir: string): Promise<string[]> {
  const attached: string[] = []
  for (const candidate of candidates) {
    if (!(await pathExists(candidate))) continue
    const dst = path.join(artifactsDir, path.basename(candidate))
    try {
      await copyFile(candidate, dst)
      attached.push(dst)
    } catch (err) {
      console.warn(`Could not attach ${candidate}: ${err instanceof Error ? err.message : String(err)}`)
    }
  }
  return attached
}

/**
 * Converts `report.md` to PDF with pandoc, run from the report directory so
 * relative chart paths resolve.
 * @returns The PDF path, or null when pandoc is missing or fails.
 */
async function convertToPdf(outDir: string): Promise<string | null> {
  try {
    await execFileAsync("pandoc", ["--version"])
  } catch {
    return null
  }
  try {
    await execFileAsync("pandoc", ["report.md", "-o", "report.pdf"], { cwd: outDir })
    return path.join(outDir, "report.pdf")
  } catch (err) {
    console.warn(`pandoc could not build report.pdf: ${err instanceof Error ? err.message : String(err)}`)
    return null
  }
}

/**
 * Renders the report body.
 * @param rows - Evaluation rows.
 * @param config - Experiment metadata shown in the Introduction and Models sections.
 * @param generatedAt - ISO timestamp.
 * @param charts - Which chart images to reference.
 */
export function renderReportMarkdown(
  rows: EvalRow[],
  config: ReportConfig,
  generatedAt: string,
  charts: { successRate: boolean; meanTokens: boolean },
): string {
  const summary = summarizeResults(rows)
  const summaryMd = summary.length ? renderMarkdownTable(summary) : "(no summary)"
  const sampleMd = rows.length ? renderMarkdownTable(rows.slice(0, 10)) : "(no samples)"

  const lines: string[] = []
  lines.push("# Experiment Report")
  lines.push("")
  lines.push(`_Generated: ${generatedAt}_`)
  lines.push("")

  lines.push("## Introduction")
  lines.push("")
  lines.push(config.introduction || "This report summarizes evaluation results for model pipelines.")
  lines.push("")

  lines.push("## Methods")
  lines.push("")
  lines.push(
    "We evaluate two variants: a single-model baseline and a composed pipeline using automated decomposition. " +
      "Accuracy is approximated by keyword matches; success is 1.0 accuracy; token usage is a proxy estimate.",
  )
  lines.push("")

  lines.push("## Models")
  lines.push("")
  if (config.models) {
    lines.push(`- Single model: ${config.models.single ?? "(unspecified)"}`)
    lines.push(`- Weak model:   ${config.models.weak ?? "(unspecified)"}`)
    lines.push(`- Strong model: ${config.models.strong ?? "(unspecified)"}`)
  } else {
    lines.push("Models are described in the experiment configuration.")
  }
  lines.push("")

  lines.push("## Safety")
  lines.push("")
  lines.push(
    "All prompts and outputs pass a conservative safety filter. Unsafe content is blocked or redacted. " +
      "No instructions for harmful activities or explicit imagery are produced.",
  )
  lines.push("")

  lines.push("## Results")
  lines.push("")
  if (charts.successRate) {
    lines.push("![Success Rate](artifacts/success_rate.svg)")
    lines.push("")
  }
  if (charts.meanTokens) {
    lines.push("![Mean Token Usage](artifacts/mean_token_usage.svg)")
    lines.push("")
  }
  lines.push("### Summary Table")
  lines.push("")
  lines.push(summaryMd)
  lines.push("")
  lines.push("### Sample Rows")
  lines.push("")
  lines.push(sampleMd)
  lines.push("")

  lines.push("## Discussion")
  lines.push("")
  lines.push("Briefly interpret the results, noting where composition helps or harms performance and cost.")
  lines.push("")

  lines.push("## Limitations")
  lines.push("")
  lines.push("Keyword-based accuracy is a coarse proxy; token estimates are approximate; mock models are deterministic.")
  lines.push("")

  lines.push("## Ethics")
  lines.push("")
  lines.push(
    "All experiments prioritize safety. We avoid generating harmful, illicit, or explicit content and apply defense-in-depth filtering.",
  )
  lines.push("")

  return lines.join("\n")
}

/**
 * Writes `report.md` plus an `artifacts/` folder (charts, config,
 * metadata, copies of existing run logs) into `outputDir`.
 */
export async function generateReport(
  rows: EvalRow[],
  config: ReportConfig,
  outputDir: string,
  options: ReportOptions = {},
): Promise<ReportResult> {
  const artifactsDir = path.join(outputDir, "artifacts")
  await ensureDir(artifactsDir)

  const generatedAt = (options.now ?? (() => new Date()))().toISOString()
  const summary = summarizeResults(rows)
  const haveSummary = summary.length > 0

  if (haveSummary) {
    await writeSuccessRateChart(summary, path.join(artifactsDir, "success_rate.svg"))
    await writeMeanTokensChart(summary, path.join(artifactsDir, "mean_token_usage.svg"))
  }

  const attached = await attachLogs(options.attachCandidates ?? DEFAULT_ATTACH_CANDIDATES, artifactsDir)

  await writeJson(path.join(artifactsDir, "metadata.json"), { generatedAt, config, attached })
  await writeJson(path.join(artifactsDir, "config.json"), config)

  const markdown = renderReportMarkdown(rows, config, generatedAt, {
    successRate: haveSummary,
    meanTokens: haveSummary,
  })
  const reportMd = path.join(outputDir, "report.md")
  await writeFile(reportMd, markdown, "utf8")

  const reportPdf = options.pdf === false ? null : await convertToPdf(outputDir)

  return { reportMd, reportPdf, artifactsDir, attached }
}

/**
 * Loads evaluation rows written by `runEvaluation` (`eval_results.jsonl`).
 * @throws Error naming the line of the first malformed row.
 */
export async function loadEvalRows(filePath: string): Promise<EvalRow[]> {
  const rows: EvalRow[] = []
  for await (const [line, value] of readJsonlFile(filePath)) {
    const parsed = EvalRowSchema.safeParse(value)
    if (!parsed.success) {
      throw new Error(`Invalid result row on line ${line} of ${filePath}: ${parsed.error.issues[0].message}`)
    }
    rows.push(parsed.data)
  }
  return rows
}
