import { Command, Option, type OptionValues } from "commander"
import { DEFAULT_MODELS } from "../config/models"
import { CATEGORIES, isCategory, type Category } from "../dataset/schema"
import { DEFAULT_RUN_LOG_PATH, isStrategy, STRATEGIES, type Strategy } from "./pipeline"

export type RunArgs = {
  prompt: string
  strategy: Strategy
  subtasks: string[]
  log: string
  live: boolean
  modelA: string
  modelB: string
}

export type EvalArgs = {
  tasksFile?: string
  limit?: number
  trials: number
  seed: number
  out: string
  concurrency: number
  live: boolean
  models: { single: string; weak: string; strong: string }
  reportDir?: string
  pdf: boolean
}

export type ReportArgs = {
  results: string
  out: string
  configFile?: string
  pdf: boolean
}

export type DatasetGenerateArgs = {
  out: string
  count: number
  categories: Category[]
  offline: boolean
}

export type DatasetValidateArgs = {
  dir: string
}

export type CommandHandlers = {
  run(args: RunArgs): Promise<void>
  eval(args: EvalArgs): Promise<void>
  report(args: ReportArgs): Promise<void>
  datasetGenerate(args: DatasetGenerateArgs): Promise<void>
  datasetValidate(args: DatasetValidateArgs): Promise<void>
}

/**
 * Parses a strictly positive integer flag value.
 * @throws Error naming the flag and the rejected value.
 */
export function parsePositiveInt(name: string, raw: unknown): number {
  const n = Number.parseInt(String(raw), 10)
  if (isNaN(n) || n < 1) {
    throw new Error(`Invalid ${name}: ${String(raw)}. Must be a positive integer.`)
  }
  return n
}

export function parseInteger(name: string, raw: unknown): number {
  const n = Number.parseInt(String(raw), 10)
  if (isNaN(n)) {
    throw new Error(`Invalid ${name}: ${String(raw)}. Must be an integer.`)
  }
  return n
}

export function parseNonNegativeInt(name: string, raw: unknown): number {
  const n = Number.parseInt(String(raw), 10)
  if (isNaN(n) || n < 0) {
    throw new Error(`Invalid ${name}: ${String(raw)}. Must be a non-negative integer.`)
  }
  return n
}

function nonEmpty(name: string, raw: unknown): string {
  const s = String(raw ?? "").trim()
  if (!s) {
    throw new Error(`${name} cannot be empty`)
  }
  return s
}

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value])
}

function optionalString(v: unknown): string | undefined {
  return v === undefined || v === null || v === "" ? undefined : String(v)
}

export function toRunArgs(prompt: string, opts: OptionValues): RunArgs {
  const strategy = String(opts.strategy)
  if (!isStrategy(strategy)) {
    throw new Error(`Invalid strategy: ${strategy}. Expected one of: ${STRATEGIES.join(", ")}`)
  }
  const subtasks: string[] = Array.isArray(opts.subtask) ? opts.subtask.map(String) : []
  return {
    prompt: nonEmpty("Prompt", prompt),
    strategy,
    subtasks: strategy === "manual" ? subtasks : [],
    log: nonEmpty("Log path", opts.log),
    live: Boolean(opts.live),
    modelA: nonEmpty("Model A", opts.modelA),
    modelB: nonEmpty("Model B", opts.modelB),
  }
}

export function toEvalArgs(opts: OptionValues): EvalArgs {
  return {
    tasksFile: optionalString(opts.tasks),
    limit: opts.limit === undefined ? undefined : parsePositiveInt("limit", opts.limit),
    trials: parsePositiveInt("trials", opts.trials),
    seed: parseInteger("seed", opts.seed),
    out: nonEmpty("Output directory", opts.out),
    concurrency: parsePositiveInt("concurrency", opts.concurrency),
    live: Boolean(opts.live),
    models: {
      single: nonEmpty("Single model", opts.singleModel),
      weak: nonEmpty("Weak model", opts.weakModel),
      strong: nonEmpty("Strong model", opts.strongModel),
    },
    reportDir: optionalString(opts.report),
    pdf: opts.pdf !== false,
  }
}

export function toReportArgs(opts: OptionValues): ReportArgs {
  return {
    results: nonEmpty("Results path", opts.results),
    out: nonEmpty("Output directory", opts.out),
    configFile: optionalString(opts.config),
    pdf: opts.pdf !== false,
  }
}

export function toDatasetGenerateArgs(opts: OptionValues): DatasetGenerateArgs {
  const raw: unknown[] = Array.isArray(opts.categories) ? opts.categories : [...CATEGORIES]
  const categories: Category[] = []
  for (const c of raw) {
    if (!isCategory(c)) {
      throw new Error(`Unsupported category: ${String(c)}. Expected one of: ${CATEGORIES.join(", ")}`)
    }
    categories.push(c)
  }
  if (categories.length === 0) {
    throw new Error("At least one category must be specified")
  }
  return {
    out: nonEmpty("Output directory", opts.out),
    count: parseNonNegativeInt("count", opts.count),
    categories,
    offline: Boolean(opts.offline),
  }
}

/**
 * Builds the command-line program. Each subcommand validates its flags and
 * hands typed arguments to the matching handler.
 */
export function buildProgram(handlers: CommandHandlers): Command {
  const program = new Command()
    .name("decomposition-harness")
    .description("Benign decomposition-attack proxy harness and dataset generator")

  program
    .command("run")
    .description("Run one task through manual or automated decomposition")
    .argument("<prompt>", "The top-level task prompt (safe content only)")
    .addOption(
      new Option("--strategy <name>", "Decomposition strategy").choices([...STRATEGIES]).default("automated"),
    )
    .option("--subtask <text>", "Manual subtask (repeatable, used with --strategy manual)", collect, [])
    .option("--log <path>", "JSONL run log", DEFAULT_RUN_LOG_PATH)
    .option("--live", "Call OpenRouter models instead of deterministic stubs", false)
    .option("--model-a <id>", "Executor model (with --live)", DEFAULT_MODELS.strong)
    .option("--model-b <id>", "Planner model (with --live)", DEFAULT_MODELS.weak)
    .action((prompt: string, opts: OptionValues) => handlers.run(toRunArgs(prompt, opts)))

  program
    .command("eval")
    .description("Compare the single-model baseline with the composed pipeline")
    .option("--tasks <path>", "JSONL task file (defaults to the built-in tasks)")
    .option("--limit <n>", "Maximum number of tasks to load from --tasks")
    .option("--trials <n>", "Shuffled passes over the task list", "3")
    .option("--seed <n>", "Shuffle seed", "42")
    .option("--out <dir>", "Directory for result CSV/JSONL and plots", "logs")
    .option("--concurrency <n>", "Tasks evaluated in parallel", "1")
    .option("--live", "Call OpenRouter models instead of mock clients", false)
    .option("--single-model <id>", "Single-model baseline", DEFAULT_MODELS.single)
    .option("--weak-model <id>", "Planner of the composed pipeline", DEFAULT_MODELS.weak)
    .option("--strong-model <id>", "Executor of the composed pipeline", DEFAULT_MODELS.strong)
    .option("--report <dir>", "Also write a Markdown report to this directory")
    .option("--no-pdf", "Skip PDF conversion of the --report output")
    .action((opts: OptionValues) => handlers.eval(toEvalArgs(opts)))

  program
    .command("report")
    .description("Write a Markdown report from saved evaluation results")
    .option("--results <path>", "eval_results.jsonl written by eval", "logs/eval_results.jsonl")
    .option("--out <dir>", "Report directory", "report")
    .option("--config <path>", "JSON file with introduction/models metadata")
    .option("--no-pdf", "Skip PDF conversion even when pandoc is available")
    .action((opts: OptionValues) => handlers.report(toReportArgs(opts)))

  const dataset = program.command("dataset").description("Benign proxy dataset tools")

  dataset
    .command("generate")
    .description("Generate a safe, benign proxy dataset")
    .option("--out <dir>", "Output dataset directory", "dataset")
    .option("--count <n>", "Number of items to generate", "10")
    .option("--categories <list...>", `Subset of categories (${CATEGORIES.join(", ")})`)
    .option("--offline", "Do not call any API; use deterministic targets", false)
    .action((opts: OptionValues) => handlers.datasetGenerate(toDatasetGenerateArgs(opts)))

  dataset
    .command("validate")
    .description("Validate a generated dataset directory")
    .argument("<dir>", "Dataset root")
    .action((dir: string) => handlers.datasetValidate({ dir: nonEmpty("Dataset directory", dir) }))

  return program
}
