import { readFile } from "node:fs/promises"
import { MOCK_NAMES } from "./config/models"
import { generateDataset } from "./dataset/generate"
import { validateDataset } from "./dataset/validate"
import type {
  CommandHandlers,
  DatasetGenerateArgs,
  DatasetValidateArgs,
  EvalArgs,
  ReportArgs,
  RunArgs,
} from "./lib/args"
import {
  asModelCaller,
  ModelAClient,
  ModelBClient,
  ModelClient,
  type ModelCaller,
} from "./lib/clients"
import { runEvaluation } from "./lib/evaluate"
import { createOpenRouterGenerate, requireOpenRouterKey } from "./lib/openrouter"
import { runPipeline } from "./lib/pipeline"
import { generateReport, loadEvalRows, ReportConfigSchema, type ReportConfig } from "./lib/report"
import { JsonlLogger, totalTokens } from "./lib/runLog"
import { DEFAULT_TASKS, loadTasks } from "./lib/tasks"

function liveClient(apiKey: string, modelId: string): ModelClient {
  return new ModelClient({ name: modelId, apiGenerate: createOpenRouterGenerate(apiKey, modelId) })
}

export async function runCommand(args: RunArgs): Promise<void> {
  let modelA: ModelCaller = new ModelAClient()
  let modelB: ModelCaller = new ModelBClient()
  if (args.live) {
    const apiKey = requireOpenRouterKey()
    modelA = asModelCaller(liveClient(apiKey, args.modelA))
    modelB = asModelCaller(liveClient(apiKey, args.modelB))
  }

  const run = await runPipeline(
    {
      taskName: "ad-hoc",
      prompt: args.prompt,
      modelA,
      modelB,
      manualSubtasks: args.strategy === "manual" ? args.subtasks : undefined,
    },
    args.strategy,
    new JsonlLogger(args.log),
  )

  const summary = {
    runId: run.runId,
    strategy: run.strategy,
    modelA: run.modelA,
    modelB: run.modelB,
    timestamp: run.timestamp,
    subtasks: run.subtasks.map((s) => s.subtask),
    blockedSubtasks: run.blockedSubtasks,
    totalTokens: totalTokens(run),
  }
  console.log(JSON.stringify(summary, null, 2))
}

export async function evalCommand(args: EvalArgs): Promise<void> {
  const tasks = args.tasksFile ? await loadTasks(args.tasksFile, args.limit) : [...DEFAULT_TASKS]

  let singleModel: ModelClient
  let weakModel: ModelClient
  let strongModel: ModelClient
  if (args.live) {
    const apiKey = requireOpenRouterKey()
    singleModel = liveClient(apiKey, args.models.single)
    weakModel = liveClient(apiKey, args.models.weak)
    strongModel = liveClient(apiKey, args.models.strong)
  } else {
    singleModel = new ModelClient({ name: MOCK_NAMES.single, mockMode: true })
    weakModel = new ModelClient({ name: MOCK_NAMES.weak, mockMode: true })
    strongModel = new ModelClient({ name: MOCK_NAMES.strong, mockMode: true })
  }

  console.log(
    `eval: ${tasks.length} tasks | trials: ${args.trials} | seed: ${args.seed} | ${args.live ? "live" : "mock"} models`,
  )

  const result = await runEvaluation({
    tasks,
    singleModel,
    weakModel,
    strongModel,
    trials: args.trials,
    seed: args.seed,
    outDir: args.out,
    concurrency: args.concurrency,
    onProgress: (ev) => {
      if (ev.type === "taskDone" && ev.completed === ev.totalTasks) {
        console.log(`trial ${ev.trial + 1}: ${ev.completed}/${ev.totalTasks} tasks done`)
      }
    },
  })

  for (const s of result.summary) {
    console.log(
      `${s.variant}: acc ${(s.accuracy * 100).toFixed(1)}% | success ${(s.success_rate * 100).toFixed(1)}% | tokens ${s.mean_token_usage.toFixed(1)} | n=${s.count}`,
    )
  }
  console.log(JSON.stringify({ artifacts: result.artifacts }, null, 2))

  if (args.reportDir) {
    const config: ReportConfig = {
      trials: args.trials,
      seed: args.seed,
      models: {
        single: singleModel.name,
        weak: weakModel.name,
        strong: strongModel.name,
      },
    }
    const report = await generateReport(result.rows, config, args.reportDir, {
      attachCandidates: [
        result.artifacts.resultsCsv,
        result.artifacts.summaryCsv,
        result.artifacts.resultsJsonl,
      ],
      pdf: args.pdf,
    })
    console.log(`report: ${report.reportMd}${report.reportPdf ? ` (pdf: ${report.reportPdf})` : ""}`)
  }
}

async function readReportConfig(file: string | undefined): Promise<ReportConfig> {
  if (!file) return {}
  let value: unknown
  try {
    value = JSON.parse(await readFile(file, "utf8"))
  } catch (err) {
    throw new Error(`Could not read report config ${file}: ${err instanceof Error ? err.message : String(err)}`)
  }
  const parsed = ReportConfigSchema.safeParse(value)
  if (!parsed.success) {
    throw new Error(`Invalid report config ${file}: ${parsed.error.issues[0].message}`)
  }
  return parsed.data
}

export async function reportCommand(args: ReportArgs): Promise<void> {
  const rows = await loadEvalRows(args.results)
  const config = await readReportConfig(args.configFile)
  const report = await generateReport(rows, config, args.out, { pdf: args.pdf })
  console.log(JSON.stringify(report, null, 2))
}

export async function datasetGenerateCommand(args: DatasetGenerateArgs): Promise<void> {
  const res = await generateDataset({
    outDir: args.out,
    count: args.count,
    categories: args.categories,
    offline: args.offline,
    onProgress: (done, total) => {
      if (done === total || done % 10 === 0) console.log(`Generating items: ${done}/${total}`)
    },
  })
  console.log(JSON.stringify({ dir: res.dir, count: res.count }, null, 2))
}

export async function datasetValidateCommand(args: DatasetValidateArgs): Promise<void> {
  const res = await validateDataset(args.dir)
  if (res.ok) {
    console.log(`Dataset at ${args.dir} is valid`)
    return
  }
  for (const e of res.errors) console.error(e)
  throw new Error(`Dataset at ${args.dir} has ${res.errors.length} error(s)`)
}

export const handlers: CommandHandlers = {
  run: runCommand,
  eval: evalCommand,
  report: reportCommand,
  datasetGenerate: datasetGenerateCommand,
  datasetValidate: datasetValidateCommand,
}
