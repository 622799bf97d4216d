export {
  SafeContentError,
  createSafetyPolicy,
  findUnsafeReasons,
  isSafeText,
  safeTextOk,
  redactIfUnsafe,
  type SafetyPolicy,
} from "./src/lib/safety"

export {
  ModelClient,
  ModelAClient,
  ModelBClient,
  UnsafeOutputError,
  asModelCaller,
  type ModelCaller,
  type ApiGenerateFn,
} from "./src/lib/clients"

export { estimateTokens } from "./src/lib/tokens"
export { automatedDecompose, safeAggregator, type DecompositionResult } from "./src/lib/decompose"
export { runPipeline, type Pipeline, type Strategy } from "./src/lib/pipeline"
export { JsonlLogger, type RunLog, type SubtaskLog } from "./src/lib/runLog"

export {
  evaluateSingleModel,
  evaluateComposedModel,
  runEvaluation,
  summarizeResults,
  type EvalRow,
  type SummaryRow,
} from "./src/lib/evaluate"

export { generateReport, renderMarkdownTable, type ReportConfig } from "./src/lib/report"
export { loadTasks, DEFAULT_TASKS, type ProxyTask } from "./src/lib/tasks"

export { generateDataset, type GenConfig } from "./src/dataset/generate"
export { validateDataset, validateItemDir } from "./src/dataset/validate"
export { CATEGORIES, type Category } from "./src/dataset/schema"
