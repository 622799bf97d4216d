import { appendFileSync, mkdirSync } from "node:fs"
import path from "node:path"

export const REDACTED = "[REDACTED for safety]"

/**
 * Raised when text fails the safety policy. `reasons` lists every trigger
 * that fired, e.g. `blocklist:bomb` or `pattern:<regex source>`.
 */
export class SafeContentError extends Error {
  readonly reasons: string[]

  constructor(message: string, reasons: string[] = []) {
    super(message)
    this.name = "SafeContentError"
    this.reasons = reasons
  }
}

export type SafetyPolicy = {
  blocklist: string[]
  patterns: string[]
  /** JSONL file receiving one event per blocked text; null disables it. */
  logPath: string | null
}

export type SafetyEvent = {
  timestamp: string
  context: string
  reason: string[]
  textPreview: string
}

const HARNESS_BLOCKLIST = [
  // violence / terrorism
  "kill",
  "murder",
  "terror",
  "bomb",
  "weapon",
  "shoot",
  "suicide",
  // cybercrime
  "hack",
  "hacking",
  "exploit",
  "malware",
  "ransomware",
  "phishing",
  "keylogger",
  "ddos",
  // illegal activity
  "drug manufacturing",
  "counterfeit",
  "forgery",
  // adult content
  "porn",
  "nude",
  "explicit",
  "sex",
  // harm to minors
  "child abuse",
  "cp",
  "minor sexual",
  // self-harm
  "self harm",
  "self-harm",
  // gore
  "gore",
  "torture",
]

const HARNESS_PATTERNS = [
  String.raw`\bhow to (build|make|buy) (a )?(weapon|bomb)\b`,
  String.raw`\b(bypass|break|crack) (security|password|drm)\b`,
  String.raw`\bmanufactur(e|ing) (drugs|narcotics)\b`,
]

/**
 * Resolves the safety event log path from `SAFETY_LOG_PATH`.
 * An empty value disables the log.
 */
export function defaultSafetyLogPath(): string | null {
  const fromEnv = process.env.SAFETY_LOG_PATH
  if (fromEnv === undefined) return "logs/safety_events.jsonl"
  const trimmed = fromEnv.trim()
  return trimmed ? trimmed : null
}

export function createSafetyPolicy(overrides: Partial<SafetyPolicy> = {}): SafetyPolicy {
  return {
    blocklist: overrides.blocklist ?? [...HARNESS_BLOCKLIST],
    patterns: overrides.patterns ?? [...HARNESS_PATTERNS],
    logPath: overrides.logPath !== undefined ? overrides.logPath : defaultSafetyLogPath(),
  }
}

function compilePattern(source: string): RegExp | null {
  try {
    return new RegExp(source, "i")
  } catch {
    return null
  }
}

/**
 * Placeholder for a content classifier. Only consulted when no hard trigger
 * fired; always labels text as benign.
 */
function classify(_text: string): { label: string; category: string } {
  return { label: "safe", category: "benign" }
}

/**
 * Lists the reasons a text violates the policy, blocklist terms first and
 * then patterns, both in policy order.
 * @param text - The text to check.
 * @param policy - Policy to check against.
 * @returns Reasons, empty when the text is safe.
 */
export function findUnsafeReasons(text: string, policy: SafetyPolicy): string[] {
  if (!text) return []

  const lowered = text.toLowerCase()
  const reasons: string[] = []

  for (const term of policy.blocklist) {
    if (term && lowered.includes(term.toLowerCase())) {
      reasons.push(`blocklist:${term}`)
    }
  }

  for (const source of policy.patterns) {
    const re = compilePattern(source)
    if (re && re.test(text)) {
      reasons.push(`pattern:${source}`)
    }
  }

  if (reasons.length === 0) {
    const verdict = classify(text)
    if (verdict.label !== "safe" && verdict.label !== "benign") {
      reasons.push(`classifier:${verdict.label}/${verdict.category}`)
    }
  }

  return reasons
}

function logSafetyEvent(policy: SafetyPolicy, event: SafetyEvent) {
  if (!policy.logPath) return
  try {
    mkdirSync(path.dirname(policy.logPath), { recursive: true })
    appendFileSync(policy.logPath, JSON.stringify(event) + "\n", "utf8")
  } catch (err) {
    console.warn(
      `Could not write safety event to ${policy.logPath}: ${err instanceof Error ? err.message : String(err)}`,
    )
  }
}

/**
 * Checks text against the safety policy. Does not sanitize.
 * @returns Always true; unsafe text throws instead.
 * @throws SafeContentError listing the triggers, after logging the event.
 */
export function isSafeText(
  text: string,
  options: { policy?: SafetyPolicy; context?: string } = {},
): true {
  const policy = options.policy ?? createSafetyPolicy()
  const reasons = findUnsafeReasons(text, policy)

  if (reasons.length > 0) {
    logSafetyEvent(policy, {
      timestamp: new Date().toISOString(),
      context: options.context ?? "",
      reason: reasons,
      textPreview: text.slice(0, 120),
    })
    throw new SafeContentError("Text failed safety policy", reasons)
  }

  return true
}

/** Boolean form of {@link isSafeText}. */
export function safeTextOk(text: string, policy?: SafetyPolicy): boolean {
  try {
    isSafeText(text, { policy })
    return true
  } catch (err) {
    if (err instanceof SafeContentError) return false
    throw err
  }
}

/**
 * Returns the text unchanged when safe, otherwise the redaction placeholder.
 * The harness itself blocks rather than redacts; this is kept for callers
 * that need a displayable value.
 */
export function redactIfUnsafe(text: string, policy?: SafetyPolicy): [string, boolean] {
  return safeTextOk(text, policy) ? [text, false] : [REDACTED, true]
}
