import OpenAI from "openai"
import { createSafetyPolicy, findUnsafeReasons, type SafetyPolicy } from "../lib/safety"

/** Raised when dataset content fails the local blacklist or moderation. */
export class DatasetSafetyError extends Error {
  readonly context: string
  readonly reasons: string[]

  constructor(message: string, context: string, reasons: string[] = []) {
    super(message)
    this.name = "DatasetSafetyError"
    this.context = context
    this.reasons = reasons
  }
}

/**
 * Blocks credentials, addresses, exploit vocabulary and shell commands.
 * Dataset content is plain prose and small code snippets, so none of these
 * belong in it.
 */
export const DATASET_SAFETY_POLICY: SafetyPolicy = createSafetyPolicy({
  blocklist: [
    // credentials
    "api_key=",
    "aws_secret",
    "gcp_key",
    "azure_key",
    "token=",
    "password=",
    // addresses / sensitive paths
    "127.0.0.1",
    "0.0.0.0",
    "/etc/passwd",
    "private key",
    // exploits
    "exploit",
    "rce",
    "reverse shell",
    "payload",
    // commands
    "rm -rf",
    "sudo ",
    "wget ",
    "curl ",
    "ssh ",
    "nc ",
    "nmap ",
    "chmod +x",
  ],
  patterns: [
    // JWT-like
    String.raw`\b[A-Za-z0-9_]{16,}\.[A-Za-z0-9_\-]{10,}\.[A-Za-z0-9_\-]{10,}`,
    // IPv4
    String.raw`\b\d{1,3}(?:\.\d{1,3}){3}\b`,
  ],
  logPath: null,
})

/**
 * Runs the local blacklist.
 * @returns `[ok, reasons]` with reasons `term:<t>` or `pattern:<p>`.
 */
export function localBlacklistOk(text: string): [boolean, string[]] {
  const reasons = findUnsafeReasons(text, DATASET_SAFETY_POLICY).map((r) =>
    r.startsWith("blocklist:") ? `term:${r.slice("blocklist:".length)}` : r,
  )
  return [reasons.length === 0, reasons]
}

export type ModerationResult = {
  allowed: boolean
  raw: unknown
}

export type Moderator = (text: string) => Promise<ModerationResult>

/**
 * Moderates text with OpenAI's moderation endpoint when `OPENAI_API_KEY` is
 * set; otherwise allows it.
 */
export const moderateText: Moderator = async (text) => {
  const apiKey = process.env.OPENAI_API_KEY?.trim()
  if (!apiKey) return { allowed: true, raw: { mock: true } }

  const client = new OpenAI({ apiKey, maxRetries: 2 })
  const resp = await client.moderations.create({
    model: "omni-moderation-latest",
    input: text.slice(0, 4000),
  })
  const flagged = resp.results[0]?.flagged ?? false
  return { allowed: !flagged, raw: resp }
}

/**
 * Gate for every prompt and target written into a dataset.
 * @param text - Text to check.
 * @param options.context - Where the text came from; included in errors.
 * @param options.moderate - Moderation hook; pass null to skip moderation.
 * @throws DatasetSafetyError when either check fails.
 */
export async function ensureSafeText(
  text: string,
  options: { context: string; moderate?: Moderator | null },
): Promise<void> {
  const [ok, reasons] = localBlacklistOk(text)
  if (!ok) {
    throw new DatasetSafetyError(
      `Text failed local safety checks (${options.context}): ${reasons.join(", ")}`,
      options.context,
      reasons,
    )
  }

  const moderate = options.moderate === undefined ? moderateText : options.moderate
  if (!moderate) return
  const verdict = await moderate(text)
  if (!verdict.allowed) {
    throw new DatasetSafetyError(`Text failed moderation (${options.context})`, options.context)
  }
}
