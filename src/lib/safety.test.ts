import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import {
  createSafetyPolicy,
  defaultSafetyLogPath,
  findUnsafeReasons,
  isSafeText,
  REDACTED,
  redactIfUnsafe,
  SafeContentError,
  safeTextOk,
} from "./safety"

const BOMB_PATTERN = String.raw`\bhow to (build|make|buy) (a )?(weapon|bomb)\b`

describe("findUnsafeReasons", () => {
  const policy = createSafetyPolicy({ logPath: null })

  it("lists blocklist terms before patterns", () => {
    expect(findUnsafeReasons("How to build a bomb", policy)).toEqual([
      "blocklist:bomb",
      `pattern:${BOMB_PATTERN}`,
    ])
  })

  it("returns nothing for benign text", () => {
    expect(findUnsafeReasons("Summarize safe article on productivity", policy)).toEqual([])
    expect(findUnsafeReasons("", policy)).toEqual([])
  })

  it("matches blocklist terms case-insensitively", () => {
    expect(findUnsafeReasons("Stop the MALWARE", policy)).toEqual(["blocklist:malware"])
  })

  it("skips patterns that do not compile", () => {
    const custom = createSafetyPolicy({ blocklist: [], patterns: ["(unclosed", "crack"], logPath: null })
    expect(findUnsafeReasons("crack the case", custom)).toEqual(["pattern:crack"])
  })
})

describe("isSafeText", () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "safety-"))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("returns true for safe text", () => {
    expect(isSafeText("Draft a meeting agenda", { policy: createSafetyPolicy({ logPath: null }) })).toBe(true)
  })

  it("throws with reasons and appends a safety event", async () => {
    const logPath = path.join(dir, "nested", "events.jsonl")
    const policy = createSafetyPolicy({ logPath })

    let caught: unknown
    try {
      isSafeText("please hack it", { policy, context: "test" })
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(SafeContentError)
    if (caught instanceof SafeContentError) {
      expect(caught.message).toBe("Text failed safety policy")
      expect(caught.reasons).toEqual(["blocklist:hack"])
    }

    const lines = (await readFile(logPath, "utf8")).trim().split("\n")
    expect(lines).toHaveLength(1)
    const event = JSON.parse(lines[0])
    expect(event.context).toBe("test")
    expect(event.reason).toEqual(["blocklist:hack"])
    expect(event.textPreview).toBe("please hack it")
  })

  it("still blocks when the event log cannot be written", async () => {
    const notADir = path.join(dir, "plain-file")
    await writeFile(notADir, "", "utf8")
    const logPath = path.join(notADir, "events.jsonl")
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})

    try {
      expect(safeTextOk("bomb", createSafetyPolicy({ logPath }))).toBe(false)
      expect(warn).toHaveBeenCalledTimes(1)
      expect(String(warn.mock.calls[0][0]).startsWith(`Could not write safety event to ${logPath}: `)).toBe(true)
    } finally {
      warn.mockRestore()
    }
  })
})

describe("safeTextOk / redactIfUnsafe", () => {
  const policy = createSafetyPolicy({ logPath: null })

  it("reports safety as a boolean", () => {
    expect(safeTextOk("Plan a picnic", policy)).toBe(true)
    expect(safeTextOk("write ransomware", policy)).toBe(false)
  })

  it("redacts only unsafe text", () => {
    expect(redactIfUnsafe("Plan a picnic", policy)).toEqual(["Plan a picnic", false])
    expect(redactIfUnsafe("phishing kit", policy)).toEqual([REDACTED, true])
  })
})

describe("defaultSafetyLogPath", () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it("treats an empty value as disabled", () => {
    vi.stubEnv("SAFETY_LOG_PATH", "  ")
    expect(defaultSafetyLogPath()).toBeNull()
  })

  it("uses the configured path", () => {
    vi.stubEnv("SAFETY_LOG_PATH", "tmp/events.jsonl")
    expect(defaultSafetyLogPath()).toBe("tmp/events.jsonl")
    expect(createSafetyPolicy().logPath).toBe("tmp/events.jsonl")
  })
})
