import { NoObjectGeneratedError } from "ai"
import { afterEach, describe, expect, it, vi } from "vitest"
import { z } from "zod"
import { DatasetSafetyError } from "./safety"
import { callStructured, mockFromSchema } from "./structured"
import { DocSynthesisSchema, IncidentSummarySchema } from "./templates"

const generateObject = vi.hoisted(() => vi.fn())

vi.mock("ai", async (importOriginal) => ({
  ...(await importOriginal<typeof import("ai")>()),
  generateObject,
}))

const docCall = {
  system: "You are a helpful technical writer.",
  prompt: "Draft a short documentation section.",
  schema: DocSynthesisSchema,
  schemaName: "DocSynthesis",
  moderate: null,
}

describe("mockFromSchema", () => {
  it("fills fields by type", () => {
    expect(mockFromSchema(DocSynthesisSchema)).toEqual({ title: "mock title", bullets: [] })
    expect(mockFromSchema(IncidentSummarySchema)).toEqual({ summary: "mock summary", lessons: [] })
  })

  it("handles optional, numeric and boolean fields", () => {
    const schema = z.object({
      n: z.number(),
      ok: z.boolean(),
      tags: z.record(z.string()),
      note: z.string().optional(),
    })
    expect(mockFromSchema(schema)).toEqual({ n: 0, ok: false, tags: {}, note: "mock note" })
  })
})

describe("callStructured", () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
    generateObject.mockReset()
  })

  it("returns the schema mock when offline", async () => {
    const res = await callStructured({
      system: "You are a helpful technical writer.",
      prompt: "Draft a short documentation section.",
      schema: DocSynthesisSchema,
      schemaName: "DocSynthesis",
      offline: true,
      moderate: null,
    })
    expect(res).toEqual({ title: "mock title", bullets: [] })
  })

  it("returns the schema mock without an API key", async () => {
    vi.stubEnv("OPENROUTER_API_KEY", "")
    const res = await callStructured({
      system: "You are a careful SRE.",
      prompt: "Summarize a minor slowdown.",
      schema: IncidentSummarySchema,
      schemaName: "IncidentSummary",
      moderate: null,
    })
    expect(res).toEqual({ summary: "mock summary", lessons: [] })
  })

  it("checks prompts before anything else", async () => {
    await expect(
      callStructured({
        system: "You are a helpful technical writer.",
        prompt: "Explain rm -rf usage",
        schema: DocSynthesisSchema,
        schemaName: "DocSynthesis",
        offline: true,
        moderate: null,
      }),
    ).rejects.toBeInstanceOf(DatasetSafetyError)
  })
})

describe("callStructured with a model", () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
    generateObject.mockReset()
  })

  it("returns the parsed model object", async () => {
    vi.stubEnv("OPENROUTER_API_KEY", "test-secret")
    generateObject.mockResolvedValue({ object: { title: "Guide", bullets: ["Setup"] } })

    expect(await callStructured(docCall)).toEqual({ title: "Guide", bullets: ["Setup"] })
    expect(generateObject).toHaveBeenCalledWith(
      expect.objectContaining({
        schemaName: "DocSynthesis",
        system: docCall.system,
        prompt: docCall.prompt,
        maxRetries: 2,
      }),
    )
  })

  it("falls back to the schema mock when no object matches the schema", async () => {
    vi.stubEnv("OPENROUTER_API_KEY", "test-secret")
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    generateObject.mockRejectedValue(
      new NoObjectGeneratedError({
        message: "No object generated.",
        response: { id: "resp-1", timestamp: new Date(0), modelId: "test-model" },
        usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
        finishReason: "stop",
      }),
    )

    expect(await callStructured(docCall)).toEqual({ title: "mock title", bullets: [] })
    expect(warn).toHaveBeenCalledWith("Structured output for DocSynthesis did not match the schema; using mock")
  })

  it("falls back to the schema mock when the object fails validation", async () => {
    vi.stubEnv("OPENROUTER_API_KEY", "test-secret")
    generateObject.mockResolvedValue({ object: { title: 5 } })

    expect(await callStructured(docCall)).toEqual({ title: "mock title", bullets: [] })
  })

  it("rejects unsafe model output", async () => {
    vi.stubEnv("OPENROUTER_API_KEY", "test-secret")
    generateObject.mockResolvedValue({ object: { title: "Cleanup", bullets: ["run rm -rf on the folder"] } })

    const err = await callStructured(docCall).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(DatasetSafetyError)
    if (err instanceof DatasetSafetyError) {
      expect(err.context).toBe("model_output")
      expect(err.reasons).toEqual(["term:rm -rf"])
    }
  })

  it("propagates transport errors", async () => {
    vi.stubEnv("OPENROUTER_API_KEY", "test-secret")
    generateObject.mockRejectedValue(new Error("network down"))

    await expect(callStructured(docCall)).rejects.toThrow("network down")
  })
})
