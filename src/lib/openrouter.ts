import { generateText } from "ai"
import { createOpenRouter } from "@openrouter/ai-sdk-provider"
import type { ApiGenerateFn } from "./clients"

/**
 * Reads the OpenRouter API key from the environment.
 * @throws Error naming the variable when it is missing.
 */
export function requireOpenRouterKey(): string {
  const apiKey = process.env.OPENROUTER_API_KEY
  if (!apiKey || !apiKey.trim()) {
    throw new Error(
      "Missing OPENROUTER_API_KEY env var. Set it and rerun, or drop --live to use mock models.",
    )
  }
  return apiKey.trim()
}

/**
 * Builds an {@link ApiGenerateFn} that calls an OpenRouter chat model.
 * @param apiKey - The OpenRouter API key.
 * @param modelId - OpenRouter model identifier.
 * @param maxRetries - Retries on transient failures, with backoff.
 */
export function createOpenRouterGenerate(
  apiKey: string,
  modelId: string,
  maxRetries = 2,
): ApiGenerateFn {
  if (!apiKey || typeof apiKey !== "string") {
    throw new Error("OpenRouter API key must be a non-empty string")
  }
  if (!modelId || typeof modelId !== "string") {
    throw new Error("Model ID must be a non-empty string")
  }

  const openrouter = createOpenRouter({ apiKey })
  return async (prompt, maxTokens, temperature) => {
    const result = await generateText({
      model: openrouter.chat(modelId),
      prompt,
      maxTokens,
      temperature,
      maxRetries,
    })
    return result.text ?? ""
  }
}
