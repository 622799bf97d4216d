import { generateObject, NoObjectGeneratedError } from "ai"
import { createOpenRouter } from "@openrouter/ai-sdk-provider"
import { z } from "zod"
import { structuredModelId } from "../config/models"
import { ensureSafeText, type Moderator } from "./safety"

function unwrap(field: z.ZodTypeAny): z.ZodTypeAny {
  let inner = field
  while (true) {
    if (inner instanceof z.ZodOptional || inner instanceof z.ZodNullable) {
      inner = inner.unwrap()
    } else if (inner instanceof z.ZodDefault) {
      inner = inner.removeDefault()
    } else if (inner instanceof z.ZodEffects) {
      inner = inner.innerType()
    } else {
      return inner
    }
  }
}

function mockValue(name: string, field: z.ZodTypeAny): unknown {
  const inner = unwrap(field)
  if (inner instanceof z.ZodString) return `mock ${name}`
  if (inner instanceof z.ZodArray) return []
  if (inner instanceof z.ZodRecord) return {}
  if (inner instanceof z.ZodNumber) return 0
  if (inner instanceof z.ZodBoolean) return false
  return null
}

/**
 * Builds a placeholder object from a schema's shape: strings become
 * `mock <field>`, arrays and records are empty, numbers 0, booleans false.
 */
export function mockFromSchema<T extends z.ZodRawShape>(schema: z.ZodObject<T>): z.infer<z.ZodObject<T>> {
  const data: Record<string, unknown> = {}
  for (const [name, field] of Object.entries(schema.shape)) {
    data[name] = mockValue(name, field)
  }
  return schema.parse(data)
}

export type StructuredCall<T extends z.ZodRawShape> = {
  system: string
  prompt: string
  schema: z.ZodObject<T>
  schemaName: string
  model?: string
  /** Skip the API and return the schema mock. */
  offline?: boolean
  moderate?: Moderator | null
}

/**
 * Requests a JSON object matching `schema` from an OpenRouter model.
 *
 * Both prompts go through the dataset safety gate first. Without an API key
 * (or when offline) the schema mock is returned. A response that cannot be
 * parsed into the schema also falls back to the mock; transport errors
 * propagate after the SDK's retries.
 */
export async function callStructured<T extends z.ZodRawShape>(
  call: StructuredCall<T>,
): Promise<z.infer<z.ZodObject<T>>> {
  await ensureSafeText(call.system, { context: "system", moderate: call.moderate })
  await ensureSafeText(call.prompt, { context: "user", moderate: call.moderate })

  const apiKey = process.env.OPENROUTER_API_KEY?.trim()
  if (call.offline || !apiKey) {
    return mockFromSchema(call.schema)
  }

  const openrouter = createOpenRouter({ apiKey })
  let object: unknown
  try {
    const result = await generateObject({
      model: openrouter.chat(call.model ?? structuredModelId()),
      schema: call.schema,
      schemaName: call.schemaName,
      system: call.system,
      prompt: call.prompt,
      temperature: 0.2,
      maxRetries: 2,
    })
    object = result.object
  } catch (err) {
    if (NoObjectGeneratedError.isInstance(err)) {
      console.warn(`Structured output for ${call.schemaName} did not match the schema; using mock`)
      return mockFromSchema(call.schema)
    }
    throw err
  }

  await ensureSafeText(JSON.stringify(object), { context: "model_output", moderate: call.moderate })

  const parsed = call.schema.safeParse(object)
  return parsed.success ? parsed.data : mockFromSchema(call.schema)
}
