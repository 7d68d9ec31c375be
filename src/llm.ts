import OpenAI from "openai";
import { createChildLogger } from "./logger";
import { describeSchema, type StructuredSchema } from "./schema";
import { ModelRequestError, SchemaViolationError } from "./types";

/**
 * The language model as the pipeline sees it: prompt plus target schema in,
 * a value conforming to that schema out. Anything else is a failure.
 */
export interface ModelClient {
  invoke<T>(systemPrompt: string, userPrompt: string, schema: StructuredSchema<T>): Promise<T>;
}

export interface OpenAIModelOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  temperature?: number;
}

const log = createChildLogger({ component: "llm" });

export class OpenAIModelClient implements ModelClient {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;

  public constructor(options: OpenAIModelOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl || undefined,
    });
    this.model = options.model;
    this.temperature = options.temperature ?? 0;
  }

  public async invoke<T>(systemPrompt: string, userPrompt: string, schema: StructuredSchema<T>): Promise<T> {
    const system = `${systemPrompt.trim()}\n\n${describeSchema(schema)}`;

    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: userPrompt },
        ],
        temperature: this.temperature,
        response_format: { type: "json_object" },
      });
      content = completion.choices[0]?.message?.content;
      log.debug({ model: this.model, usage: completion.usage }, "model call completed");
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      throw new ModelRequestError(`Model request failed: ${message}`, err);
    }

    if (!content) {
      throw new SchemaViolationError("LLM returned empty response.");
    }
    return parseStructured(content, schema);
  }
}

export function parseStructured<T>(content: string, schema: StructuredSchema<T>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    throw new SchemaViolationError(`Unable to parse LLM JSON: ${message}`, { content });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new SchemaViolationError("LLM output does not match the declared schema.", {
      issues: result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
      content,
    });
  }
  return result.data;
}
