/**
 * Text Completion Service
 *
 * The single port through which the pipeline talks to a language model.
 * Stages depend on the interface; tests substitute in-process fakes.
 *
 * - decide:     structured routing decision (supervisor)
 * - generate:   structured SQL candidate (SQL generation)
 * - synthesize: free-text answer (response synthesis)
 */

import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { generateText, type LLMMessage } from "./client";
import { StructuredOutputError } from "../utils/errorHandler";
import type { Settings } from "../config/settings";

export type CompletionRequest = {
  system: string;
  user: string;
  temperature: number;
};

export interface TextCompletionService {
  decide<T extends z.ZodTypeAny>(request: CompletionRequest, schema: T): Promise<z.infer<T>>;
  generate<T extends z.ZodTypeAny>(request: CompletionRequest, schema: T): Promise<z.infer<T>>;
  synthesize(request: CompletionRequest): Promise<string>;
}

/**
 * Strips a surrounding markdown code fence, if any.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/);
  return fenced ? fenced[1].trim() : trimmed;
}

export function parseStructuredOutput<T extends z.ZodTypeAny>(text: string, schema: T, schemaName: string): z.infer<T> {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(text));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StructuredOutputError(`${schemaName}: response was not valid JSON (${reason})`, text);
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(e => `${e.path.join(".") || "(root)"}: ${e.message}`).join(", ");
    throw new StructuredOutputError(`${schemaName}: ${issues}`, text);
  }
  return parsed.data;
}

type LlmCompletionOptions = Pick<Settings, "llmModel" | "llmTimeoutMs" | "llmMaxRetries">;

export class LlmTextCompletionService implements TextCompletionService {
  constructor(private readonly options: LlmCompletionOptions) {}

  private messages(request: CompletionRequest): LLMMessage[] {
    return [
      { role: "system", content: request.system },
      { role: "user", content: request.user },
    ];
  }

  private async structured<T extends z.ZodTypeAny>(
    request: CompletionRequest,
    schema: T,
    schemaName: string,
  ): Promise<z.infer<T>> {
    // Remove $schema wrapper that zodToJsonSchema adds
    const { $schema, ...jsonSchema } = zodToJsonSchema(schema, { target: "openAi", $refStrategy: "none" }) as Record<string, unknown>;
    const response = await generateText({
      model: this.options.llmModel,
      messages: this.messages(request),
      temperature: request.temperature,
      timeoutMs: this.options.llmTimeoutMs,
      maxRetries: this.options.llmMaxRetries,
      jsonSchema: { name: schemaName, schema: jsonSchema },
    });
    return parseStructuredOutput(response.text, schema, schemaName);
  }

  decide<T extends z.ZodTypeAny>(request: CompletionRequest, schema: T): Promise<z.infer<T>> {
    return this.structured(request, schema, "routing_decision");
  }

  generate<T extends z.ZodTypeAny>(request: CompletionRequest, schema: T): Promise<z.infer<T>> {
    return this.structured(request, schema, "sql_candidate");
  }

  async synthesize(request: CompletionRequest): Promise<string> {
    const response = await generateText({
      model: this.options.llmModel,
      messages: this.messages(request),
      temperature: request.temperature,
      timeoutMs: this.options.llmTimeoutMs,
      maxRetries: this.options.llmMaxRetries,
    });
    return response.text.trim();
  }
}
