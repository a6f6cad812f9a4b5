import { OpenAI } from "openai";
import { GoogleGenAI } from "@google/genai";
import { LLM_MODELS, GEMINI_MODELS, CLAUDE_MODELS, TOKEN_LIMITS, DEFAULT_MAX_TOKENS } from "../config/models";
import { TextCompletionError } from "../utils/errorHandler";
import { retryWithBackoff } from "../utils/retry";

let _openai: OpenAI | null = null;
export function getOpenAI(): OpenAI {
  if (!_openai) {
    const apiKey = process.env.OPENAI_API_KEY;
    if (!apiKey) throw new Error("[LLM Client] OPENAI_API_KEY is not set");
    _openai = new OpenAI({ apiKey });
  }
  return _openai;
}

let _gemini: GoogleGenAI | null = null;
function getGemini(): GoogleGenAI {
  if (!_gemini) {
    const apiKey = process.env.GEMINI_API_KEY;
    if (!apiKey) throw new Error("[LLM Client] GEMINI_API_KEY is not set");
    _gemini = new GoogleGenAI({ apiKey });
  }
  return _gemini;
}

let _claude: InstanceType<typeof import("@anthropic-ai/sdk").default> | null = null;
async function getClaude() {
  if (!_claude) {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    if (!apiKey) throw new Error("[LLM Client] ANTHROPIC_API_KEY is not set");
    const Anthropic = (await import("@anthropic-ai/sdk")).default;
    _claude = new Anthropic({ apiKey });
  }
  return _claude;
}

const OPENAI_MODELS = new Set<string>(Object.values(LLM_MODELS));
const GEMINI_MODEL_SET = new Set<string>(Object.values(GEMINI_MODELS));
const CLAUDE_MODEL_SET = new Set<string>(Object.values(CLAUDE_MODELS));

export type Provider = "openai" | "gemini" | "claude";

export function detectProvider(model: string): Provider {
  if (OPENAI_MODELS.has(model)) return "openai";
  if (GEMINI_MODEL_SET.has(model)) return "gemini";
  if (CLAUDE_MODEL_SET.has(model)) return "claude";
  if (model.startsWith("gpt-") || model.startsWith("o1") || model.startsWith("o3")) return "openai";
  if (model.startsWith("gemini-")) return "gemini";
  if (model.startsWith("claude-")) return "claude";
  throw new Error(`[LLM Client] Unknown model "${model}", cannot determine provider. Add it to the model registry in server/config/models.ts`);
}

export type LLMMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type JsonSchemaFormat = {
  name: string;
  schema: Record<string, unknown>;
};

export type LLMRequestOptions = {
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Request JSON output matching this schema. */
  jsonSchema?: JsonSchemaFormat;
  timeoutMs?: number;
  /** Transport retries on top of the first attempt. */
  maxRetries?: number;
};

export type LLMResponse = {
  text: string;
  provider: Provider;
  model: string;
};

const PROVIDER_LABELS: Record<Provider, string> = {
  openai: "OpenAI",
  gemini: "Gemini",
  claude: "Anthropic",
};

export async function generateText(opts: LLMRequestOptions): Promise<LLMResponse> {
  const provider = detectProvider(opts.model);

  try {
    switch (provider) {
      case "openai":
        return await callOpenAI(opts);
      case "gemini":
        return await callGemini(opts);
      case "claude":
        return await callClaude(opts);
      default: {
        const _exhaustive: never = provider;
        throw new Error(`[LLM Client] Unhandled provider: ${_exhaustive}`);
      }
    }
  } catch (error) {
    if (error instanceof TextCompletionError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new TextCompletionError(PROVIDER_LABELS[provider], message);
  }
}

/**
 * Providers without a native schema parameter get the schema spelled out in
 * the system prompt instead.
 */
function schemaInstruction(format: JsonSchemaFormat): string {
  return [
    `Respond with a single JSON object only, no prose and no code fences.`,
    `The object must match this JSON schema (${format.name}):`,
    JSON.stringify(format.schema),
  ].join("\n");
}

function maxTokensFor(opts: LLMRequestOptions): number {
  return opts.maxTokens ?? TOKEN_LIMITS[opts.model] ?? DEFAULT_MAX_TOKENS;
}

async function callOpenAI(opts: LLMRequestOptions): Promise<LLMResponse> {
  const response = await getOpenAI().chat.completions.create(
    {
      model: opts.model,
      messages: opts.messages,
      ...(opts.temperature !== undefined && { temperature: opts.temperature }),
      max_tokens: maxTokensFor(opts),
      ...(opts.jsonSchema && {
        response_format: {
          type: "json_schema" as const,
          json_schema: { name: opts.jsonSchema.name, schema: opts.jsonSchema.schema, strict: false },
        },
      }),
    },
    {
      ...(opts.timeoutMs !== undefined && { timeout: opts.timeoutMs }),
      ...(opts.maxRetries !== undefined && { maxRetries: opts.maxRetries }),
    },
  );

  return {
    text: response.choices[0]?.message?.content || "",
    provider: "openai",
    model: opts.model,
  };
}

async function callGemini(opts: LLMRequestOptions): Promise<LLMResponse> {
  const systemParts = opts.messages
    .filter(m => m.role === "system")
    .map(m => m.content);
  if (opts.jsonSchema) {
    systemParts.push(schemaInstruction(opts.jsonSchema));
  }

  const contents = opts.messages
    .filter(m => m.role !== "system")
    .map(m => ({
      role: m.role === "assistant" ? "model" as const : "user" as const,
      parts: [{ text: m.content }],
    }));

  const systemInstruction = systemParts.length > 0
    ? systemParts.join("\n\n")
    : undefined;

  const response = await retryWithBackoff(
    () => getGemini().models.generateContent({
      model: opts.model,
      config: {
        ...(systemInstruction && { systemInstruction }),
        ...(opts.temperature !== undefined && { temperature: opts.temperature }),
        maxOutputTokens: maxTokensFor(opts),
        ...(opts.jsonSchema && { responseMimeType: "application/json" }),
      },
      contents,
    }),
    `Gemini ${opts.model}`,
    { maxAttempts: (opts.maxRetries ?? 0) + 1, timeout: opts.timeoutMs },
  );

  return {
    text: response.text || "",
    provider: "gemini",
    model: opts.model,
  };
}

async function callClaude(opts: LLMRequestOptions): Promise<LLMResponse> {
  const client = await getClaude();

  const systemParts = opts.messages
    .filter(m => m.role === "system")
    .map(m => m.content);
  if (opts.jsonSchema) {
    systemParts.push(schemaInstruction(opts.jsonSchema));
  }
  const systemContent = systemParts.join("\n\n");

  const nonSystemMessages = opts.messages
    .filter(m => m.role !== "system")
    .map(m => ({
      role: m.role === "assistant" ? "assistant" as const : "user" as const,
      content: m.content,
    }));

  const response = await client.messages.create(
    {
      model: opts.model,
      max_tokens: maxTokensFor(opts),
      ...(systemContent && { system: systemContent }),
      messages: nonSystemMessages,
      ...(opts.temperature !== undefined && { temperature: opts.temperature }),
    },
    {
      ...(opts.timeoutMs !== undefined && { timeout: opts.timeoutMs }),
      ...(opts.maxRetries !== undefined && { maxRetries: opts.maxRetries }),
    },
  );

  let text = "";
  for (const block of response.content) {
    if (block.type === "text") {
      text = block.text;
      break;
    }
  }

  return {
    text,
    provider: "claude",
    model: opts.model,
  };
}
