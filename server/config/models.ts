/**
 * Centralized LLM Model Registry
 *
 * Single source of truth for model ids. The provider of a configured model is
 * derived from these tables (see detectProvider in server/llm/client.ts), so a
 * new model only needs to be added here.
 *
 * MODEL TIERS:
 *
 * FAST_CLASSIFICATION - gpt-4o-mini
 *   Default for routing, SQL generation and answer synthesis.
 *
 * STANDARD_REASONING - gpt-4o
 *   Higher quality synthesis when LLM_MODEL is pointed at it.
 */

export const LLM_MODELS = {
  FAST_CLASSIFICATION: "gpt-4o-mini",
  STANDARD_REASONING: "gpt-4o",
} as const;

export const GEMINI_MODELS = {
  FLASH: "gemini-2.5-flash",
  PRO: "gemini-2.5-pro",
} as const;

export const CLAUDE_MODELS = {
  SONNET: "claude-3-5-sonnet-latest",
  HAIKU: "claude-3-5-haiku-latest",
} as const;

/**
 * Embedding models used by document search. Dimensions must match the
 * `embedding` column of the document_chunks table.
 */
export const EMBEDDING_MODELS = {
  SMALL: "text-embedding-3-small",
} as const;

export const EMBEDDING_DIMENSIONS = 1536;

export type LLMModelType = typeof LLM_MODELS[keyof typeof LLM_MODELS];
export type GeminiModelType = typeof GEMINI_MODELS[keyof typeof GEMINI_MODELS];
export type ClaudeModelType = typeof CLAUDE_MODELS[keyof typeof CLAUDE_MODELS];

/**
 * Token limits by model. Unknown models fall back to DEFAULT_MAX_TOKENS.
 */
export const TOKEN_LIMITS: Record<string, number> = {
  [LLM_MODELS.FAST_CLASSIFICATION]: 2000,
  [LLM_MODELS.STANDARD_REASONING]: 2000,
  [GEMINI_MODELS.FLASH]: 4000,
  [GEMINI_MODELS.PRO]: 4000,
  [CLAUDE_MODELS.SONNET]: 4096,
  [CLAUDE_MODELS.HAIKU]: 4096,
};

export const DEFAULT_MAX_TOKENS = 2000;
