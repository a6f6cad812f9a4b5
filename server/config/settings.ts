/**
 * Runtime Settings
 *
 * Loaded once from the environment, validated with Zod, then frozen.
 * Every tunable of the query pipeline lives here so tests can build their own
 * settings object with `loadSettings({...})` instead of mutating process.env.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { LLM_MODELS, EMBEDDING_MODELS } from "./models";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const settingsSchema = z.object({
  LLM_MODEL: z.string().min(1).default(LLM_MODELS.FAST_CLASSIFICATION),
  LLM_TEMPERATURE_SQL: z.coerce.number().min(0).max(2).default(0.1),
  LLM_TEMPERATURE_RESPONSE: z.coerce.number().min(0).max(2).default(0.7),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  SQL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MEMORY_WINDOW_SIZE: z.coerce.number().int().min(1).default(3),
  VECTOR_TOP_K: z.coerce.number().int().min(1).default(5),
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  NLG_ENABLED: booleanFlag.default("true"),
  NLG_MAX_ROWS: z.coerce.number().int().min(1).default(10),
  EMBEDDING_MODEL: z.string().min(1).default(EMBEDDING_MODELS.SMALL),
  DATABASE_URL: z.string().optional(),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_DIR: z.string().optional(),
});

export type Settings = {
  llmModel: string;
  temperatureSql: number;
  temperatureResponse: number;
  llmTimeoutMs: number;
  llmMaxRetries: number;
  maxRetries: number;
  sqlTimeoutMs: number;
  memoryWindowSize: number;
  vectorTopK: number;
  similarityThreshold: number;
  nlgEnabled: boolean;
  nlgMaxRows: number;
  embeddingModel: string;
  databaseUrl: string | undefined;
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  logDir: string | undefined;
};

export function loadSettings(env: Record<string, string | undefined>): Readonly<Settings> {
  // Empty strings count as unset so `FOO=` in a .env file falls back to the default.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = settingsSchema.safeParse(present);
  if (!parsed.success) {
    throw new Error(`[Settings] Invalid configuration: ${fromZodError(parsed.error).message}`);
  }
  const e = parsed.data;
  return Object.freeze({
    llmModel: e.LLM_MODEL,
    temperatureSql: e.LLM_TEMPERATURE_SQL,
    temperatureResponse: e.LLM_TEMPERATURE_RESPONSE,
    llmTimeoutMs: e.LLM_TIMEOUT_MS,
    llmMaxRetries: e.LLM_MAX_RETRIES,
    maxRetries: e.MAX_RETRIES,
    sqlTimeoutMs: e.SQL_TIMEOUT_MS,
    memoryWindowSize: e.MEMORY_WINDOW_SIZE,
    vectorTopK: e.VECTOR_TOP_K,
    similarityThreshold: e.SIMILARITY_THRESHOLD,
    nlgEnabled: e.NLG_ENABLED,
    nlgMaxRows: e.NLG_MAX_ROWS,
    embeddingModel: e.EMBEDDING_MODEL,
    databaseUrl: e.DATABASE_URL,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    logDir: e.LOG_DIR,
  });
}

let _settings: Readonly<Settings> | null = null;

export function getSettings(): Readonly<Settings> {
  if (!_settings) {
    _settings = loadSettings(process.env);
  }
  return _settings;
}
