/**
 * Orchestrator wiring. Production collaborators are created here; callers may
 * substitute any of the three remote ports.
 */

import type { Settings } from "../config/settings";
import { LlmTextCompletionService, type TextCompletionService } from "../llm/textCompletion";
import { NeonDataStore, getDb, type DataStore } from "../db";
import { PgVectorSearchService, type VectorSearchService } from "../documentAgent/vectorSearch";
import { DocumentAgent } from "../documentAgent/documentAgent";
import { Supervisor } from "../decisionLayer/supervisor";
import { SqlGenerationStage } from "../sqlAgent/sqlGeneration";
import { QueryExecutor } from "../sqlAgent/queryExecutor";
import { ResponseSynthesisStage } from "../synthesis/responseSynthesis";
import { ConversationMemory } from "../memory/conversationMemory";
import { Orchestrator } from "./orchestrator";

export type Collaborators = {
  completion: TextCompletionService;
  dataStore: DataStore;
  vectorSearch: VectorSearchService;
  memory: ConversationMemory;
};

export function createOrchestrator(settings: Readonly<Settings>, overrides: Partial<Collaborators> = {}): Orchestrator {
  const completion = overrides.completion ?? new LlmTextCompletionService(settings);
  const database = () => getDb(settings.databaseUrl);
  const dataStore = overrides.dataStore ?? new NeonDataStore(database);
  const vectorSearch = overrides.vectorSearch ?? new PgVectorSearchService(settings.embeddingModel, database);
  const memory = overrides.memory ?? new ConversationMemory(settings.memoryWindowSize);

  return new Orchestrator({
    supervisor: new Supervisor(completion),
    executor: new QueryExecutor({
      generator: new SqlGenerationStage(completion, settings.temperatureSql),
      dataStore,
      maxRetries: settings.maxRetries,
      statementTimeoutMs: settings.sqlTimeoutMs,
    }),
    documentAgent: new DocumentAgent(vectorSearch, {
      topK: settings.vectorTopK,
      similarityThreshold: settings.similarityThreshold,
    }),
    synthesizer: new ResponseSynthesisStage(completion, {
      temperature: settings.temperatureResponse,
      nlgEnabled: settings.nlgEnabled,
      maxRows: settings.nlgMaxRows,
    }),
    memory,
  });
}

export { Orchestrator } from "./orchestrator";
export type { Question, OrchestrationResult, OrchestratorState } from "./types";
