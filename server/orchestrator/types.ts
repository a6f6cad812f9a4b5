import type { DocumentSnippet, QueryResponse } from "@shared/schema";
import type { RouteDecision } from "../decisionLayer/supervisor";
import type { Skill } from "../decisionLayer/skills";
import type { SqlExecutionResult } from "../sqlAgent/queryExecutor";
import type { ConversationTurn } from "../memory/conversationMemory";

export type OrchestratorState =
  | "start"
  | "supervisor"
  | "sql_agent"
  | "document_agent"
  | "hybrid_sql"
  | "hybrid_document"
  | "conversational"
  | "synthesizer"
  | "end";

/**
 * Name recorded in the trace when a state runs. Hybrid states share the
 * names of the branches they run; start and end are not recorded.
 */
export const TRACE_NAMES: Record<OrchestratorState, string | null> = {
  start: null,
  supervisor: "supervisor",
  sql_agent: "sql_agent",
  document_agent: "document_agent",
  hybrid_sql: "sql_agent",
  hybrid_document: "document_agent",
  conversational: "conversational",
  synthesizer: "synthesizer",
  end: null,
};

export type Question = {
  text: string;
  tenantId: number;
  sessionId: string;
};

/**
 * Mutable working state for one question. Lives only for the duration of
 * Orchestrator.ask.
 */
export type OrchestrationContext = {
  question: Question;
  history: ConversationTurn[];
  trace: string[];
  decision: RouteDecision | null;
  skill: Skill | null;
  sqlResult: SqlExecutionResult | null;
  snippets: DocumentSnippet[] | null;
  naturalResponse: string | null;
};

export type OrchestrationResult = QueryResponse;
