/**
 * Query Orchestrator
 *
 * Purpose:
 * Runs one question through the pipeline as an explicit state machine:
 *
 *   start → supervisor → sql_agent ───────────────────────┐
 *                      → document_agent ──────────────────┤→ synthesizer → end
 *                      → hybrid_sql → hybrid_document ────┘
 *                      → conversational ───────────────────→ end
 *
 * Core Invariants:
 * - The supervisor is consulted exactly once; its route is never changed.
 * - Hybrid runs the SQL branch to completion before the document branch.
 * - The trace records every state visited plus one `sql_attempt_<n>` per
 *   SQL attempt, in order.
 * - Any exception inside a branch becomes a failed result carrying the trace
 *   so far and a user-safe message; callers always get a well-formed result.
 * - Memory is written only after a successful result.
 *
 * Layer: Orchestration
 */

import type { QueryRow } from "@shared/schema";
import { Route, type Supervisor } from "../decisionLayer/supervisor";
import { Skill, detectSkill } from "../decisionLayer/skills";
import type { QueryExecutor } from "../sqlAgent/queryExecutor";
import type { DocumentAgent } from "../documentAgent/documentAgent";
import type { ResponseSynthesisStage, SynthesisInput } from "../synthesis/responseSynthesis";
import type { ConversationMemory } from "../memory/conversationMemory";
import { CANNED_GREETING } from "../config/prompts";
import { RequestLogger } from "../utils/logger";
import { classifyPipelineError } from "../utils/errorHandler";
import {
  TRACE_NAMES,
  type OrchestrationContext,
  type OrchestrationResult,
  type OrchestratorState,
  type Question,
} from "./types";

export type OrchestratorDependencies = {
  supervisor: Supervisor;
  executor: QueryExecutor;
  documentAgent: DocumentAgent;
  synthesizer: ResponseSynthesisStage;
  memory: ConversationMemory;
};

const DOCUMENT_SOURCE = "Document Search";

export class Orchestrator {
  constructor(private readonly deps: OrchestratorDependencies) {}

  get memory(): ConversationMemory {
    return this.deps.memory;
  }

  async ask(question: Question): Promise<OrchestrationResult> {
    const logger = new RequestLogger({ sessionId: question.sessionId, companyId: question.tenantId });
    const ctx: OrchestrationContext = {
      question,
      // Snapshot: turns added by concurrent questions do not leak into this one.
      history: this.deps.memory.getHistory(question.sessionId),
      trace: [],
      decision: null,
      skill: null,
      sqlResult: null,
      snippets: null,
      naturalResponse: null,
    };

    logger.info(`[Orchestrator] Question received: "${question.text}"`);

    let state: OrchestratorState = "start";
    const stages: Partial<Record<OrchestratorState, number>> = {};
    try {
      while (state !== "end") {
        const current: OrchestratorState = state;
        const traceName = TRACE_NAMES[current];
        if (traceName) {
          ctx.trace.push(traceName);
          logger.startStage(current);
        }
        state = await this.step(current, ctx, logger);
        if (traceName) {
          stages[current] = logger.endStage(current);
          logger.debug(`[Orchestrator] ${current} -> ${state}`, { stage: current, stageMs: stages[current] });
        }
      }
    } catch (error) {
      const classified = classifyPipelineError(error);
      logger.error(`[Orchestrator] Failed in state "${state}"`, error, { trace: ctx.trace, stages });
      return this.buildResult(ctx, {
        success: false,
        naturalResponse: classified.userMessage,
        error: classified.errorMessage,
      });
    }

    const result = this.buildResult(ctx, {
      success: this.isSuccessful(ctx),
      naturalResponse: ctx.naturalResponse ?? CANNED_GREETING,
      error: ctx.sqlResult?.error ?? null,
    });

    if (result.success) {
      await this.deps.memory.addExchange(question.sessionId, question.text, result.naturalResponse);
    }

    logger.info(`[Orchestrator] Completed`, {
      route: result.route,
      success: result.success,
      trace: result.trace,
      attempts: result.attempts,
      stages,
    });
    return result;
  }

  private async step(
    state: OrchestratorState,
    ctx: OrchestrationContext,
    logger: RequestLogger,
  ): Promise<OrchestratorState> {
    switch (state) {
      case "start":
        return "supervisor";

      case "supervisor": {
        const decision = await this.deps.supervisor.decide(ctx.question.text, ctx.history, logger);
        ctx.decision = decision;
        switch (decision.route) {
          case Route.SQL_ONLY:
            return "sql_agent";
          case Route.DOCUMENT_SEARCH:
            return "document_agent";
          case Route.HYBRID:
            return "hybrid_sql";
          case Route.CONVERSATIONAL:
            return "conversational";
        }
      }

      case "sql_agent":
      case "hybrid_sql": {
        const skill = detectSkill(ctx.question.text);
        ctx.skill = skill;
        logger.info(`[Orchestrator] Skill: ${skill}`, { skill });
        ctx.sqlResult = await this.deps.executor.executeWithRetry(
          {
            question: ctx.question.text,
            tenantId: ctx.question.tenantId,
            skill,
            history: ctx.history,
            logger,
          },
          attempt => ctx.trace.push(`sql_attempt_${attempt.attemptNumber}`),
        );
        if (state === "hybrid_sql" && !ctx.sqlResult.needsClarification) {
          return "hybrid_document";
        }
        return "synthesizer";
      }

      case "document_agent":
      case "hybrid_document": {
        const output = await this.deps.documentAgent.search({
          question: ctx.question.text,
          tenantId: ctx.question.tenantId,
          searchTerms: ctx.decision?.searchTerms ?? [],
          sqlRows: ctx.sqlResult?.rows ?? [],
          logger,
        });
        ctx.snippets = output.snippets;
        return "synthesizer";
      }

      case "conversational":
        ctx.naturalResponse = ctx.decision?.conversationalResponse ?? CANNED_GREETING;
        return "end";

      case "synthesizer":
        ctx.naturalResponse = await this.synthesize(ctx, logger);
        return "end";

      case "end":
        return "end";
    }
  }

  private async synthesize(ctx: OrchestrationContext, logger: RequestLogger): Promise<string> {
    const { sqlResult, snippets } = ctx;
    const base = {
      question: ctx.question.text,
      history: ctx.history,
    };

    // Clarifications and exhausted SQL-only runs already carry their answer.
    if (sqlResult && (sqlResult.needsClarification || (!sqlResult.success && snippets === null))) {
      return sqlResult.naturalResponse ?? "";
    }

    let input: SynthesisInput;
    if (sqlResult && snippets !== null) {
      input = {
        ...base,
        kind: "hybrid",
        skill: ctx.skill ?? Skill.GENERAL,
        sql: sqlResult.sql,
        rows: sqlResult.rows,
        sqlError: sqlResult.success ? null : sqlResult.error,
        snippets,
      };
    } else if (sqlResult) {
      input = { ...base, kind: "sql", skill: ctx.skill ?? Skill.GENERAL, sql: sqlResult.sql ?? "", rows: sqlResult.rows };
    } else {
      input = { ...base, kind: "documents", skill: Skill.DOCUMENTS, snippets: snippets ?? [] };
    }

    return this.deps.synthesizer.synthesize(input, logger);
  }

  private isSuccessful(ctx: OrchestrationContext): boolean {
    if (ctx.sqlResult) return ctx.sqlResult.success;
    return true;
  }

  private buildResult(
    ctx: OrchestrationContext,
    outcome: { success: boolean; naturalResponse: string; error: string | null },
  ): OrchestrationResult {
    const { sqlResult, snippets } = ctx;
    const rows: QueryRow[] | null = sqlResult && sqlResult.success && !sqlResult.needsClarification
      ? sqlResult.rows
      : null;
    const dataSources = [...(sqlResult?.dataSources ?? [])];
    if (snippets !== null) dataSources.push(DOCUMENT_SOURCE);

    return {
      success: outcome.success,
      route: ctx.decision?.route ?? Route.CONVERSATIONAL,
      sql: sqlResult?.sql ?? null,
      rows,
      documentSnippets: snippets,
      naturalResponse: outcome.naturalResponse,
      trace: [...ctx.trace],
      error: outcome.error,
      skill: ctx.skill,
      attempts: sqlResult?.attemptCount ?? 0,
      dataSources,
      needsClarification: sqlResult?.needsClarification ?? false,
      routingAnomaly: ctx.decision?.anomaly ?? null,
    };
  }
}
