/**
 * Query Executor
 *
 * Purpose:
 * Runs the generate -> validate -> execute loop for one question with a
 * bounded retry budget. Every failure (generation error, empty SQL,
 * validation rejection, execution error) becomes feedback for the next
 * generation attempt and consumes the same budget.
 *
 * Attempts are produced lazily by an async generator so callers (the
 * orchestrator's trace, tests) can observe each one as it happens.
 *
 * Never throws: exhaustion and unexpected errors come back as a result with
 * success=false.
 *
 * Layer: SQL Agent
 */

import type { QueryRow } from "@shared/schema";
import type { Skill } from "../decisionLayer/skills";
import type { ConversationTurn } from "../memory/conversationMemory";
import type { DataStore } from "../db";
import { toDataStoreError } from "../db";
import type { SqlCandidate, SqlGenerationStage } from "./sqlGeneration";
import { normalizeQuery, validateQuery, type ValidationVerdict } from "./queryValidator";
import { extractDataSources, summarizeResultMetadata } from "./dataSources";
import {
  ExecutionFailure,
  GenerationFailure,
  RetryExhausted,
  ValidationFailure,
  getErrorMessage,
  type DataStoreErrorKind,
} from "../utils/errorHandler";
import type { RequestLogger } from "../utils/logger";

export type AttemptOutcome =
  | { kind: "generation_failed"; feedback: string }
  | { kind: "empty_sql"; feedback: string }
  | { kind: "rejected"; verdict: ValidationVerdict; feedback: string }
  | { kind: "execution_failed"; errorKind: DataStoreErrorKind; feedback: string }
  | { kind: "clarification"; question: string }
  | { kind: "succeeded"; sql: string; rows: QueryRow[] };

export type ExecutionAttempt = {
  attemptNumber: number;
  candidate: SqlCandidate | null;
  outcome: AttemptOutcome;
};

export type ExecutionRequest = {
  question: string;
  tenantId: number;
  skill: Skill;
  history: ConversationTurn[];
  logger?: RequestLogger;
};

export type SqlExecutionResult = {
  success: boolean;
  sql: string | null;
  rows: QueryRow[];
  /** Set for clarifications and failures; successful results are synthesized later. */
  naturalResponse: string | null;
  attempts: ExecutionAttempt[];
  attemptCount: number;
  error: string | null;
  reasoning: string;
  explanation: string;
  needsClarification: boolean;
  dataSources: string[];
  metadataSummary: string | null;
};

export type QueryExecutorOptions = {
  generator: SqlGenerationStage;
  dataStore: DataStore;
  maxRetries: number;
  statementTimeoutMs: number;
};

const DEFAULT_CLARIFICATION = "Could you tell me a bit more about what you're looking for?";

export function clarificationResponse(question: string): string {
  return `I need a bit more information to answer your question.\n\n**${question}**`;
}

export function failureResponse(feedback: string): string {
  return `I attempted to answer your question but encountered an error: ${feedback}`;
}

function isTerminal(outcome: AttemptOutcome): boolean {
  return outcome.kind === "succeeded" || outcome.kind === "clarification";
}

export class QueryExecutor {
  constructor(private readonly options: QueryExecutorOptions) {}

  private async runAttempt(
    request: ExecutionRequest,
    attemptNumber: number,
    priorError: string | undefined,
  ): Promise<ExecutionAttempt> {
    let candidate: SqlCandidate;
    try {
      candidate = await this.options.generator.generate({
        question: request.question,
        skill: request.skill,
        tenantId: request.tenantId,
        history: request.history,
        priorError,
      });
    } catch (error) {
      const failure = error instanceof GenerationFailure
        ? error
        : new GenerationFailure(getErrorMessage(error), error);
      return { attemptNumber, candidate: null, outcome: { kind: "generation_failed", feedback: failure.message } };
    }

    if (candidate.needsClarification) {
      const question = candidate.clarificationQuestion.trim() || DEFAULT_CLARIFICATION;
      return { attemptNumber, candidate, outcome: { kind: "clarification", question } };
    }

    if (!candidate.sql.trim()) {
      return {
        attemptNumber,
        candidate,
        outcome: { kind: "empty_sql", feedback: `Agent returned empty SQL. Explanation: ${candidate.explanation}` },
      };
    }

    // Validated and executed text are the same string.
    const sql = normalizeQuery(candidate.sql);
    const verdict = validateQuery(sql, request.tenantId, request.skill);
    if (!verdict.isValid) {
      const failure = new ValidationFailure(verdict.violations);
      return { attemptNumber, candidate, outcome: { kind: "rejected", verdict, feedback: failure.message } };
    }

    try {
      const rows = await this.options.dataStore.runReadOnly(sql, {
        statementTimeoutMs: this.options.statementTimeoutMs,
      });
      return { attemptNumber, candidate, outcome: { kind: "succeeded", sql, rows } };
    } catch (error) {
      const failure = new ExecutionFailure(toDataStoreError(error));
      return {
        attemptNumber,
        candidate,
        outcome: { kind: "execution_failed", errorKind: failure.kind, feedback: failure.message },
      };
    }
  }

  /**
   * Yields one attempt at a time until an attempt succeeds, asks for
   * clarification, or the retry budget is spent.
   */
  async *attempts(request: ExecutionRequest): AsyncGenerator<ExecutionAttempt, void, undefined> {
    let priorError: string | undefined;
    for (let attemptNumber = 1; attemptNumber <= this.options.maxRetries; attemptNumber++) {
      const attempt = await this.runAttempt(request, attemptNumber, priorError);
      yield attempt;
      if (isTerminal(attempt.outcome)) return;
      if ("feedback" in attempt.outcome) {
        priorError = attempt.outcome.feedback;
      }
    }
  }

  async executeWithRetry(
    request: ExecutionRequest,
    onAttempt?: (attempt: ExecutionAttempt) => void,
  ): Promise<SqlExecutionResult> {
    const log = request.logger;
    const attempts: ExecutionAttempt[] = [];

    try {
      for await (const attempt of this.attempts(request)) {
        attempts.push(attempt);
        onAttempt?.(attempt);
        const { outcome } = attempt;

        if (outcome.kind === "succeeded") {
          const { sql } = outcome;
          log?.info(`[SqlAgent] Attempt ${attempt.attemptNumber} succeeded`, { attempt: attempt.attemptNumber, rows: outcome.rows.length });
          return {
            success: true,
            sql,
            rows: outcome.rows,
            naturalResponse: null,
            attempts,
            attemptCount: attempts.length,
            error: null,
            reasoning: attempt.candidate?.reasoning ?? "",
            explanation: attempt.candidate?.explanation ?? "",
            needsClarification: false,
            dataSources: extractDataSources(sql),
            metadataSummary: summarizeResultMetadata(sql, outcome.rows),
          };
        }

        if (outcome.kind === "clarification") {
          log?.info(`[SqlAgent] Clarification requested`, { attempt: attempt.attemptNumber });
          return {
            success: true,
            sql: null,
            rows: [],
            naturalResponse: clarificationResponse(outcome.question),
            attempts,
            attemptCount: attempts.length,
            error: null,
            reasoning: attempt.candidate?.reasoning ?? "",
            explanation: attempt.candidate?.explanation ?? "",
            needsClarification: true,
            dataSources: [],
            metadataSummary: null,
          };
        }

        log?.warn(`[SqlAgent] Attempt ${attempt.attemptNumber} ${outcome.kind}: ${outcome.feedback}`, {
          attempt: attempt.attemptNumber,
        });
      }
    } catch (error) {
      log?.error("[SqlAgent] Unexpected error in retry loop", error);
      return this.failed(attempts, getErrorMessage(error));
    }

    const last = attempts[attempts.length - 1];
    const lastFeedback = last && "feedback" in last.outcome ? last.outcome.feedback : "No attempts were made";
    const exhausted = new RetryExhausted(attempts.length, lastFeedback);
    log?.warn(`[SqlAgent] ${exhausted.message}`);
    return this.failed(attempts, lastFeedback);
  }

  private failed(attempts: ExecutionAttempt[], feedback: string): SqlExecutionResult {
    const lastCandidate = [...attempts].reverse().find(a => a.candidate !== null)?.candidate ?? null;
    return {
      success: false,
      sql: lastCandidate?.sql || null,
      rows: [],
      naturalResponse: failureResponse(feedback),
      attempts,
      attemptCount: attempts.length,
      error: feedback,
      reasoning: lastCandidate?.reasoning ?? "",
      explanation: lastCandidate?.explanation ?? "",
      needsClarification: false,
      dataSources: [],
      metadataSummary: null,
    };
  }
}
