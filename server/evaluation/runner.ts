/**
 * Evaluation Runner
 *
 * Replays evaluation cases through the orchestrator and scores each one:
 * skill detection, execution success, route and trace against expectations,
 * and optionally the answer itself.
 *
 * A case passes when the detected skill matches (if one is expected), the
 * orchestrator reports success, and, when answers are validated, the judge
 * accepts the answer. Route and trace mismatches are reported but do not fail
 * a case.
 */

import type { Orchestrator, OrchestrationResult } from "../orchestrator";
import { detectSkill, type Skill } from "../decisionLayer/skills";
import { getErrorMessage } from "../utils/errorHandler";
import { logInfo } from "../utils/logger";
import type { EvaluationCase, MemorySequence } from "./cases";
import type { AnswerJudge, AnswerVerdict } from "./answerJudge";

export type CaseResult = {
  id: string;
  category: string;
  subcategory: string;
  question: string;
  passed: boolean;
  skill: { expected: Skill | null; detected: Skill; match: boolean };
  execution: {
    success: boolean;
    error: string | null;
    sql: string | null;
    rowsReturned: number;
    documentsRetrieved: number;
  };
  routing: {
    expected: string | null;
    actual: string | null;
    match: boolean | null;
    trace: string[];
    expectedTrace: string[] | null;
    traceMatch: boolean | null;
  };
  answer: AnswerVerdict | null;
  durationMs: number;
  naturalResponse: string;
};

export type CategorySummary = { total: number; passed: number };

export type EvaluationSummary = {
  total: number;
  passed: number;
  failed: number;
  passRate: string;
  skillAccuracy: string;
  routeAccuracy: string | null;
  byCategory: Record<string, CategorySummary>;
  totalDurationMs: number;
  averageDurationMs: number;
};

export type EvaluationReport = {
  summary: EvaluationSummary;
  results: CaseResult[];
};

export type EvaluationOptions = {
  defaultCompanyId: number;
  /** Overrides every case's company. */
  companyId?: number;
  judge?: AnswerJudge;
  onResult?: (result: CaseResult) => void;
};

const percent = (part: number, whole: number) => `${whole === 0 ? "0.0" : ((part / whole) * 100).toFixed(1)}%`;

function traceStates(trace: string[]): string[] {
  return trace.filter(entry => !entry.startsWith("sql_attempt_"));
}

function sameStates(actual: string[], expected: string[]): boolean {
  const a = new Set(actual);
  const b = new Set(expected);
  return a.size === b.size && [...a].every(state => b.has(state));
}

export class EvaluationRunner {
  constructor(
    private readonly orchestrator: Orchestrator,
    private readonly options: EvaluationOptions,
  ) {}

  async runCase(testCase: EvaluationCase, sessionId = `eval_${testCase.id}`): Promise<CaseResult> {
    const start = Date.now();
    const detected = detectSkill(testCase.question);
    const expectedSkill = testCase.expectedSkill ?? null;
    const skillMatch = expectedSkill === null || detected === expectedSkill;

    let result: OrchestrationResult | null = null;
    let error: string | null = null;
    try {
      result = await this.orchestrator.ask({
        text: testCase.question,
        tenantId: this.options.companyId ?? testCase.companyId ?? this.options.defaultCompanyId,
        sessionId,
      });
      error = result.error;
    } catch (err) {
      error = getErrorMessage(err);
    }

    const success = result?.success ?? false;
    const naturalResponse = result?.naturalResponse ?? "";

    let answer: AnswerVerdict | null = null;
    if (this.options.judge && testCase.expectedAnswer && success) {
      answer = await this.options.judge.judge({
        question: testCase.question,
        expected: testCase.expectedAnswer,
        response: naturalResponse,
      });
    }

    const trace = traceStates(result?.trace ?? []);
    const expectedRoute = testCase.expectedRoute ?? null;
    const expectedTrace = testCase.expectedTrace ?? null;
    const answerOk = !this.options.judge || !testCase.expectedAnswer || answer?.isCorrect === true;

    const caseResult: CaseResult = {
      id: testCase.id,
      category: testCase.category,
      subcategory: testCase.subcategory,
      question: testCase.question,
      passed: skillMatch && success && answerOk,
      skill: { expected: expectedSkill, detected, match: skillMatch },
      execution: {
        success,
        error,
        sql: result?.sql ?? null,
        rowsReturned: result?.rows?.length ?? 0,
        documentsRetrieved: result?.documentSnippets?.length ?? 0,
      },
      routing: {
        expected: expectedRoute,
        actual: result?.route ?? null,
        match: expectedRoute === null ? null : result?.route === expectedRoute,
        trace,
        expectedTrace,
        traceMatch: expectedTrace === null ? null : sameStates(trace, expectedTrace),
      },
      answer,
      durationMs: Date.now() - start,
      naturalResponse,
    };
    this.options.onResult?.(caseResult);
    return caseResult;
  }

  async run(cases: EvaluationCase[]): Promise<EvaluationReport> {
    logInfo(`[Evaluation] Running ${cases.length} case(s)`);
    const results: CaseResult[] = [];
    for (const testCase of cases) {
      results.push(await this.runCase(testCase));
    }
    return { summary: summarize(results), results };
  }

  /**
   * Runs each setup question and its follow-up in one session, so the
   * follow-up sees the setup exchange through conversation memory.
   */
  async runMemorySequences(sequences: MemorySequence[]): Promise<EvaluationReport> {
    logInfo(`[Evaluation] Running ${sequences.length} memory sequence(s)`);
    const results: CaseResult[] = [];
    for (const { baseId, setup, followUp } of sequences) {
      const sessionId = `eval_${baseId}`;
      results.push(await this.runCase(setup, sessionId));
      results.push(await this.runCase(followUp, sessionId));
    }
    return { summary: summarize(results), results };
  }
}

export function summarize(results: CaseResult[]): EvaluationSummary {
  const passed = results.filter(r => r.passed).length;
  const skillMatches = results.filter(r => r.skill.match).length;
  const routed = results.filter(r => r.routing.match !== null);
  const byCategory: Record<string, CategorySummary> = {};
  for (const result of results) {
    const entry = (byCategory[result.category] ??= { total: 0, passed: 0 });
    entry.total++;
    if (result.passed) entry.passed++;
  }
  const totalDurationMs = results.reduce((sum, r) => sum + r.durationMs, 0);

  return {
    total: results.length,
    passed,
    failed: results.length - passed,
    passRate: percent(passed, results.length),
    skillAccuracy: percent(skillMatches, results.length),
    routeAccuracy: routed.length === 0 ? null : percent(routed.filter(r => r.routing.match).length, routed.length),
    byCategory,
    totalDurationMs,
    averageDurationMs: results.length === 0 ? 0 : Math.round(totalDurationMs / results.length),
  };
}
