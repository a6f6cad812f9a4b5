/**
 * Run evaluation cases against the live pipeline and print a summary.
 *
 * Usage:
 *   npm run evaluate -- [--category memory] [--subcategory phone_calls] [--id call_001]
 *                       [--company 42] [--memory] [--validate-answers] [--judge rules|model]
 *                       [--out results.json] [--verbose]
 */
import * as fs from "fs";
import { parseArgs } from "node:util";
import { companyIdSchema } from "@shared/schema";
import { getSettings } from "../server/config/settings";
import { configureLogger } from "../server/utils/logger";
import { createOrchestrator } from "../server/orchestrator";
import { LlmTextCompletionService } from "../server/llm/textCompletion";
import { getErrorMessage } from "../server/utils/errorHandler";
import { filterCases, loadEvaluationSet, memorySequences } from "../server/evaluation/cases";
import { ModelAnswerJudge, RuleAnswerJudge, type AnswerJudge } from "../server/evaluation/answerJudge";
import { EvaluationRunner, type CaseResult, type EvaluationReport } from "../server/evaluation/runner";

const USAGE =
  "Usage: npm run evaluate -- [--category <c>] [--subcategory <s>] [--id <id>] [--company <id>] " +
  "[--memory] [--validate-answers] [--judge rules|model] [--out <file>] [--verbose]";

function printResult(result: CaseResult, verbose: boolean) {
  const status = result.passed ? "PASS" : "FAIL";
  console.log(`${status}  ${result.id}  (${result.durationMs}ms)  ${result.question}`);
  if (!verbose) return;
  console.log(`      skill: ${result.skill.detected} (expected ${result.skill.expected ?? "any"})`);
  console.log(`      route: ${result.routing.actual ?? "n/a"} (expected ${result.routing.expected ?? "any"})`);
  console.log(`      trace: ${result.routing.trace.join(" -> ")}`);
  if (result.execution.sql) console.log(`      sql:   ${result.execution.sql.slice(0, 200)}`);
  if (result.execution.error) console.log(`      error: ${result.execution.error}`);
  if (result.answer) console.log(`      answer: ${result.answer.isCorrect ? "correct" : "incorrect"} (${result.answer.reasoning})`);
  console.log(`      response: ${result.naturalResponse.slice(0, 200)}`);
}

function printSummary(report: EvaluationReport) {
  const { summary } = report;
  console.log("\n=== Evaluation summary ===");
  console.log(`Total: ${summary.total}  Passed: ${summary.passed}  Failed: ${summary.failed}  Pass rate: ${summary.passRate}`);
  console.log(`Skill accuracy: ${summary.skillAccuracy}`);
  if (summary.routeAccuracy) console.log(`Route accuracy: ${summary.routeAccuracy}`);
  for (const [category, { total, passed }] of Object.entries(summary.byCategory)) {
    console.log(`  ${category}: ${passed}/${total}`);
  }
  console.log(`Average duration: ${summary.averageDurationMs}ms`);
}

async function evaluate() {
  const { values } = parseArgs({
    options: {
      category: { type: "string", short: "c" },
      subcategory: { type: "string", short: "s" },
      id: { type: "string" },
      company: { type: "string" },
      memory: { type: "boolean", default: false },
      "validate-answers": { type: "boolean", default: false },
      judge: { type: "string", default: "rules" },
      out: { type: "string" },
      verbose: { type: "boolean", short: "v", default: false },
    },
  });

  let companyId: number | undefined;
  if (values.company !== undefined) {
    const parsed = companyIdSchema.safeParse(values.company);
    if (!parsed.success) {
      console.error(USAGE);
      process.exit(2);
    }
    companyId = parsed.data;
  }
  if (values.judge !== "rules" && values.judge !== "model") {
    console.error(USAGE);
    process.exit(2);
  }

  const settings = getSettings();
  configureLogger({ level: "warn", logDir: settings.logDir });

  const set = loadEvaluationSet();
  const cases = filterCases(set.cases, { category: values.category, subcategory: values.subcategory, id: values.id });
  if (cases.length === 0) {
    console.error("No evaluation cases match the given filters");
    process.exit(2);
  }

  let judge: AnswerJudge | undefined;
  if (values["validate-answers"]) {
    judge = values.judge === "model"
      ? new ModelAnswerJudge(new LlmTextCompletionService(settings))
      : new RuleAnswerJudge();
  }

  const verbose = values.verbose ?? false;
  const runner = new EvaluationRunner(createOrchestrator(settings), {
    defaultCompanyId: set.defaultCompanyId,
    companyId,
    judge,
    onResult: result => printResult(result, verbose),
  });

  const report = values.memory
    ? await runner.runMemorySequences(memorySequences(cases))
    : await runner.run(cases);

  printSummary(report);
  if (values.out) {
    fs.writeFileSync(values.out, JSON.stringify({ ...report, timestamp: new Date().toISOString() }, null, 2));
    console.log(`Results written to ${values.out}`);
  }
  process.exit(report.summary.failed === 0 ? 0 : 1);
}

evaluate().catch(error => {
  console.error("Fatal error:", getErrorMessage(error));
  process.exit(1);
});
