/**
 * Answer Judges
 *
 * Decide whether an answer satisfies a case's expected answer. The rule judge
 * is deterministic string and number matching. The model judge asks the
 * completion service and falls back to the rules when that call fails.
 */

import { z } from "zod";
import type { TextCompletionService } from "../llm/textCompletion";
import type { ExpectedAnswer } from "./cases";
import { getErrorMessage } from "../utils/errorHandler";
import { logWarn } from "../utils/logger";

export type AnswerVerdict = {
  isCorrect: boolean;
  confidence: number;
  reasoning: string;
  matchedValues: string[];
  missingValues: string[];
  judgedBy: "rules" | "model";
};

export type JudgeInput = {
  question: string;
  expected: ExpectedAnswer;
  response: string;
};

export interface AnswerJudge {
  judge(input: JudgeInput): Promise<AnswerVerdict>;
}

const CLARIFICATION_MARKERS = [
  "?", "could you", "can you", "please specify", "what do you mean",
  "clarify", "more specific", "which", "what kind",
];

const NUMERIC_TOLERANCE = 0.1;

function expectedValues(value: ExpectedAnswer["value"]): string[] {
  if (value === undefined) return [];
  return (Array.isArray(value) ? value : [value]).map(v => String(v).toLowerCase());
}

function parseNumber(value: string): number {
  return Number(value.replace(/[$,\s]/g, ""));
}

export function checkAnswer(expected: ExpectedAnswer, response: string): AnswerVerdict {
  const text = response.toLowerCase();
  const variations = expected.acceptableVariations.map(v => v.toLowerCase());
  const verdict = (isCorrect: boolean, confidence: number, matchedValues: string[] = [], missingValues: string[] = []) => ({
    isCorrect,
    confidence,
    reasoning: `Rule-based check for answer type "${expected.type}"`,
    matchedValues,
    missingValues,
    judgedBy: "rules" as const,
  });

  switch (expected.type) {
    case "exact": {
      const matched = [...expectedValues(expected.value), ...variations].filter(v => text.includes(v));
      return verdict(matched.length > 0, matched.length > 0 ? 0.95 : 0.9, matched);
    }

    case "contains": {
      const required = expectedValues(expected.value);
      const matched = required.filter(v => text.includes(v));
      const missing = required.filter(v => !text.includes(v));
      const variation = variations.find(v => text.includes(v));
      if (missing.length > 0 && variation) {
        return verdict(true, 0.85, [...matched, variation], []);
      }
      return verdict(missing.length === 0, missing.length === 0 ? 0.9 : 0.85, matched, missing);
    }

    case "numeric_range": {
      const target = parseNumber(String(expected.value ?? ""));
      if (Number.isNaN(target)) {
        return verdict(false, 0.5, [], [String(expected.value ?? "")]);
      }
      const numbers = (response.replace(/,/g, "").match(/\d+(?:\.\d+)?/g) ?? []).map(Number);
      const hit = numbers.find(n => Math.abs(n - target) / Math.max(target, 1) < NUMERIC_TOLERANCE);
      return hit === undefined
        ? verdict(false, 0.85, [], [String(target)])
        : verdict(true, 0.85, [String(hit)]);
    }

    case "list": {
      const isList =
        /(^|\n)\s*[-•*]\s+\w+/.test(response) ||
        /(^|\n)\s*\d+[.)]\s+\w+/.test(response) ||
        (response.match(/,/g) ?? []).length >= 2 ||
        response.length > 100;
      return verdict(isList, 0.7);
    }

    case "clarification": {
      const matched = CLARIFICATION_MARKERS.filter(marker => text.includes(marker));
      return verdict(matched.length > 0, 0.8, matched);
    }

    case "open_ended":
      return verdict(response.trim().length > 20, 0.6);
  }
}

export class RuleAnswerJudge implements AnswerJudge {
  async judge(input: JudgeInput): Promise<AnswerVerdict> {
    return checkAnswer(input.expected, input.response);
  }
}

const judgeOutputSchema = z.object({
  is_correct: z.boolean(),
  confidence: z.coerce.number().min(0).max(1).catch(0.5),
  reasoning: z.string().default(""),
  matched_values: z.array(z.string()).default([]),
  missing_values: z.array(z.string()).default([]),
});

const JUDGE_SYSTEM_PROMPT = `You grade answers from a business communications assistant.
Decide whether the ACTUAL answer satisfies the EXPECTED answer for the question.
Accept paraphrases, different formatting and extra detail. Reject answers that contradict the expected value or omit it.
Respond with JSON: {"is_correct": boolean, "confidence": number between 0 and 1, "reasoning": string, "matched_values": string[], "missing_values": string[]}`;

export class ModelAnswerJudge implements AnswerJudge {
  constructor(
    private readonly completion: TextCompletionService,
    private readonly fallback: AnswerJudge = new RuleAnswerJudge(),
  ) {}

  async judge(input: JudgeInput): Promise<AnswerVerdict> {
    const { expected } = input;
    const user = [
      `QUESTION: ${input.question}`,
      `EXPECTED (${expected.type}): ${JSON.stringify(expected.value ?? null)}`,
      expected.acceptableVariations.length > 0
        ? `ACCEPTABLE VARIATIONS: ${expected.acceptableVariations.join(", ")}`
        : "",
      `ACTUAL: ${input.response}`,
    ].filter(Boolean).join("\n");

    try {
      const output = await this.completion.generate({ system: JUDGE_SYSTEM_PROMPT, user, temperature: 0 }, judgeOutputSchema);
      return {
        isCorrect: output.is_correct,
        confidence: output.confidence,
        reasoning: output.reasoning,
        matchedValues: output.matched_values,
        missingValues: output.missing_values,
        judgedBy: "model",
      };
    } catch (error) {
      logWarn(`[Evaluation] Model judge failed, using rules: ${getErrorMessage(error)}`);
      return this.fallback.judge(input);
    }
  }
}
