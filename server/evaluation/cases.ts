/**
 * Evaluation Cases
 *
 * Question sets the evaluation runner replays against the orchestrator.
 * Cases live in evaluationCases.json and are validated on load.
 *
 * Memory cases come in pairs sharing a base id: "<base>a" sets up context,
 * "<base>b" is a follow-up that only makes sense with that context.
 */

import { z } from "zod";
import { ROUTES, companyIdSchema } from "@shared/schema";
import { Skill } from "../decisionLayer/skills";
import evaluationCases from "./evaluationCases.json";

export const EVALUATION_CATEGORIES = ["individual_agent", "memory", "multi_agent", "edge_cases"] as const;
export type EvaluationCategory = typeof EVALUATION_CATEGORIES[number];

export const ANSWER_TYPES = ["exact", "contains", "numeric_range", "list", "clarification", "open_ended"] as const;
export type AnswerType = typeof ANSWER_TYPES[number];

export const expectedAnswerSchema = z.object({
  type: z.enum(ANSWER_TYPES),
  value: z.union([z.string(), z.number(), z.array(z.string())]).optional(),
  acceptableVariations: z.array(z.string()).default([]),
});

export type ExpectedAnswer = z.infer<typeof expectedAnswerSchema>;

export const evaluationCaseSchema = z.object({
  id: z.string().min(1),
  category: z.enum(EVALUATION_CATEGORIES),
  subcategory: z.string().default(""),
  question: z.string().trim().min(1),
  companyId: companyIdSchema.optional(),
  expectedRoute: z.enum(ROUTES).optional(),
  expectedSkill: z.nativeEnum(Skill).optional(),
  // Trace states expected, ignoring sql_attempt_<n> entries.
  expectedTrace: z.array(z.string()).optional(),
  expectedAnswer: expectedAnswerSchema.optional(),
  description: z.string().default(""),
});

export type EvaluationCase = z.infer<typeof evaluationCaseSchema>;

const evaluationFileSchema = z.object({
  defaultCompanyId: companyIdSchema,
  cases: z.array(evaluationCaseSchema),
});

export type EvaluationSet = z.infer<typeof evaluationFileSchema>;

export function parseEvaluationSet(data: unknown): EvaluationSet {
  const set = evaluationFileSchema.parse(data);
  const seen = new Set<string>();
  for (const testCase of set.cases) {
    if (seen.has(testCase.id)) {
      throw new Error(`Duplicate evaluation case id: ${testCase.id}`);
    }
    seen.add(testCase.id);
  }
  return set;
}

export function loadEvaluationSet(): EvaluationSet {
  return parseEvaluationSet(evaluationCases);
}

export type CaseFilter = {
  category?: string;
  subcategory?: string;
  id?: string;
};

export function filterCases(cases: EvaluationCase[], filter: CaseFilter): EvaluationCase[] {
  return cases.filter(testCase =>
    (!filter.category || testCase.category === filter.category) &&
    (!filter.subcategory || testCase.subcategory === filter.subcategory) &&
    (!filter.id || testCase.id === filter.id),
  );
}

export type MemorySequence = {
  baseId: string;
  setup: EvaluationCase;
  followUp: EvaluationCase;
};

/** Pairs "<base>a" with "<base>b" among memory cases, sorted by base id. */
export function memorySequences(cases: EvaluationCase[]): MemorySequence[] {
  const byId = new Map(cases.filter(c => c.category === "memory").map(c => [c.id, c]));
  const baseIds = new Set<string>();
  for (const id of byId.keys()) {
    if (/[ab]$/.test(id)) baseIds.add(id.slice(0, -1));
  }

  const sequences: MemorySequence[] = [];
  for (const baseId of [...baseIds].sort()) {
    const setup = byId.get(`${baseId}a`);
    const followUp = byId.get(`${baseId}b`);
    if (setup && followUp) sequences.push({ baseId, setup, followUp });
  }
  return sequences;
}
