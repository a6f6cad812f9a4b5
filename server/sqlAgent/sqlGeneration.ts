/**
 * SQL Generation Stage
 *
 * Turns a question into a candidate query using the skill's schema context,
 * recent conversation and, on retries, the feedback from the previous attempt.
 * The candidate is never executed here; see queryValidator and queryExecutor.
 */

import { z } from "zod";
import type { TextCompletionService } from "../llm/textCompletion";
import { stripCodeFences } from "../llm/textCompletion";
import { renderSchemaContext, type Skill } from "../decisionLayer/skills";
import type { ConversationTurn } from "../memory/conversationMemory";
import { HISTORY_LIMITS } from "../config/constants";
import { SQL_OUTPUT_INSTRUCTIONS, SQL_HISTORY_HEADER, SQL_ERROR_FOOTER } from "../config/prompts";
import { GenerationFailure, getErrorMessage } from "../utils/errorHandler";

export const sqlCandidateSchema = z.object({
  reasoning: z.string().default(""),
  sql: z.string().default(""),
  explanation: z.string().default(""),
  needs_clarification: z.boolean().default(false),
  clarification_question: z.string().default(""),
});

export type SqlCandidate = {
  reasoning: string;
  sql: string;
  explanation: string;
  needsClarification: boolean;
  clarificationQuestion: string;
};

export type GenerationInput = {
  question: string;
  skill: Skill;
  tenantId: number;
  history: ConversationTurn[];
  priorError?: string;
};

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + "..." : text;
}

export function formatHistoryForSql(history: ConversationTurn[]): string {
  if (history.length === 0) return "";

  const recent = history.slice(-HISTORY_LIMITS.TURNS_IN_PROMPT);
  const lines = [SQL_HISTORY_HEADER, ""];
  recent.forEach((turn, i) => {
    const isMostRecent = i === recent.length - 1;
    const limit = isMostRecent ? HISTORY_LIMITS.SQL_RECENT_ANSWER_CHARS : HISTORY_LIMITS.SQL_OLDER_ANSWER_CHARS;
    lines.push(`Q${i + 1}: ${turn.question}`);
    lines.push(`A${i + 1}: ${truncate(turn.answer, limit)}`);
    lines.push("");
  });
  return lines.join("\n").trimEnd();
}

export function buildSqlUserPrompt(input: Pick<GenerationInput, "question" | "history" | "priorError">): string {
  const sections: string[] = [];
  const history = formatHistoryForSql(input.history);
  if (history) sections.push(history);
  sections.push(`Question: ${input.question}`);
  if (input.priorError) {
    sections.push(`PREVIOUS ERROR: ${input.priorError}\n\n${SQL_ERROR_FOOTER}`);
  }
  return sections.join("\n\n");
}

export class SqlGenerationStage {
  constructor(
    private readonly completion: TextCompletionService,
    private readonly temperature: number,
  ) {}

  async generate(input: GenerationInput): Promise<SqlCandidate> {
    let output: z.infer<typeof sqlCandidateSchema>;
    try {
      output = await this.completion.generate(
        {
          system: `${renderSchemaContext(input.skill, input.tenantId)}\n\n${SQL_OUTPUT_INSTRUCTIONS}`,
          user: buildSqlUserPrompt(input),
          temperature: this.temperature,
        },
        sqlCandidateSchema,
      );
    } catch (error) {
      throw new GenerationFailure(`SQL generation failed: ${getErrorMessage(error)}`, error);
    }

    return {
      reasoning: output.reasoning,
      sql: stripCodeFences(output.sql),
      explanation: output.explanation,
      needsClarification: output.needs_clarification,
      clarificationQuestion: output.clarification_question,
    };
  }
}
