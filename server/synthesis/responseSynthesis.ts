/**
 * Response Synthesis Stage
 *
 * Purpose:
 * Produces the final natural-language answer from SQL rows, document
 * snippets, or both. Rows are capped and long text fields trimmed before they
 * go into the prompt; summary fields that carry the substance of a call or
 * email keep more of their text.
 *
 * When synthesis is disabled or the completion call fails, the answer is
 * built deterministically: the skill's fallback formatter for rows, a
 * snippet list for documents, and both side by side for hybrid results.
 *
 * Layer: Synthesis
 */

import type { DocumentSnippet, QueryRow } from "@shared/schema";
import type { TextCompletionService } from "../llm/textCompletion";
import type { ConversationTurn } from "../memory/conversationMemory";
import { Skill, getSkillDefinition } from "../decisionLayer/skills";
import { failureResponse } from "../sqlAgent/queryExecutor";
import { FALLBACK_LIMITS, HISTORY_LIMITS, RESULT_FIELD_LIMITS } from "../config/constants";
import {
  SYNTHESIS_BASE_PROMPT,
  SQL_ANSWER_INSTRUCTION,
  DOCUMENT_SYNTHESIS_PROMPT,
  HYBRID_SYNTHESIS_PROMPT,
  HISTORY_CONTEXT_HEADER,
  HISTORY_CONTEXT_FOOTER,
} from "../config/prompts";
import { SynthesisFailure, getErrorMessage } from "../utils/errorHandler";
import type { RequestLogger } from "../utils/logger";

type SynthesisBase = {
  question: string;
  skill: Skill;
  history: ConversationTurn[];
};

export type SynthesisInput =
  | (SynthesisBase & { kind: "sql"; sql: string; rows: QueryRow[] })
  | (SynthesisBase & { kind: "documents"; snippets: DocumentSnippet[] })
  | (SynthesisBase & {
      kind: "hybrid";
      sql: string | null;
      rows: QueryRow[];
      /** Set when the SQL branch exhausted its retries. */
      sqlError: string | null;
      snippets: DocumentSnippet[];
    });

export type SynthesisOptions = {
  temperature: number;
  nlgEnabled: boolean;
  maxRows: number;
};

const UNTRUNCATED = new Set<string>(RESULT_FIELD_LIMITS.UNTRUNCATED_FIELDS);

function truncateField(key: string, value: unknown, skill: Skill): unknown {
  if (typeof value !== "string") return value;
  if (skill === Skill.EMAIL_COMMUNICATIONS && key === "body_text") {
    return value.slice(0, RESULT_FIELD_LIMITS.EMAIL_BODY_MAX_CHARS);
  }
  if (key === "recording_summary") {
    return value.slice(0, RESULT_FIELD_LIMITS.RECORDING_SUMMARY_MAX_CHARS);
  }
  if (UNTRUNCATED.has(key)) return value;
  if (value.length > RESULT_FIELD_LIMITS.DEFAULT_MAX_CHARS) {
    return value.slice(0, RESULT_FIELD_LIMITS.DEFAULT_MAX_CHARS) + "...";
  }
  return value;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function formatRowsForPrompt(rows: QueryRow[], skill: Skill, maxRows: number): string {
  if (rows.length === 0) return "No results returned";

  const limited = rows.slice(0, maxRows).map(row =>
    Object.fromEntries(Object.entries(row).map(([key, value]) => [key, truncateField(key, value, skill)])),
  );
  let formatted = JSON.stringify(limited, jsonReplacer, 2);
  if (rows.length > maxRows) {
    formatted += `\n\n... and ${rows.length - maxRows} more rows`;
  }
  return formatted;
}

export function formatHistoryForSynthesis(history: ConversationTurn[]): string {
  if (history.length === 0) return "";

  const recent = history.slice(-HISTORY_LIMITS.TURNS_IN_PROMPT);
  let context = `\n\n${HISTORY_CONTEXT_HEADER}\n\n`;
  recent.forEach((turn, i) => {
    const limit = i === recent.length - 1
      ? HISTORY_LIMITS.SYNTHESIS_RECENT_ANSWER_CHARS
      : HISTORY_LIMITS.SYNTHESIS_OLDER_ANSWER_CHARS;
    const answer = turn.answer.length > limit ? turn.answer.slice(0, limit) + "..." : turn.answer;
    context += `**Previous Q${i + 1}:** ${turn.question}\n`;
    context += `**Previous A${i + 1}:** ${answer}\n\n`;
  });
  context += `---\n${HISTORY_CONTEXT_FOOTER}\n`;
  return context;
}

export function formatSnippetsForPrompt(snippets: DocumentSnippet[]): string {
  if (snippets.length === 0) return "No relevant document content found.";
  return snippets
    .map((snippet, i) => `[${i + 1}] ${snippet.sourceId} (similarity ${snippet.score.toFixed(2)})\n${snippet.text}`)
    .join("\n\n");
}

// ============================================================================
// DETERMINISTIC FALLBACK
// ============================================================================

export function formatSnippetsFallback(snippets: DocumentSnippet[]): string {
  if (snippets.length === 0) return "No relevant document content found.";

  const lines = [`Found ${snippets.length} relevant document excerpt(s):`, ""];
  snippets.forEach((snippet, i) => {
    const text = snippet.text.length > FALLBACK_LIMITS.SNIPPET_CHARS
      ? snippet.text.slice(0, FALLBACK_LIMITS.SNIPPET_CHARS) + "..."
      : snippet.text;
    lines.push(`**${i + 1}. ${snippet.sourceId}**`);
    lines.push(text);
    lines.push("");
  });
  return lines.join("\n").trimEnd();
}

export function fallbackResponse(input: SynthesisInput): string {
  const formatRows = getSkillDefinition(input.skill).formatFallback;
  switch (input.kind) {
    case "sql":
      return formatRows(input.rows);
    case "documents":
      return formatSnippetsFallback(input.snippets);
    case "hybrid": {
      const fromDatabase = input.sqlError ? failureResponse(input.sqlError) : formatRows(input.rows);
      return `**From Database:**\n${fromDatabase}\n\n**From Documents:**\n${formatSnippetsFallback(input.snippets)}`;
    }
  }
}

// ============================================================================
// PROMPTS
// ============================================================================

export function buildSynthesisPrompt(input: SynthesisInput, maxRows: number): { system: string; user: string } {
  const guidance = getSkillDefinition(input.skill).responseGuidance;
  const history = formatHistoryForSynthesis(input.history);

  switch (input.kind) {
    case "sql":
      return {
        system: `${SYNTHESIS_BASE_PROMPT}\n\n${guidance}`,
        user: `User Question: ${input.question}\n\n` +
          `Query Results (${input.rows.length} rows):\n${formatRowsForPrompt(input.rows, input.skill, maxRows)}${history}\n\n` +
          SQL_ANSWER_INSTRUCTION,
      };
    case "documents":
      return {
        system: DOCUMENT_SYNTHESIS_PROMPT,
        user: `User Question: ${input.question}\n\n` +
          `Document Excerpts:\n${formatSnippetsForPrompt(input.snippets)}${history}\n\n` +
          "Answer the question using the excerpts above.",
      };
    case "hybrid": {
      const database = input.sqlError
        ? `The database query failed: ${input.sqlError}`
        : `(${input.rows.length} rows)\n${formatRowsForPrompt(input.rows, input.skill, maxRows)}`;
      return {
        system: `${HYBRID_SYNTHESIS_PROMPT}\n\n${guidance}`,
        user: `User Question: ${input.question}\n\n` +
          `**SQL Database Results:** ${database}\n\n` +
          `**Document Search Results:**\n${formatSnippetsForPrompt(input.snippets)}${history}\n\n` +
          "Correlate and compare both sources, then synthesize them into a single coherent answer.",
      };
    }
  }
}

export class ResponseSynthesisStage {
  constructor(
    private readonly completion: TextCompletionService,
    private readonly options: SynthesisOptions,
  ) {}

  async synthesize(input: SynthesisInput, logger?: RequestLogger): Promise<string> {
    if (!this.options.nlgEnabled) {
      return fallbackResponse(input);
    }

    try {
      const prompt = buildSynthesisPrompt(input, this.options.maxRows);
      const text = await this.completion.synthesize({ ...prompt, temperature: this.options.temperature });
      if (!text.trim()) {
        throw new SynthesisFailure("Completion returned an empty answer");
      }
      return text.trim();
    } catch (error) {
      const failure = error instanceof SynthesisFailure
        ? error
        : new SynthesisFailure(`Answer synthesis failed: ${getErrorMessage(error)}`, error);
      logger?.warn(`[Synthesis] ${failure.message}; using deterministic fallback`);
      return fallbackResponse(input);
    }
  }
}
