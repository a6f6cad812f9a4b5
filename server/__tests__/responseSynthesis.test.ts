import { describe, it, expect, beforeEach } from "vitest";
import {
  ResponseSynthesisStage,
  fallbackResponse,
  formatHistoryForSynthesis,
  formatRowsForPrompt,
  formatSnippetsFallback,
  type SynthesisInput,
} from "../synthesis/responseSynthesis";
import { Skill, getSkillDefinition } from "../decisionLayer/skills";
import { HISTORY_CONTEXT_FOOTER, HISTORY_CONTEXT_HEADER, SYNTHESIS_BASE_PROMPT } from "../config/prompts";
import type { DocumentSnippet } from "@shared/schema";
import { FakeCompletion } from "./helpers/fakes";

const snippet: DocumentSnippet = { sourceId: "policy.pdf", text: "Coverage starts June 1.", score: 0.82 };

const sqlInput: SynthesisInput = {
  kind: "sql",
  question: "How many calls last week?",
  skill: Skill.PHONE_CALLS,
  history: [],
  sql: "SELECT count(*) AS calls FROM communications.phone_call_silver WHERE matched_company_id = 42",
  rows: [{ calls: 12 }],
};

describe("formatRowsForPrompt", () => {
  it("reports an empty result", () => {
    expect(formatRowsForPrompt([], Skill.GENERAL, 10)).toBe("No results returned");
  });

  it("caps the number of rows", () => {
    expect(formatRowsForPrompt([{ id: 1 }, { id: 2 }, { id: 3 }], Skill.GENERAL, 2)).toBe(
      `${JSON.stringify([{ id: 1 }, { id: 2 }], null, 2)}\n\n... and 1 more rows`,
    );
  });

  it("trims long text fields but keeps summaries longer", () => {
    const rows = [
      {
        notes: "n".repeat(250),
        recording_summary: "r".repeat(2500),
        classification_raw: "c".repeat(500),
        body_text: "b".repeat(3500),
      },
    ];
    const [row] = JSON.parse(formatRowsForPrompt(rows, Skill.EMAIL_COMMUNICATIONS, 10));
    expect(row.notes).toBe(`${"n".repeat(200)}...`);
    expect(row.recording_summary).toBe("r".repeat(2000));
    expect(row.classification_raw).toBe("c".repeat(500));
    expect(row.body_text).toBe("b".repeat(3000));
  });

  it("only gives email bodies extra room for the email skill", () => {
    const [row] = JSON.parse(formatRowsForPrompt([{ body_text: "b".repeat(250) }], Skill.GENERAL, 10));
    expect(row.body_text).toBe(`${"b".repeat(200)}...`);
  });
});

describe("formatHistoryForSynthesis", () => {
  it("is empty without history", () => {
    expect(formatHistoryForSynthesis([])).toBe("");
  });

  it("frames previous exchanges", () => {
    const text = formatHistoryForSynthesis([{ question: "Last call?", answer: "Tuesday", timestamp: new Date() }]);
    expect(text).toBe(
      `\n\n${HISTORY_CONTEXT_HEADER}\n\n**Previous Q1:** Last call?\n**Previous A1:** Tuesday\n\n---\n${HISTORY_CONTEXT_FOOTER}\n`,
    );
  });
});

describe("deterministic fallback", () => {
  it("lists snippets", () => {
    expect(formatSnippetsFallback([])).toBe("No relevant document content found.");
    expect(formatSnippetsFallback([snippet])).toBe(
      "Found 1 relevant document excerpt(s):\n\n**1. policy.pdf**\nCoverage starts June 1.",
    );
  });

  it("uses the skill formatter for rows", () => {
    expect(fallbackResponse(sqlInput)).toBe(getSkillDefinition(Skill.PHONE_CALLS).formatFallback(sqlInput.rows));
  });

  it("shows both sources for hybrid results, including a failed SQL branch", () => {
    const text = fallbackResponse({
      kind: "hybrid",
      question: "q",
      skill: Skill.GENERAL,
      history: [],
      sql: null,
      rows: [],
      sqlError: "boom",
      snippets: [],
    });
    expect(text).toBe(
      "**From Database:**\nI attempted to answer your question but encountered an error: boom\n\n" +
        "**From Documents:**\nNo relevant document content found.",
    );
  });
});

describe("ResponseSynthesisStage", () => {
  let completion: FakeCompletion;

  beforeEach(() => {
    completion = new FakeCompletion();
  });

  const stage = (nlgEnabled = true) =>
    new ResponseSynthesisStage(completion, { temperature: 0.7, nlgEnabled, maxRows: 10 });

  it("returns the trimmed model answer", async () => {
    completion.answers.push("  You had 12 calls last week.  ");

    const answer = await stage().synthesize(sqlInput);

    expect(answer).toBe("You had 12 calls last week.");
    const request = completion.synthesizeRequests[0];
    expect(request.system).toBe(`${SYNTHESIS_BASE_PROMPT}\n\n${getSkillDefinition(Skill.PHONE_CALLS).responseGuidance}`);
    expect(request.temperature).toBe(0.7);
    expect(request.user).toContain("User Question: How many calls last week?");
    expect(request.user).toContain("Query Results (1 rows):");
  });

  it("gives the model both sources for hybrid input", async () => {
    completion.answers.push("Combined");

    await stage().synthesize({
      kind: "hybrid",
      question: "q",
      skill: Skill.EMAIL_COMMUNICATIONS,
      history: [],
      sql: "SELECT 1",
      rows: [{ subject: "Renewal quote" }],
      sqlError: null,
      snippets: [snippet],
    });

    const { user } = completion.synthesizeRequests[0];
    expect(user).toContain("**SQL Database Results:** (1 rows)");
    expect(user).toContain('"subject": "Renewal quote"');
    expect(user).toContain("**Document Search Results:**\n[1] policy.pdf (similarity 0.82)\nCoverage starts June 1.");
  });

  it("skips the model when synthesis is disabled", async () => {
    const answer = await stage(false).synthesize(sqlInput);

    expect(completion.synthesizeRequests).toHaveLength(0);
    expect(answer).toBe(fallbackResponse(sqlInput));
  });

  it("falls back when the model call fails", async () => {
    completion.answers.push(new Error("socket hang up"));

    expect(await stage().synthesize(sqlInput)).toBe(fallbackResponse(sqlInput));
  });

  it("falls back when the model returns nothing", async () => {
    completion.answers.push("   ");

    expect(await stage().synthesize(sqlInput)).toBe(fallbackResponse(sqlInput));
  });
});
