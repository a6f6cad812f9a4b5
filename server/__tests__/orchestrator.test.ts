/**
 * End-to-end tests of the orchestrator state machine with in-process fakes
 * for the model, the database and vector search.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { createOrchestrator, type Orchestrator } from "../orchestrator";
import { loadSettings } from "../config/settings";
import { ConversationMemory } from "../memory/conversationMemory";
import { CANNED_GREETING } from "../config/prompts";
import { DataStoreError } from "../utils/errorHandler";
import { FakeCompletion, FakeDataStore, FakeVectorSearch } from "./helpers/fakes";

const CALLS_SQL =
  "SELECT direction, recording_summary FROM communications.phone_call_silver WHERE matched_company_id = 42 ORDER BY call_created_at DESC LIMIT 1";
const EMAILS_SQL = "SELECT subject, sent_date FROM communications.emails_silver WHERE matched_company_id = 42";

describe("Orchestrator", () => {
  let events: string[];
  let completion: FakeCompletion;
  let dataStore: FakeDataStore;
  let vectorSearch: FakeVectorSearch;
  let memory: ConversationMemory;
  let orchestrator: Orchestrator;

  beforeEach(() => {
    events = [];
    completion = new FakeCompletion();
    dataStore = new FakeDataStore(events);
    vectorSearch = new FakeVectorSearch(events);
    memory = new ConversationMemory(3);
    orchestrator = createOrchestrator(loadSettings({}), { completion, dataStore, vectorSearch, memory });
  });

  const ask = (text: string, sessionId = "s1") => orchestrator.ask({ text, tenantId: 42, sessionId });

  describe("sql_only", () => {
    it("answers a question about the last call", async () => {
      completion.decisions.push({ route: "sql_only", reasoning: "call records" });
      completion.candidates.push({ sql: CALLS_SQL });
      dataStore.results.push([{ direction: "inbound", recording_summary: "Discussed renewal pricing" }]);
      completion.answers.push("On the last call you discussed renewal pricing.");

      const result = await ask("What did we discuss on the last call?");

      expect(result).toEqual({
        success: true,
        route: "sql_only",
        sql: CALLS_SQL,
        rows: [{ direction: "inbound", recording_summary: "Discussed renewal pricing" }],
        documentSnippets: null,
        naturalResponse: "On the last call you discussed renewal pricing.",
        trace: ["supervisor", "sql_agent", "sql_attempt_1", "synthesizer"],
        error: null,
        skill: "phone_calls",
        attempts: 1,
        dataSources: ["Phone Calls"],
        needsClarification: false,
        routingAnomaly: null,
      });
      expect(vectorSearch.requests).toHaveLength(0);
    });

    it("logs how long each state took", async () => {
      const out = vi.spyOn(console, "log").mockImplementation(() => {});
      completion.decisions.push({ route: "sql_only" });
      completion.candidates.push({ sql: CALLS_SQL });
      dataStore.results.push([]);
      completion.answers.push("No calls yet.");

      await ask("What did we discuss on the last call?");

      const completed = out.mock.calls.map(([line]) => String(line)).find(line => line.includes("[Orchestrator] Completed"));
      expect(completed).toMatch(/"stages":\{"supervisor":\d+,"sql_agent":\d+,"synthesizer":\d+\}/);
      out.mockRestore();
    });

    it("records one trace entry per SQL attempt", async () => {
      completion.decisions.push({ route: "sql_only" });
      completion.candidates.push({ sql: "DROP TABLE communications.phone_call_silver" }, { sql: CALLS_SQL });
      dataStore.results.push([]);
      completion.answers.push("No calls yet.");

      const result = await ask("What did we discuss on the last call?");

      expect(result.trace).toEqual(["supervisor", "sql_agent", "sql_attempt_1", "sql_attempt_2", "synthesizer"]);
      expect(result.attempts).toBe(2);
    });

    it("returns a failure without synthesis once retries are exhausted", async () => {
      completion.decisions.push({ route: "sql_only" });
      for (let i = 0; i < 3; i++) {
        completion.candidates.push({ sql: "DROP TABLE communications.phone_call_silver" });
      }

      const result = await ask("What did we discuss on the last call?");

      const feedback = "Forbidden keyword(s) in query: DROP. Only read-only SELECT queries are allowed";
      expect(result.success).toBe(false);
      expect(result.error).toBe(feedback);
      expect(result.naturalResponse).toBe(`I attempted to answer your question but encountered an error: ${feedback}`);
      expect(result.rows).toBeNull();
      expect(result.trace).toEqual([
        "supervisor", "sql_agent", "sql_attempt_1", "sql_attempt_2", "sql_attempt_3", "synthesizer",
      ]);
      expect(completion.synthesizeRequests).toHaveLength(0);
      expect(dataStore.queries).toHaveLength(0);
      expect(memory.hasSession("s1")).toBe(false);
    });
  });

  describe("hybrid", () => {
    const question = "What quotes did we receive and what does the policy say about them?";

    it("runs the SQL branch before the document branch and combines both", async () => {
      completion.decisions.push({ route: "hybrid", search_terms: ["policy"] });
      completion.candidates.push({ sql: EMAILS_SQL });
      dataStore.results.push([{ subject: "Renewal quote", sent_date: "2024-05-03" }]);
      vectorSearch.results.push([{ sourceId: "policy.pdf", text: "Coverage starts June 1.", score: 0.82 }]);
      completion.answers.push("The renewal quote matches the policy start date.");

      const result = await ask(question);

      expect(events).toEqual(["data_store", "vector_search"]);
      expect(result.trace).toEqual(["supervisor", "sql_agent", "sql_attempt_1", "document_agent", "synthesizer"]);
      expect(result.skill).toBe("email_communications");
      expect(result.dataSources).toEqual(["Email Communications", "Document Search"]);
      expect(result.documentSnippets).toEqual([{ sourceId: "policy.pdf", text: "Coverage starts June 1.", score: 0.82 }]);
      expect(vectorSearch.requests).toEqual([
        { query: `${question}\nKey terms: policy`, tenantId: 42, topK: 5, similarityThreshold: 0.5 },
      ]);

      const { user } = completion.synthesizeRequests[0];
      expect(user).toContain('"subject": "Renewal quote"');
      expect(user).toContain("[1] policy.pdf (similarity 0.82)");
    });

    it("still searches documents when the SQL branch is exhausted, but reports failure", async () => {
      completion.decisions.push({ route: "hybrid" });
      for (let i = 0; i < 3; i++) {
        completion.candidates.push({ sql: "DROP TABLE communications.emails_silver" });
      }
      vectorSearch.results.push([{ sourceId: "policy.pdf", text: "Coverage starts June 1.", score: 0.82 }]);
      completion.answers.push("The policy says coverage starts June 1.");

      const result = await ask(question);

      const feedback = "Forbidden keyword(s) in query: DROP. Only read-only SELECT queries are allowed";
      expect(result.success).toBe(false);
      expect(result.error).toBe(feedback);
      expect(result.rows).toBeNull();
      expect(result.naturalResponse).toBe("The policy says coverage starts June 1.");
      expect(result.trace).toEqual([
        "supervisor", "sql_agent", "sql_attempt_1", "sql_attempt_2", "sql_attempt_3", "document_agent", "synthesizer",
      ]);
      expect(completion.synthesizeRequests[0].user).toContain(`**SQL Database Results:** The database query failed: ${feedback}`);
      expect(memory.hasSession("s1")).toBe(false);
    });

    it("asks for clarification without searching documents", async () => {
      completion.decisions.push({ route: "hybrid" });
      completion.candidates.push({ needs_clarification: true, clarification_question: "Which policy?" });

      const result = await ask(question);

      expect(result.trace).toEqual(["supervisor", "sql_agent", "sql_attempt_1", "synthesizer"]);
      expect(result.needsClarification).toBe(true);
      expect(result.naturalResponse).toBe("I need a bit more information to answer your question.\n\n**Which policy?**");
      expect(vectorSearch.requests).toHaveLength(0);
    });
  });

  describe("document_search", () => {
    it("answers from document snippets", async () => {
      completion.decisions.push({ route: "document_search", search_terms: ["coverage"] });
      vectorSearch.results.push([{ sourceId: "policy.pdf", text: "Coverage starts June 1.", score: 0.9 }]);
      completion.answers.push("Coverage starts June 1.");

      const result = await ask("When does coverage start?");

      expect(result.success).toBe(true);
      expect(result.trace).toEqual(["supervisor", "document_agent", "synthesizer"]);
      expect(result.skill).toBeNull();
      expect(result.sql).toBeNull();
      expect(result.dataSources).toEqual(["Document Search"]);
      expect(dataStore.queries).toHaveLength(0);
    });

    it("contains a failure inside the branch", async () => {
      completion.decisions.push({ route: "document_search" });
      vectorSearch.results.push(new DataStoreError("connection", "socket closed"));

      const result = await ask("When does coverage start?");

      expect(result.success).toBe(false);
      expect(result.route).toBe("document_search");
      expect(result.trace).toEqual(["supervisor", "document_agent"]);
      expect(result.naturalResponse).toBe("I couldn't reach the communications database. Please try again shortly.");
      expect(result.error).toBe("socket closed");
      expect(memory.hasSession("s1")).toBe(false);
    });

    it("hides unexpected errors behind a generic message", async () => {
      completion.decisions.push({ route: "document_search" });
      vectorSearch.results.push(new Error("Cannot read properties of undefined"));

      const result = await ask("When does coverage start?");

      expect(result.naturalResponse).toBe("Sorry, I hit an internal error while processing that request.");
      expect(result.error).toBe("Cannot read properties of undefined");
    });
  });

  describe("conversational", () => {
    it("greets without calling the model", async () => {
      const result = await ask("hi");

      expect(result.trace).toEqual(["supervisor", "conversational"]);
      expect(result.naturalResponse).toBe(CANNED_GREETING);
      expect(completion.decideRequests).toHaveLength(0);
    });

    it("uses the supervisor's reply when it gives one", async () => {
      completion.decisions.push({ route: "conversational", conversational_response: "I can look up calls and emails." });

      const result = await ask("What can you do?");

      expect(result.naturalResponse).toBe("I can look up calls and emails.");
    });

    it("surfaces a routing anomaly", async () => {
      completion.decisions.push({ route: "weather" });

      const result = await ask("Will it rain tomorrow?");

      expect(result.route).toBe("conversational");
      expect(result.routingAnomaly).toBe('Supervisor returned unknown route "weather"');
      expect(result.naturalResponse).toBe(CANNED_GREETING);
    });
  });

  describe("memory", () => {
    it("stores successful exchanges and shows them to the next question", async () => {
      completion.decisions.push({ route: "sql_only" }, { route: "sql_only" });
      completion.candidates.push({ sql: CALLS_SQL }, { sql: CALLS_SQL });
      dataStore.results.push([{ direction: "inbound" }], [{ direction: "outbound" }]);
      completion.answers.push("It was inbound.", "It was outbound.");

      await ask("Was the last call inbound?");
      await ask("And the one before that call?");

      expect(memory.getHistory("s1").map(t => t.answer)).toEqual(["It was inbound.", "It was outbound."]);
      expect(completion.decideRequests[1].user).toContain("[1] Q: Was the last call inbound? A: It was inbound.");
      expect(completion.generateRequests[1].user).toContain("Q1: Was the last call inbound?\nA1: It was inbound.");
    });

    it("keeps sessions apart", async () => {
      await ask("hi", "a");
      await ask("hello", "b");

      expect(memory.getHistory("a").map(t => t.question)).toEqual(["hi"]);
      expect(memory.getHistory("b").map(t => t.question)).toEqual(["hello"]);
    });
  });
});
