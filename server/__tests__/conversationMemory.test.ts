import { describe, it, expect } from "vitest";
import { ConversationMemory } from "../memory/conversationMemory";

const questions = (memory: ConversationMemory, sessionId: string) =>
  memory.getHistory(sessionId).map(turn => turn.question);

describe("ConversationMemory", () => {
  it("returns an empty history for unknown sessions", () => {
    const memory = new ConversationMemory(3);
    expect(memory.getHistory("nobody")).toEqual([]);
    expect(memory.hasSession("nobody")).toBe(false);
  });

  it("keeps the most recent exchanges, oldest first", async () => {
    const memory = new ConversationMemory(3);
    for (let i = 1; i <= 4; i++) {
      await memory.addExchange("s1", `q${i}`, `a${i}`);
    }
    expect(questions(memory, "s1")).toEqual(["q2", "q3", "q4"]);
    expect(memory.getHistory("s1")[2].answer).toBe("a4");
  });

  it("isolates sessions", async () => {
    const memory = new ConversationMemory(3);
    await memory.addExchange("s1", "first", "one");
    await memory.addExchange("s2", "second", "two");
    expect(questions(memory, "s1")).toEqual(["first"]);
    expect(questions(memory, "s2")).toEqual(["second"]);
    expect(memory.sessionCount()).toBe(2);
  });

  it("hands out copies", async () => {
    const memory = new ConversationMemory(3);
    await memory.addExchange("s1", "q", "a");
    const history = memory.getHistory("s1");
    history[0].answer = "changed";
    history.push({ question: "x", answer: "y", timestamp: new Date() });
    expect(memory.getHistory("s1")).toHaveLength(1);
    expect(memory.getHistory("s1")[0].answer).toBe("a");
  });

  it("applies concurrent writes to one session in call order", async () => {
    const memory = new ConversationMemory(10);
    await Promise.all([0, 1, 2, 3, 4].map(i => memory.addExchange("s1", `q${i}`, `a${i}`)));
    expect(questions(memory, "s1")).toEqual(["q0", "q1", "q2", "q3", "q4"]);
  });

  it("clears one session without touching others", async () => {
    const memory = new ConversationMemory(3);
    await memory.addExchange("s1", "q", "a");
    await memory.addExchange("s2", "q", "a");
    await memory.clear("s1");
    expect(memory.hasSession("s1")).toBe(false);
    expect(memory.hasSession("s2")).toBe(true);

    memory.clearAll();
    expect(memory.sessionCount()).toBe(0);
  });

  it("rejects a window smaller than one", () => {
    expect(() => new ConversationMemory(0)).toThrow(
      "[ConversationMemory] windowSize must be a positive integer, got 0",
    );
  });
});
