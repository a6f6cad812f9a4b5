/**
 * Conversation Memory
 *
 * Per-session sliding window of the most recent question/answer exchanges.
 * Sessions are independent: each owns its own buffer, created on first write
 * and kept until cleared. Writes to one session are serialized through a
 * promise chain so concurrent questions in the same session cannot interleave
 * a read-modify-write; different sessions never wait on each other.
 */

export type ConversationTurn = {
  question: string;
  answer: string;
  timestamp: Date;
};

export class ConversationMemory {
  private sessions = new Map<string, ConversationTurn[]>();
  private pending = new Map<string, Promise<void>>();

  constructor(private readonly windowSize: number) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new Error(`[ConversationMemory] windowSize must be a positive integer, got ${windowSize}`);
    }
  }

  private exclusive(sessionId: string, mutate: () => void): Promise<void> {
    const previous = this.pending.get(sessionId) ?? Promise.resolve();
    const next = previous.then(mutate);
    this.pending.set(sessionId, next);
    return next.finally(() => {
      if (this.pending.get(sessionId) === next) {
        this.pending.delete(sessionId);
      }
    });
  }

  addExchange(sessionId: string, question: string, answer: string): Promise<void> {
    return this.exclusive(sessionId, () => {
      const turns = this.sessions.get(sessionId) ?? [];
      turns.push({ question, answer, timestamp: new Date() });
      // FIFO eviction down to the window size
      while (turns.length > this.windowSize) {
        turns.shift();
      }
      this.sessions.set(sessionId, turns);
    });
  }

  /**
   * Returns a copy of the session's turns, oldest first. Unknown sessions
   * have an empty history.
   */
  getHistory(sessionId: string): ConversationTurn[] {
    return (this.sessions.get(sessionId) ?? []).map(turn => ({ ...turn }));
  }

  clear(sessionId: string): Promise<void> {
    return this.exclusive(sessionId, () => {
      this.sessions.delete(sessionId);
    });
  }

  clearAll(): void {
    this.sessions.clear();
  }

  sessionCount(): number {
    return this.sessions.size;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }
}
