export type ChatRole = 'user' | 'assistant';

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export type ConversationHistoryOptions = {
  // Distinct users kept; the least recently touched one is evicted first.
  maxUsers: number;
  // Turns kept per user; the oldest turns are dropped first, and a leading
  // assistant turn left over from a cut exchange goes with them.
  maxTurns: number;
};

/**
 * Bounded per-user chat history for the completion API.
 *
 * A Map keeps insertion order, so re-inserting a key on every touch makes
 * the first key the least recently used one.
 */
export class ConversationHistoryStore {
  private readonly entries = new Map<string, ChatTurn[]>();
  private readonly maxUsers: number;
  private readonly maxTurns: number;

  constructor(options: ConversationHistoryOptions) {
    if (options.maxUsers < 1 || options.maxTurns < 1) {
      throw new Error('ConversationHistoryStore limits must be at least 1');
    }
    this.maxUsers = options.maxUsers;
    this.maxTurns = options.maxTurns;
  }

  get size(): number {
    return this.entries.size;
  }

  get(userId: string): ChatTurn[] {
    const turns = this.entries.get(userId);
    if (!turns) return [];
    this.touch(userId, turns);
    return [...turns];
  }

  append(userId: string, ...turns: ChatTurn[]): void {
    const existing = this.entries.get(userId) ?? [];
    const next = [...existing, ...turns].slice(-this.maxTurns);
    // A history always opens with the user's side of an exchange.
    while (next[0]?.role === 'assistant') {
      next.shift();
    }
    this.touch(userId, next);

    while (this.entries.size > this.maxUsers) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  private touch(userId: string, turns: ChatTurn[]): void {
    this.entries.delete(userId);
    this.entries.set(userId, turns);
  }
}
