import type { ConversationTurn, HistoryMessage, IConversationMemory } from './IConversationMemory.js';
import { turnsToMessages } from './turnMessages.js';

export interface InMemoryConversationMemoryOptions {
  maxTurns: number;
}

/**
 * Per-session ring buffer of the last N turns, oldest evicted first.
 */
export class InMemoryConversationMemory implements IConversationMemory {
  private readonly sessions = new Map<string, ConversationTurn[]>();
  private readonly maxTurns: number;

  constructor(options: InMemoryConversationMemoryOptions) {
    this.maxTurns = options.maxTurns;
  }

  async addTurn(sessionId: string, turn: ConversationTurn): Promise<void> {
    const turns = this.sessions.get(sessionId) ?? [];
    turns.push(turn);
    if (turns.length > this.maxTurns) {
      turns.splice(0, turns.length - this.maxTurns);
    }
    this.sessions.set(sessionId, turns);
  }

  async getHistory(sessionId: string): Promise<ConversationTurn[]> {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  async getMessages(sessionId: string): Promise<HistoryMessage[]> {
    return turnsToMessages(await this.getHistory(sessionId));
  }

  async close(): Promise<void> {
    this.sessions.clear();
  }
}
