import type { SourceDocument } from '../retrieval/types.js';

export interface ConversationTurn {
  query: string;
  response: string;
  /** Catalog results shown in this turn; only product sources are kept */
  sources: SourceDocument[];
}

export type HistoryMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

export interface IConversationMemory {
  addTurn(sessionId: string, turn: ConversationTurn): Promise<void>;
  /** Oldest first, at most the configured number of turns */
  getHistory(sessionId: string): Promise<ConversationTurn[]>;
  /** History re-expanded into chat messages, product ids appended to replies */
  getMessages(sessionId: string): Promise<HistoryMessage[]>;
  close(): Promise<void>;
}
