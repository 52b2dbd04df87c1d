import type { ConversationState, ConversationTurn } from '../types';

export const EMPTY_CONVERSATION: ConversationState = Object.freeze([]);

// Append-only: returns a new state, the previous one is left untouched
export function appendTurn(state: ConversationState, turn: ConversationTurn): ConversationState {
  return Object.freeze([...state, { role: turn.role, text: turn.text }]);
}

export const DEFAULT_SESSION_IDLE_MS = 2 * 60 * 60 * 1000;
export const DEFAULT_MAX_SESSIONS = 1000;

export type ConversationStoreOptions = {
  idleMs?: number;
  maxSessions?: number;
  now?: () => number;
};

type Entry = {
  state: ConversationState;
  touchedAt: number;
};

/**
 * In-memory states keyed by the browser session id. The server cannot see a
 * tab close, so a session that has been idle for `idleMs` is dropped, and the
 * least recently used one goes first once `maxSessions` is exceeded.
 */
export class ConversationStore {
  // Insertion order is touch order, oldest first
  private readonly entries = new Map<string, Entry>();
  private readonly idleMs: number;
  private readonly maxSessions: number;
  private readonly now: () => number;

  constructor({ idleMs = DEFAULT_SESSION_IDLE_MS, maxSessions = DEFAULT_MAX_SESSIONS, now = Date.now }: ConversationStoreOptions = {}) {
    this.idleMs = idleMs;
    this.maxSessions = maxSessions;
    this.now = now;
  }

  get(sessionId: string): ConversationState {
    this.prune();
    const entry = this.entries.get(sessionId);
    if (!entry) return EMPTY_CONVERSATION;
    this.touch(sessionId, entry.state);
    return entry.state;
  }

  set(sessionId: string, state: ConversationState): void {
    this.touch(sessionId, state);
    this.prune();
  }

  size(): number {
    this.prune();
    return this.entries.size;
  }

  private touch(sessionId: string, state: ConversationState) {
    this.entries.delete(sessionId);
    this.entries.set(sessionId, { state, touchedAt: this.now() });
  }

  private prune() {
    const cutoff = this.now() - this.idleMs;
    for (const [id, entry] of this.entries) {
      if (entry.touchedAt > cutoff && this.entries.size <= this.maxSessions) break;
      this.entries.delete(id);
    }
  }
}
