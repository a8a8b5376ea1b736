import { Channel, HistoryTurn, Session } from '../types/session';

export const HISTORY_LIMIT = 6;

export interface SessionStore {
  get(conversationId: string): Promise<Session | null>;
  put(conversationId: string, session: Session): Promise<void>;
}

export function createSession(conversationId: string, channel: Channel): Session {
  return {
    conversationId,
    channel,
    formState: 'NONE',
    draft: {},
    history: [],
    awaitingName: false,
    hintCounter: 0,
    updatedAt: new Date().toISOString(),
  };
}

export function appendTurn(history: HistoryTurn[], role: HistoryTurn['role'], text: string): HistoryTurn[] {
  return [...history, { role, text }].slice(-HISTORY_LIMIT);
}

interface StoredSession {
  session: Session;
  touchedAt: number;
}

/**
 * Process-local store. Sessions live until restart unless `ttlMs` is given,
 * in which case idle sessions are dropped on their next lookup or sweep.
 */
export class MemorySessionStore implements SessionStore {
  private sessions = new Map<string, StoredSession>();

  constructor(
    private ttlMs?: number,
    private now: () => number = Date.now
  ) {}

  async get(conversationId: string): Promise<Session | null> {
    const stored = this.sessions.get(conversationId);
    if (!stored) return null;

    if (this.isExpired(stored)) {
      this.sessions.delete(conversationId);
      return null;
    }
    return stored.session;
  }

  async put(conversationId: string, session: Session): Promise<void> {
    this.sessions.set(conversationId, { session, touchedAt: this.now() });
  }

  sweep(): number {
    let removed = 0;
    for (const [id, stored] of this.sessions) {
      if (this.isExpired(stored)) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(stored: StoredSession): boolean {
    return this.ttlMs !== undefined && this.now() - stored.touchedAt > this.ttlMs;
  }
}
