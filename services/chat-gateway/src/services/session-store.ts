import type { ChatMessage, ChatSession, Sender } from '../types/index.js';

/**
 * In-memory conversation store.
 * Sessions are created lazily and evicted by `sweep` once idle.
 */
export class SessionStore {
  private sessions: Map<string, ChatSession> = new Map();

  /**
   * Get a session, creating it on first sight
   */
  getOrCreate(sessionId: string, now: number = Date.now()): ChatSession {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = {
        sessionId,
        messages: [],
        createdAt: now,
        lastActivity: now,
      };
      this.sessions.set(sessionId, session);
    }
    return session;
  }

  /**
   * Append a message to a session's history.
   * A session that was swept or deleted mid-request is recreated.
   */
  append(sessionId: string, sender: Sender, text: string, now: number = Date.now()): ChatMessage {
    const session = this.getOrCreate(sessionId, now);
    const message: ChatMessage = Object.freeze({ sender, message: text, timestamp: now });

    session.messages.push(message);
    session.lastActivity = Math.max(session.lastActivity, now);
    return message;
  }

  /**
   * Ordered message history, or null for an unknown session
   */
  history(sessionId: string): ChatMessage[] | null {
    const session = this.sessions.get(sessionId);
    return session ? [...session.messages] : null;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  lastActivity(sessionId: string): number | null {
    return this.sessions.get(sessionId)?.lastActivity ?? null;
  }

  remove(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Remove every session idle for longer than `idleTimeoutMs`
   */
  sweep(now: number, idleTimeoutMs: number): number {
    let removed = 0;
    for (const [sessionId, session] of this.sessions) {
      if (now - session.lastActivity > idleTimeoutMs) {
        this.sessions.delete(sessionId);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.sessions.size;
  }
}
