// Voice Relay - Session Store
// Per-session ordered message history. Sessions are created lazily and live
// for the lifetime of the process unless cleared.
//
// The interface is asynchronous so a durable backend can implement it; the
// in-memory implementation resolves immediately.

import type { Message, MessageRole, SessionHistory, SessionSummary } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Max characters of the last message shown in session summaries. */
export const PREVIEW_LENGTH = 50;

// ─── Interface ──────────────────────────────────────────────────────────────────

export interface SessionStore {
  /** Returns the session's history, creating an empty session if absent. */
  getOrCreate(sessionId: string): Promise<readonly Message[]>;
  /** Returns the session's history without creating anything. */
  get(sessionId: string): Promise<SessionHistory>;
  /** Appends one message and returns the session's new message count. */
  append(sessionId: string, role: MessageRole, content: string): Promise<number>;
  /** Removes the session. Returns false when it did not exist. */
  clear(sessionId: string): Promise<boolean>;
  list(): Promise<SessionSummary[]>;
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

export function createMessage(role: MessageRole, content: string): Message {
  return Object.freeze({ role, content });
}

export function previewOf(content: string): string {
  return content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH)}...` : content;
}

// ─── In-memory implementation ───────────────────────────────────────────────────

/**
 * Map-backed store. Every operation runs synchronously inside the promise
 * executor, so a single append can never interleave with another one and
 * appends from concurrent requests complete in call order.
 *
 * Callers always receive copies; the internal arrays never leave this class.
 */
export class InMemorySessionStore implements SessionStore {
  private sessions: Map<string, Message[]> = new Map();

  async getOrCreate(sessionId: string): Promise<readonly Message[]> {
    return [...this.ensure(sessionId)];
  }

  async get(sessionId: string): Promise<SessionHistory> {
    const messages = this.sessions.get(sessionId);
    if (!messages) {
      return { messages: [], isNew: true };
    }
    return { messages: [...messages], isNew: false };
  }

  async append(sessionId: string, role: MessageRole, content: string): Promise<number> {
    const messages = this.ensure(sessionId);
    messages.push(createMessage(role, content));
    return messages.length;
  }

  async clear(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async list(): Promise<SessionSummary[]> {
    const summaries: SessionSummary[] = [];
    for (const [sessionId, messages] of this.sessions) {
      const last = messages[messages.length - 1];
      summaries.push({
        sessionId,
        messageCount: messages.length,
        lastMessagePreview: last ? previewOf(last.content) : null,
      });
    }
    return summaries;
  }

  private ensure(sessionId: string): Message[] {
    let messages = this.sessions.get(sessionId);
    if (!messages) {
      messages = [];
      this.sessions.set(sessionId, messages);
    }
    return messages;
  }
}
