import { ConversationSession, type ConversationSnapshot } from "./session.js";

export class SessionRegistry {
  private readonly sessions = new Map<string, ConversationSession>();
  private readonly historyCapacity: number | undefined;

  constructor(historyCapacity?: number) {
    this.historyCapacity = historyCapacity;
  }

  ensure(conversationId: string): ConversationSession {
    const existing = this.sessions.get(conversationId);
    if (existing) {
      return existing;
    }
    const created = new ConversationSession(conversationId, this.historyCapacity);
    this.sessions.set(conversationId, created);
    return created;
  }

  get(conversationId: string): ConversationSession | undefined {
    return this.sessions.get(conversationId);
  }

  list(): ConversationSession[] {
    return Array.from(this.sessions.values());
  }

  snapshot(conversationId: string): ConversationSnapshot | null {
    return this.sessions.get(conversationId)?.snapshot() ?? null;
  }

  snapshots(): ConversationSnapshot[] {
    return this.list()
      .map((session) => session.snapshot())
      .sort((left, right) => left.conversationId.localeCompare(right.conversationId));
  }

  clear(): void {
    this.sessions.clear();
  }
}
