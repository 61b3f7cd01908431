import { SessionActiveError } from "@switchyard/schemas";
import type { ExecutionStream, SessionContext } from "@switchyard/kernel";

export interface ActiveSession {
  session_id: string;
  agent_id: string;
  context: SessionContext;
  owner: ExecutionStream;
  guests: Set<ExecutionStream>;
  /** Settles when a started guest has finished or failed to start. */
  pendingGuests: Set<Promise<unknown>>;
  /** Set once the owner is terminal; no further guests may join. */
  closing: boolean;
  created_at: string;
}

/**
 * Process-scoped map of agent id to its live primary session. Entries are
 * inserted when a primary trigger creates a session and removed once the
 * owning execution reaches a terminal status and its remaining guests settle.
 */
export class SessionRegistry {
  private sessions = new Map<string, ActiveSession>();

  get(agentId: string): ActiveSession | undefined {
    return this.sessions.get(agentId);
  }

  findBySession(sessionId: string): ActiveSession | undefined {
    for (const session of this.sessions.values()) {
      if (session.session_id === sessionId) return session;
    }
    return undefined;
  }

  insert(session: ActiveSession): void {
    const existing = this.sessions.get(session.agent_id);
    if (existing) throw new SessionActiveError(session.agent_id, existing.session_id);
    this.sessions.set(session.agent_id, session);
  }

  /** Removes the entry only if it still belongs to `sessionId`. */
  remove(agentId: string, sessionId: string): boolean {
    const existing = this.sessions.get(agentId);
    if (!existing || existing.session_id !== sessionId) return false;
    return this.sessions.delete(agentId);
  }

  list(): ActiveSession[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }
}
