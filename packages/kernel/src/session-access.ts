import type { SessionState, StateRecord, StateRecordPatch } from "@switchyard/schemas";
import type { ConversationStore, SessionMemory, StateRecordStore } from "@switchyard/memory";

/** The in-process handles every execution of one session shares. */
export interface SessionContext {
  session_id: string;
  agent_id: string;
  conversation: ConversationStore;
  memory: SessionMemory;
}

/**
 * Write access to the session's state record. Only an execution started
 * without `resume_session_id` is handed one of these.
 */
export class OwnerAccess {
  readonly role = "owner" as const;
  readonly session: SessionContext;
  private store: StateRecordStore;
  private current: StateRecord | null = null;

  constructor(session: SessionContext, store: StateRecordStore) {
    this.session = session;
    this.store = store;
  }

  async read(): Promise<StateRecord | null> {
    this.current ??= await this.store.read(this.session.session_id);
    return this.current;
  }

  /**
   * Writes the state record. Memory defaults to the shared session memory,
   * which carries whatever guests have published since the last write.
   */
  async persist(patch: StateRecordPatch = {}): Promise<StateRecord> {
    const previous = await this.read();
    const now = new Date().toISOString();
    const record: StateRecord = {
      session_id: this.session.session_id,
      agent_id: this.session.agent_id,
      status: patch.status ?? previous?.status ?? "running",
      memory: patch.memory ?? this.session.memory.snapshot(),
      conversation_ref: this.session.conversation.conversationRef,
      current_node: patch.current_node !== undefined ? patch.current_node : previous?.current_node ?? null,
      paused_at: patch.paused_at !== undefined ? patch.paused_at : previous?.paused_at ?? null,
      resume_from_checkpoint: patch.resume_from_checkpoint !== undefined
        ? patch.resume_from_checkpoint
        : previous?.resume_from_checkpoint ?? null,
      created_at: previous?.created_at ?? now,
      updated_at: now,
    };
    await this.store.write(record);
    this.current = record;
    return record;
  }
}

/** Shares the session's memory and conversation. Has no state record write path. */
export class GuestAccess {
  readonly role = "guest" as const;
  readonly session: SessionContext;

  constructor(session: SessionContext) {
    this.session = session;
  }
}

export type SessionAccess = OwnerAccess | GuestAccess;

export function accessFor(
  session: SessionContext,
  store: StateRecordStore,
  state?: SessionState,
): SessionAccess {
  if (state?.resume_session_id !== undefined) return new GuestAccess(session);
  return new OwnerAccess(session, store);
}
