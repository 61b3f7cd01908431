import { v4 as uuid } from "uuid";
import type {
  ConversationCheckpoint,
  EntryPointSpec,
  JournalEvent,
  Logger,
  SessionState,
  StreamingProvider,
  WorkflowGraph,
} from "@switchyard/schemas";
import {
  InvalidTransitionError,
  NoPrimarySessionError,
  SessionActiveError,
  SessionNotFoundError,
  TERMINAL_STATUSES,
} from "@switchyard/schemas";
import type { Journal } from "@switchyard/journal";
import { errorMessage, silentLogger } from "@switchyard/journal";
import { ConversationStore, SessionMemory, StateRecordStore, filterMemory } from "@switchyard/memory";
import { loadGraph, resolveEntryPoint } from "@switchyard/graph";
import { ExecutionStream } from "@switchyard/kernel";
import type {
  ExecutionResult,
  ExecutionRole,
  ExecutionStreamConfig,
  Judge,
  SessionContext,
  ToolInvoker,
} from "@switchyard/kernel";
import type { RuntimeConfig } from "./config.js";
import type { EventRouter, RoutableEvent } from "./event-router.js";
import { SessionRegistry } from "./session-registry.js";
import type { ActiveSession } from "./session-registry.js";

export type RoutedJournalEvent = JournalEvent & RoutableEvent;

export interface AgentRuntimeOptions {
  agentId: string;
  /** Validated on construction. */
  graph: unknown;
  provider: StreamingProvider;
  journal: Journal;
  storageRoot: string;
  registry?: SessionRegistry;
  config?: Partial<Omit<RuntimeConfig, "storageRoot" | "journalPath" | "journalFsync">>;
  judge?: Judge;
  toolInvoker?: ToolInvoker;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  logger?: Logger;
  /** Delivers this runtime's journal events to `uiExecutorId`. */
  router?: EventRouter<RoutedJournalEvent>;
  uiExecutorId?: string;
}

export interface ExecutionHandle {
  execution_id: string;
  session_id: string;
  role: ExecutionRole;
  entry_point: EntryPointSpec;
  done: Promise<ExecutionResult>;
  cancel(): Promise<void>;
  pause(): void;
}

export interface ActiveSessionInfo {
  session_id: string;
  agent_id: string;
  owner_execution_id: string;
  owner_status: string;
  guest_count: number;
  created_at: string;
}

export interface ResumeOptions {
  /** Restore the cursor recorded by this conversation checkpoint. */
  checkpoint?: string;
}

/**
 * Entry point for triggers. A primary trigger creates the agent's session and
 * runs as its owner; async triggers join that session as guests with memory
 * restricted to their declared input keys.
 */
export class AgentRuntime {
  readonly agentId: string;
  readonly graph: WorkflowGraph;
  private options: AgentRuntimeOptions;
  private store: StateRecordStore;
  private registry: SessionRegistry;
  private logger: Logger;
  private inflight = new Map<string, Promise<ExecutionResult>>();
  private knownSessions = new Set<string>();
  private unsubscribe: (() => void) | null = null;

  constructor(options: AgentRuntimeOptions) {
    this.options = options;
    this.agentId = options.agentId;
    this.graph = loadGraph(options.graph);
    this.store = new StateRecordStore(options.storageRoot);
    this.registry = options.registry ?? new SessionRegistry();
    this.logger = options.logger ?? silentLogger;

    const { router, uiExecutorId } = options;
    if (router && uiExecutorId) {
      this.unsubscribe = options.journal.on((event) => {
        if (!this.knownSessions.has(event.session_id)) return;
        router.route({ ...event, target: uiExecutorId }).catch((err: unknown) => {
          this.logger.error("event routing failed", { type: event.type, error: errorMessage(err) });
        });
      });
    }
  }

  getStore(): StateRecordStore {
    return this.store;
  }

  async trigger(
    entryPointId: string,
    payload: Record<string, unknown> = {},
  ): Promise<ExecutionHandle> {
    const entry = resolveEntryPoint(this.graph, entryPointId);
    return entry.kind === "primary"
      ? this.startPrimary(entry, payload)
      : this.startGuest(entry, payload);
  }

  /**
   * Continues a session's owner execution. A paused owner still held by this
   * runtime picks up where it stopped; otherwise the owner is rebuilt from the
   * persisted state record.
   */
  async resume(sessionId: string, options: ResumeOptions = {}): Promise<ExecutionHandle> {
    const active = this.registry.get(this.agentId);
    if (active) {
      const resumable = active.session_id === sessionId
        && active.owner.getStatus() === "paused"
        && options.checkpoint === undefined;
      if (!resumable) throw new SessionActiveError(this.agentId, active.session_id);
      await this.options.journal.emit(sessionId, "session.resumed", {
        agent_id: this.agentId, from_status: "paused", current_node: null, checkpoint: null,
      });
      return this.launch(active.owner, active);
    }

    const record = await this.store.read(sessionId);
    if (!record) throw new SessionNotFoundError(sessionId);
    if (TERMINAL_STATUSES.includes(record.status)) {
      throw new InvalidTransitionError(record.status, "running");
    }

    const context = this.sessionContext(sessionId, record.agent_id, record.memory);
    await context.conversation.init();

    let startNode = record.current_node ?? undefined;
    const checkpointName = options.checkpoint ?? record.resume_from_checkpoint ?? undefined;
    if (checkpointName !== undefined) {
      const checkpoint = await context.conversation.readCheckpoint(checkpointName);
      if (!checkpoint) throw new Error(`Unknown conversation checkpoint: ${checkpointName}`);
      if (checkpoint.cursor) {
        await context.conversation.writeCursor(checkpoint.cursor);
        startNode = checkpoint.cursor.node_id ?? startNode;
      }
    }

    const sessionState: SessionState = {
      memory: record.memory,
      paused_at: record.paused_at,
      resume_from_checkpoint: checkpointName ?? null,
    };
    const entry = resolveEntryPoint(this.graph, this.graph.entry_node);
    const owner = this.createStream(context, entry, {}, sessionState, startNode);
    const session = this.register(context, owner);
    try {
      await this.options.journal.emit(sessionId, "session.resumed", {
        agent_id: this.agentId,
        from_status: record.status,
        current_node: startNode ?? null,
        checkpoint: checkpointName ?? null,
      });
    } catch (err) {
      this.unregister(session);
      throw err;
    }
    return this.launch(owner, session);
  }

  /** Records a named checkpoint of the active session's conversation. */
  async checkpoint(name: string): Promise<ConversationCheckpoint> {
    const active = this.registry.get(this.agentId);
    if (!active) throw new NoPrimarySessionError(this.agentId, "checkpoint");
    return active.context.conversation.checkpoint(name);
  }

  activeSession(): ActiveSessionInfo | null {
    const active = this.registry.get(this.agentId);
    if (!active) return null;
    return {
      session_id: active.session_id,
      agent_id: active.agent_id,
      owner_execution_id: active.owner.executionId,
      owner_status: active.owner.getStatus(),
      guest_count: active.guests.size,
      created_at: active.created_at,
    };
  }

  /** Cancels every execution this runtime started and waits for them to settle. */
  async close(): Promise<void> {
    const active = this.registry.get(this.agentId);
    if (active) {
      for (const guest of active.guests) await guest.cancel();
      await active.owner.cancel();
    }
    await Promise.allSettled([...this.inflight.values()]);
    if (active) await this.closeSession(active, "runtime closed");
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  private async startPrimary(entry: EntryPointSpec, payload: Record<string, unknown>): Promise<ExecutionHandle> {
    const existing = this.registry.get(this.agentId);
    if (existing) {
      await this.options.journal.tryEmit(existing.session_id, "trigger.rejected", {
        entry_point: entry.id, reason: "primary session already active",
      });
      throw new SessionActiveError(this.agentId, existing.session_id);
    }

    // Registered before the first await so a concurrent primary trigger is rejected.
    const sessionId = uuid();
    const context = this.sessionContext(sessionId, this.agentId, payload);
    const owner = this.createStream(context, entry, payload);
    const session = this.register(context, owner);

    try {
      await context.conversation.init();
      await this.options.journal.emit(sessionId, "session.created", {
        agent_id: this.agentId, graph_id: this.graph.graph_id, entry_point: entry.id,
      });
      await this.options.journal.emit(sessionId, "trigger.received", {
        entry_point: entry.id, kind: entry.kind, execution_id: owner.executionId, payload,
      });
    } catch (err) {
      this.unregister(session);
      throw err;
    }
    return this.launch(owner, session);
  }

  private async startGuest(entry: EntryPointSpec, payload: Record<string, unknown>): Promise<ExecutionHandle> {
    const session = this.registry.get(this.agentId);
    if (!session || session.closing) {
      this.logger.warn(`Rejected trigger "${entry.id}": no active primary session`, { agent_id: this.agentId });
      throw new NoPrimarySessionError(this.agentId, entry.id);
    }

    // The live shared memory is what the owner persists on its next write.
    const sessionState: SessionState = {
      resume_session_id: session.session_id,
      memory: filterMemory(session.context.memory.snapshot(), entry.input_keys),
    };
    const guest = this.createStream(session.context, entry, payload, sessionState);
    session.guests.add(guest);
    const started = this.announceGuest(session, guest, payload);
    // The caller sees a failed start through `started`; this only tracks settling.
    const pending: Promise<unknown> = started
      .then((handle) => handle.done)
      .catch(() => undefined)
      .finally(() => session.pendingGuests.delete(pending));
    session.pendingGuests.add(pending);
    return started;
  }

  private async announceGuest(
    session: ActiveSession,
    guest: ExecutionStream,
    payload: Record<string, unknown>,
  ): Promise<ExecutionHandle> {
    const entry = guest.entryPoint;
    try {
      await this.options.journal.emit(session.session_id, "trigger.received", {
        entry_point: entry.id,
        kind: entry.kind,
        execution_id: guest.executionId,
        input_keys: entry.input_keys,
        payload,
      });
    } catch (err) {
      session.guests.delete(guest);
      throw err;
    }
    return this.launch(guest, session);
  }

  private sessionContext(sessionId: string, agentId: string, memory: Record<string, unknown>): SessionContext {
    return {
      session_id: sessionId,
      agent_id: agentId,
      conversation: new ConversationStore(this.store.sessionDir(sessionId)),
      memory: new SessionMemory(memory),
    };
  }

  private createStream(
    session: SessionContext,
    entryPoint: EntryPointSpec,
    payload: Record<string, unknown>,
    sessionState?: SessionState,
    startNode?: string,
  ): ExecutionStream {
    const { config = {} } = this.options;
    const streamConfig: ExecutionStreamConfig = {
      graph: this.graph,
      entryPoint,
      session,
      store: this.store,
      provider: this.options.provider,
      journal: this.options.journal,
      sessionState,
      payload,
      startNode,
      judge: this.options.judge,
      toolInvoker: this.options.toolInvoker,
      maxIterations: config.maxIterations,
      maxNodeTransitions: config.maxNodeTransitions,
      connectivityRetries: config.connectivityRetries,
      retryPolicy: config.retry,
      sleep: this.options.sleep,
      random: this.options.random,
      logger: this.logger,
    };
    return new ExecutionStream(streamConfig);
  }

  private register(context: SessionContext, owner: ExecutionStream): ActiveSession {
    const session: ActiveSession = {
      session_id: context.session_id,
      agent_id: this.agentId,
      context,
      owner,
      guests: new Set(),
      pendingGuests: new Set(),
      closing: false,
      created_at: new Date().toISOString(),
    };
    this.registry.insert(session);
    this.knownSessions.add(context.session_id);
    return session;
  }

  private unregister(session: ActiveSession): void {
    this.registry.remove(session.agent_id, session.session_id);
    this.knownSessions.delete(session.session_id);
  }

  private launch(stream: ExecutionStream, session: ActiveSession): ExecutionHandle {
    const done = stream.run()
      .then(async (result) => {
        await this.settle(stream, session, result);
        return result;
      })
      .finally(() => this.inflight.delete(stream.executionId));
    this.inflight.set(stream.executionId, done);
    return {
      execution_id: stream.executionId,
      session_id: session.session_id,
      role: stream.role,
      entry_point: stream.entryPoint,
      done,
      cancel: () => stream.cancel(),
      pause: () => stream.pause(),
    };
  }

  private async settle(stream: ExecutionStream, session: ActiveSession, result: ExecutionResult): Promise<void> {
    if (stream.role === "guest") {
      session.guests.delete(stream);
      return;
    }
    if (result.status !== "paused") {
      session.closing = true;
      await this.drainGuests(session);
      await this.closeSession(session, result.status);
    }
  }

  /** Waits for guests still running and persists what they merged into the shared memory. */
  private async drainGuests(session: ActiveSession): Promise<void> {
    while (session.pendingGuests.size > 0) {
      await Promise.allSettled([...session.pendingGuests]);
    }
    try {
      await session.owner.flushMemory();
    } catch (err) {
      this.logger.error("Failed to persist guest outputs", {
        session_id: session.session_id, error: errorMessage(err),
      });
    }
  }

  private async closeSession(session: ActiveSession, reason: string): Promise<void> {
    if (!this.registry.remove(session.agent_id, session.session_id)) return;
    await this.options.journal.tryEmit(session.session_id, "session.closed", {
      agent_id: session.agent_id, reason,
    });
  }
}
