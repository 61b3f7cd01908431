import { v4 as uuid } from "uuid";
import type {
  EntryPointSpec,
  Logger,
  NodeSpec,
  SessionState,
  SessionStatus,
  StateRecordPatch,
  StreamingProvider,
  WorkflowGraph,
} from "@switchyard/schemas";
import { ConnectivityError, InvalidTransitionError, SwitchyardError } from "@switchyard/schemas";
import type { Journal } from "@switchyard/journal";
import { errorMessage, silentLogger } from "@switchyard/journal";
import { SessionMemory, filterMemory } from "@switchyard/memory";
import type { StateRecordStore } from "@switchyard/memory";
import { getNode, materializeGraph, successorOf } from "@switchyard/graph";
import { ProviderRetryWrapper, abortableSleep, backoff } from "@switchyard/provider";
import type { RetryPolicy } from "@switchyard/provider";
import { OutputKeyJudge } from "./judge.js";
import type { Judge } from "./judge.js";
import { runEventLoopNode } from "./event-loop-node.js";
import type { NodeMode, NodeResult, ToolInvoker } from "./event-loop-node.js";
import { accessFor } from "./session-access.js";
import type { SessionAccess, SessionContext } from "./session-access.js";

export type ExecutionStatus = "pending" | SessionStatus;
export type ExecutionRole = SessionAccess["role"];

const VALID_TRANSITIONS: Record<ExecutionStatus, ExecutionStatus[]> = {
  pending: ["running"],
  running: ["paused", "completed", "errored", "cancelled"],
  paused: ["running", "cancelled"],
  completed: [],
  errored: [],
  cancelled: [],
};

export interface ExecutionResult {
  execution_id: string;
  session_id: string;
  role: ExecutionRole;
  status: Exclude<ExecutionStatus, "pending" | "running">;
  /** Outputs accepted by the nodes this execution ran. */
  outputs: Record<string, unknown>;
  /** Working memory at the end of the run. */
  memory: Record<string, unknown>;
  error?: { code: string; message: string };
}

export interface ExecutionStreamConfig {
  /** Source graph; the stream materializes its own effective graph from the entry point. */
  graph: WorkflowGraph;
  entryPoint: EntryPointSpec;
  session: SessionContext;
  store: StateRecordStore;
  provider: StreamingProvider;
  journal: Journal;
  /** Presence of `resume_session_id` makes this execution a guest. */
  sessionState?: SessionState;
  /** Event payload; becomes the entry message of the first node. */
  payload?: Record<string, unknown>;
  /** Node to restart from when resuming a paused or crashed run. */
  startNode?: string;
  judge?: Judge;
  toolInvoker?: ToolInvoker;
  maxIterations?: number;
  maxNodeTransitions?: number;
  connectivityRetries?: number;
  retryPolicy?: Partial<RetryPolicy>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  logger?: Logger;
  executionId?: string;
}

export function transitionMarker(entryPoint: EntryPointSpec, payload: Record<string, unknown>): string {
  return `[event ${entryPoint.id}] ${JSON.stringify(payload)}`;
}

/**
 * Per-execution coordinator. Owns the state record write policy: lifecycle
 * and progress writes go through `persist`, which only the owner variant of
 * the session access has. Guests publish accepted outputs into the shared
 * session memory, and the owner picks them up on its next write.
 */
export class ExecutionStream {
  readonly executionId: string;
  readonly graph: WorkflowGraph;
  readonly entryPoint: EntryPointSpec;
  private config: ExecutionStreamConfig;
  private access: SessionAccess;
  private provider: ProviderRetryWrapper;
  private judge: Judge;
  private logger: Logger;
  private memory: SessionMemory;
  private status: ExecutionStatus = "pending";
  private abortController = new AbortController();
  private pauseRequested = false;
  private outputs: Record<string, unknown> = {};
  private currentNode: string | null = null;
  private started = false;
  private historyFrom = 0;

  constructor(config: ExecutionStreamConfig) {
    this.config = config;
    this.executionId = config.executionId ?? uuid();
    this.entryPoint = config.entryPoint;
    this.graph = materializeGraph(config.graph, { entryNode: config.entryPoint.id });
    this.access = accessFor(config.session, config.store, config.sessionState);
    this.judge = config.judge ?? new OutputKeyJudge();
    this.logger = config.logger ?? silentLogger;
    // The owner works on the shared memory directly; a guest starts from the
    // filtered snapshot it was handed.
    this.memory = this.access.role === "owner"
      ? config.session.memory
      : new SessionMemory(config.sessionState?.memory ?? {});

    const sessionId = config.session.session_id;
    this.provider = new ProviderRetryWrapper(config.provider, {
      policy: config.retryPolicy,
      sleep: config.sleep,
      random: config.random,
      onRetry: async (notice) => {
        await config.journal.tryEmit(sessionId, "provider.retry", {
          execution_id: this.executionId, ...notice,
        });
      },
    });
  }

  get role(): ExecutionRole { return this.access.role; }
  get sessionId(): string { return this.config.session.session_id; }
  getStatus(): ExecutionStatus { return this.status; }
  memorySnapshot(): Record<string, unknown> { return this.memory.snapshot(); }

  /** Starts the run, or continues a paused one from the node it stopped at. */
  async run(): Promise<ExecutionResult> {
    if (this.status !== "pending" && this.status !== "paused") {
      throw new Error(`Execution ${this.executionId} cannot run from status "${this.status}"`);
    }
    const resumingPause = this.status === "paused";
    this.pauseRequested = false;
    this.transition("running");
    const journal = this.config.journal;

    try {
      const mode = resumingPause ? "resume" : this.initialMode();
      const startNode = resumingPause
        ? (this.currentNode ?? this.graph.entry_node)
        : (this.config.startNode ?? this.graph.entry_node);
      if (!this.started) {
        this.started = true;
        this.historyFrom = this.config.session.conversation.messageCount;
      }
      await this.lifecycleWrite({
        status: "running", current_node: startNode, paused_at: null, resume_from_checkpoint: null,
      });
      await journal.emit(this.sessionId, "execution.started", {
        execution_id: this.executionId,
        role: this.role,
        entry_point: this.entryPoint.id,
        mode,
      });
      return await this.traverse(startNode, mode);
    } catch (err) {
      return this.fail(err);
    }
  }

  /** Cooperative: takes effect between node iterations. */
  async cancel(): Promise<void> {
    this.abortController.abort();
    if (this.status === "paused") {
      this.transition("cancelled");
      await this.lifecycleWrite({ status: "cancelled", paused_at: null });
      await this.config.journal.tryEmit(this.sessionId, "execution.cancelled", {
        execution_id: this.executionId, node_id: this.currentNode,
      });
    }
  }

  /** Writes the live shared memory into the state record. Guests have nothing to write. */
  async flushMemory(): Promise<void> {
    await this.lifecycleWrite({});
  }

  /** Cooperative: the current node stops before its next iteration. */
  pause(): void {
    if (this.status === "running") this.pauseRequested = true;
  }

  private initialMode(): NodeMode {
    const state = this.config.sessionState;
    if (state?.paused_at || state?.resume_from_checkpoint || this.config.startNode !== undefined) {
      return "resume";
    }
    return state?.resume_session_id !== undefined ? "fresh_shared" : "fresh";
  }

  private async traverse(startNode: string, initialMode: NodeMode): Promise<ExecutionResult> {
    const maxTransitions = this.config.maxNodeTransitions ?? 100;
    let nodeId: string | null = startNode;
    let mode = initialMode;
    let transitions = 0;

    while (nodeId !== null) {
      if (++transitions > maxTransitions) {
        throw new Error(`Execution exceeded ${maxTransitions} node transitions`);
      }
      const node = getNode(this.graph, nodeId);
      if (!node) throw new Error(`Node "${nodeId}" is not part of graph "${this.graph.graph_id}"`);
      this.currentNode = node.id;
      await this.config.journal.emit(this.sessionId, "node.started", {
        execution_id: this.executionId, node_id: node.id, mode,
      });

      const result = await this.runNode(node, mode);
      switch (result.status) {
        case "accepted":
          this.acceptOutputs(result.outputs);
          await this.config.journal.emit(this.sessionId, "node.accepted", {
            execution_id: this.executionId, node_id: node.id, iterations: result.iterations,
          });
          nodeId = successorOf(this.graph, node.id);
          if (nodeId !== null) await this.lifecycleWrite({ current_node: nodeId });
          mode = "fresh";
          break;
        case "failed":
          await this.config.journal.tryEmit(this.sessionId, "node.failed", {
            execution_id: this.executionId, node_id: node.id, iterations: result.iterations,
            error: result.error.message,
          });
          throw result.error;
        case "cancelled":
          return this.finishCancelled();
        case "paused":
          return this.finishPaused();
      }
    }

    this.transition("completed");
    await this.lifecycleWrite({ status: "completed", current_node: null });
    await this.config.journal.emit(this.sessionId, "execution.completed", {
      execution_id: this.executionId, outputs: this.outputs,
    });
    return this.result("completed");
  }

  /** Connectivity failures re-enter the node in resume mode after backoff. */
  private async runNode(node: NodeSpec, initialMode: NodeMode): Promise<NodeResult> {
    const retries = this.config.connectivityRetries ?? 3;
    const policy = this.provider.getPolicy();
    const wait = this.config.sleep ?? abortableSleep;
    const random = this.config.random ?? Math.random;
    let mode = initialMode;

    for (let attempt = 1; ; attempt++) {
      try {
        return await runEventLoopNode({
          node,
          mode,
          conversation: this.config.session.conversation,
          provider: this.provider,
          judge: this.judge,
          inputs: node.input_keys.length > 0
            ? filterMemory(this.memory.snapshot(), node.input_keys)
            : this.memory.snapshot(),
          identityPrompt: this.graph.metadata.identity_prompt,
          conversationMode: this.graph.metadata.conversation_mode,
          historyFrom: this.historyFrom,
          entryMessage: this.entryMessage(node, mode),
          maxIterations: this.config.maxIterations,
          toolInvoker: this.config.toolInvoker,
          signal: this.abortController.signal,
          shouldPause: () => this.pauseRequested,
          onProgress: async (progress) => {
            await this.lifecycleWrite({ current_node: progress.node_id });
            await this.config.journal.emit(this.sessionId, "node.iteration", {
              execution_id: this.executionId,
              node_id: progress.node_id,
              iteration: progress.iteration,
              verdict: progress.verdict.action,
            });
          },
        });
      } catch (err) {
        if (!(err instanceof ConnectivityError) || attempt > retries) throw err;
        const delay = backoff(attempt, policy, random);
        this.logger.warn(`Connectivity lost in node "${node.id}", retrying in ${Math.round(delay)}ms`, {
          execution_id: this.executionId, attempt,
        });
        await this.config.journal.tryEmit(this.sessionId, "node.connectivity_retry", {
          execution_id: this.executionId, node_id: node.id, attempt, delay_ms: delay, kind: err.kind,
        });
        await wait(delay, this.abortController.signal);
        mode = "resume";
      }
    }
  }

  /** Only the first node of a fresh run carries the triggering event. */
  private entryMessage(node: NodeSpec, mode: NodeMode): string | undefined {
    if (mode === "resume" || node.id !== this.graph.entry_node) return undefined;
    const payload = this.config.payload ?? {};
    if (mode === "fresh_shared") return transitionMarker(this.entryPoint, payload);
    return Object.keys(payload).length > 0 ? JSON.stringify(payload) : undefined;
  }

  private acceptOutputs(outputs: Record<string, unknown>): void {
    Object.assign(this.outputs, outputs);
    this.memory.merge(outputs);
    // The owner's memory is the shared memory; it is persisted with the next write.
    if (this.access.role === "guest") this.access.session.memory.merge(outputs);
  }

  private async lifecycleWrite(patch: StateRecordPatch): Promise<void> {
    if (this.access.role !== "owner") return;
    await this.access.persist(patch);
  }

  private async finishCancelled(): Promise<ExecutionResult> {
    this.transition("cancelled");
    await this.lifecycleWrite({ status: "cancelled" });
    await this.config.journal.tryEmit(this.sessionId, "execution.cancelled", {
      execution_id: this.executionId, node_id: this.currentNode,
    });
    return this.result("cancelled");
  }

  private async finishPaused(): Promise<ExecutionResult> {
    this.transition("paused");
    await this.lifecycleWrite({
      status: "paused", paused_at: new Date().toISOString(), current_node: this.currentNode,
    });
    await this.config.journal.tryEmit(this.sessionId, "execution.paused", {
      execution_id: this.executionId, node_id: this.currentNode,
    });
    return this.result("paused");
  }

  private async fail(err: unknown): Promise<ExecutionResult> {
    const error = {
      code: err instanceof SwitchyardError ? err.code : "EXECUTION_FAILED",
      message: errorMessage(err),
    };
    if (this.status === "running") this.transition("errored");
    try {
      await this.lifecycleWrite({ status: "errored" });
    } catch (writeErr) {
      this.logger.error("Failed to record errored status", {
        execution_id: this.executionId, error: errorMessage(writeErr),
      });
    }
    await this.config.journal.tryEmit(this.sessionId, "execution.failed", {
      execution_id: this.executionId, node_id: this.currentNode, error,
    });
    return this.result("errored", error);
  }

  private result(status: ExecutionResult["status"], error?: ExecutionResult["error"]): ExecutionResult {
    return {
      execution_id: this.executionId,
      session_id: this.sessionId,
      role: this.role,
      status,
      outputs: structuredClone(this.outputs),
      memory: this.memory.snapshot(),
      ...(error ? { error } : {}),
    };
  }

  private transition(next: ExecutionStatus): void {
    const allowed = VALID_TRANSITIONS[this.status];
    if (!allowed.includes(next)) {
      throw new InvalidTransitionError(this.status, next);
    }
    this.status = next;
  }
}
