/**
 * Switchyard Core Types
 *
 * Canonical data models shared by every package. A session is reachable
 * from several entry points at once, so everything that crosses a package
 * boundary is declared here.
 */

// ─── Session ────────────────────────────────────────────────────────

export type SessionStatus =
  | "running"
  | "paused"
  | "completed"
  | "errored"
  | "cancelled";

export const TERMINAL_STATUSES: readonly SessionStatus[] = ["completed", "errored", "cancelled"];

export interface StateRecord {
  session_id: string;
  agent_id: string;
  status: SessionStatus;
  memory: Record<string, unknown>;
  conversation_ref: string;
  current_node: string | null;
  paused_at: string | null;
  resume_from_checkpoint: string | null;
  created_at: string;
  updated_at: string;
}

/** Fields an owning execution may change on a persist call. */
export type StateRecordPatch = Partial<
  Pick<StateRecord, "status" | "memory" | "current_node" | "paused_at" | "resume_from_checkpoint">
>;

/**
 * What a new execution inherits from an existing session. Presence of
 * `resume_session_id` makes the execution a guest of that session.
 */
export interface SessionState {
  resume_session_id?: string;
  memory: Record<string, unknown>;
  paused_at?: string | null;
  resume_from_checkpoint?: string | null;
}

// ─── Conversation ───────────────────────────────────────────────────

export type MessageRole = "system" | "user" | "assistant" | "tool";

export interface ToolCallRecord {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ConversationMessage {
  seq: number;
  role: MessageRole;
  content: string;
  tool_calls?: ToolCallRecord[];
  tool_call_id?: string;
  created_at: string;
  hash_prev?: string;
}

export type NewMessage = Omit<ConversationMessage, "seq" | "created_at" | "hash_prev">;

export interface Cursor {
  node_id: string | null;
  iteration_count: number;
  output_accumulator: Record<string, unknown>;
  updated_at: string;
}

export interface ConversationCheckpoint {
  name: string;
  message_count: number;
  cursor: Cursor | null;
  created_at: string;
}

// ─── Workflow Graph ─────────────────────────────────────────────────

export type EntryPointKind = "primary" | "async";

export interface EntryPointSpec {
  id: string;
  kind: EntryPointKind;
  input_keys: string[];
}

export type ConversationMode = "continuous" | "isolated";

export interface GraphMetadata {
  conversation_mode: ConversationMode;
  identity_prompt: string;
  async_entry_points: EntryPointSpec[];
}

export interface NodeSpec {
  id: string;
  description?: string;
  system_prompt?: string;
  input_keys: string[];
  output_keys: string[];
  max_iterations?: number;
}

export interface EdgeSpec {
  source: string;
  target: string;
}

export interface WorkflowGraph {
  graph_id: string;
  entry_node: string;
  nodes: NodeSpec[];
  edges: EdgeSpec[];
  metadata: GraphMetadata;
}

// ─── Provider Stream ────────────────────────────────────────────────

export type ProviderErrorKind =
  | "rate_limit"
  | "connection"
  | "internal_server"
  | "provider_connection"
  | "authentication"
  | "invalid_request"
  | "unknown";

export const TRANSIENT_ERROR_KINDS: readonly ProviderErrorKind[] = [
  "rate_limit", "connection", "internal_server", "provider_connection",
];

export interface ProviderRequest {
  node_id: string;
  system: string;
  messages: ConversationMessage[];
  output_keys: string[];
}

/** Raw output of the underlying model client, before retry handling. */
export type ProviderChunk =
  | { type: "text"; text: string }
  | { type: "tool_call"; call: ToolCallRecord };

export interface StreamingProvider {
  stream(request: ProviderRequest, signal?: AbortSignal): AsyncIterable<ProviderChunk>;
}

export type StreamEvent =
  | { type: "content_delta"; text: string }
  | { type: "tool_call"; call: ToolCallRecord }
  | { type: "recoverable_error"; kind: ProviderErrorKind; message: string; attempts: number }
  | { type: "fatal_error"; kind: ProviderErrorKind; message: string }
  | { type: "done" };

// ─── Journal Events ─────────────────────────────────────────────────

export type JournalEventType =
  | "session.created"
  | "session.resumed"
  | "session.closed"
  | "execution.started"
  | "execution.completed"
  | "execution.failed"
  | "execution.cancelled"
  | "execution.paused"
  | "node.started"
  | "node.iteration"
  | "node.accepted"
  | "node.failed"
  | "node.connectivity_retry"
  | "provider.retry"
  | "trigger.received"
  | "trigger.rejected";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  session_id: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}

// ─── Logging ────────────────────────────────────────────────────────

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}
