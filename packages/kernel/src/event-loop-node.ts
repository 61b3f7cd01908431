import type {
  ConversationMode,
  Cursor,
  NodeSpec,
  ProviderErrorKind,
  SwitchyardError,
  ToolCallRecord,
} from "@switchyard/schemas";
import {
  ConnectivityError,
  IterationsExhaustedError,
  ProviderFatalError,
} from "@switchyard/schemas";
import { emptyCursor } from "@switchyard/memory";
import type { ConversationStore } from "@switchyard/memory";
import type { ProviderRetryWrapper } from "@switchyard/provider";
import type { Judge, JudgeVerdict } from "./judge.js";
import { missingOutputs } from "./judge.js";

export const SET_OUTPUT_TOOL = "set_output";
export const DEFAULT_MAX_ITERATIONS = 50;

/**
 * - `fresh`: new cursor for this node.
 * - `resume`: restore the stored cursor when it belongs to this node.
 * - `fresh_shared`: a new event on a shared session; the cursor is reset and a
 *   transition marker is appended before the first provider call.
 */
export type NodeMode = "fresh" | "resume" | "fresh_shared";

export interface ToolInvoker {
  invoke(call: ToolCallRecord, signal?: AbortSignal): Promise<string>;
}

export interface NodeProgress {
  node_id: string;
  iteration: number;
  accumulator: Record<string, unknown>;
  verdict: JudgeVerdict;
}

export interface EventLoopNodeContext {
  node: NodeSpec;
  mode: NodeMode;
  conversation: ConversationStore;
  provider: ProviderRetryWrapper;
  judge: Judge;
  /** Values the node may read, already restricted to what it is allowed to see. */
  inputs: Record<string, unknown>;
  identityPrompt?: string;
  conversationMode?: ConversationMode;
  /** First message seq visible to the provider in `isolated` conversation mode. */
  historyFrom?: number;
  /** Appended before streaming in `fresh` and `fresh_shared` modes. Required for `fresh_shared`. */
  entryMessage?: string;
  maxIterations?: number;
  toolInvoker?: ToolInvoker;
  signal?: AbortSignal;
  shouldPause?: () => boolean;
  onProgress?: (progress: NodeProgress) => Promise<void>;
}

export type NodeResult =
  | { status: "accepted"; node_id: string; outputs: Record<string, unknown>; iterations: number }
  | { status: "failed"; node_id: string; error: SwitchyardError; iterations: number }
  | { status: "cancelled"; node_id: string; iterations: number }
  | { status: "paused"; node_id: string; iterations: number };

interface StreamOutcome {
  response: string;
  toolCalls: ToolCallRecord[];
  recoverable: { kind: ProviderErrorKind; message: string } | null;
  fatal: { kind: ProviderErrorKind; message: string } | null;
}

async function initCursor(ctx: EventLoopNodeContext): Promise<Cursor> {
  const { node, mode, conversation } = ctx;
  if (mode === "resume") {
    const stored = await conversation.readCursor();
    return stored !== null && stored.node_id === node.id ? stored : emptyCursor(node.id);
  }
  if (mode === "fresh_shared" && ctx.entryMessage === undefined) {
    throw new Error(`Node "${node.id}" started on a shared session without a transition marker`);
  }
  const cursor = await conversation.resetCursor(node.id);
  if (ctx.entryMessage !== undefined) {
    await conversation.append({ role: "user", content: ctx.entryMessage });
  }
  return cursor;
}

export function buildSystemPrompt(
  node: NodeSpec,
  inputs: Record<string, unknown>,
  identityPrompt = "",
): string {
  const parts: string[] = [];
  if (identityPrompt) parts.push(identityPrompt);
  if (node.system_prompt) parts.push(node.system_prompt);
  if (Object.keys(inputs).length > 0) {
    parts.push(`Inputs:\n${JSON.stringify(inputs, null, 2)}`);
  }
  if (node.output_keys.length > 0) {
    parts.push(`Record each of these outputs with the ${SET_OUTPUT_TOOL} tool: ${node.output_keys.join(", ")}`);
  }
  return parts.join("\n\n");
}

async function streamOnce(ctx: EventLoopNodeContext, system: string): Promise<StreamOutcome> {
  const messages = await ctx.conversation.replay(
    ctx.conversationMode === "isolated" ? { fromSeq: ctx.historyFrom ?? 0 } : {},
  );
  const outcome: StreamOutcome = { response: "", toolCalls: [], recoverable: null, fatal: null };
  const request = { node_id: ctx.node.id, system, messages, output_keys: [...ctx.node.output_keys] };
  for await (const event of ctx.provider.stream(request, ctx.signal)) {
    switch (event.type) {
      case "content_delta":
        outcome.response += event.text;
        break;
      case "tool_call":
        outcome.toolCalls.push(event.call);
        break;
      case "recoverable_error":
        outcome.recoverable = { kind: event.kind, message: event.message };
        break;
      case "fatal_error":
        outcome.fatal = { kind: event.kind, message: event.message };
        break;
      case "done":
        break;
    }
  }
  return outcome;
}

async function handleToolCall(
  ctx: EventLoopNodeContext,
  call: ToolCallRecord,
  accumulator: Record<string, unknown>,
): Promise<string> {
  if (call.name === SET_OUTPUT_TOOL) {
    const key = call.input["key"];
    if (typeof key !== "string" || !ctx.node.output_keys.includes(key)) {
      return `Error: "${String(key)}" is not an output of node "${ctx.node.id}"`;
    }
    accumulator[key] = call.input["value"];
    return `Recorded ${key}`;
  }
  if (!ctx.toolInvoker) return `Error: tool "${call.name}" is not available`;
  try {
    return await ctx.toolInvoker.invoke(call, ctx.signal);
  } catch (err) {
    return `Error: ${err instanceof Error ? err.message : String(err)}`;
  }
}

/**
 * Runs one workflow node as a bounded loop of stream, judge and maybe retry.
 *
 * Throws `ConnectivityError` when every provider attempt failed transiently and
 * nothing was produced; that case does not consume an iteration and is left to
 * the caller's backoff. Every other failure is returned as a `failed` result.
 */
export async function runEventLoopNode(ctx: EventLoopNodeContext): Promise<NodeResult> {
  const { node, conversation } = ctx;
  const maxIterations = node.max_iterations ?? ctx.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const cursor = await initCursor(ctx);
  const accumulator: Record<string, unknown> = { ...cursor.output_accumulator };
  let iteration = cursor.iteration_count;
  const system = buildSystemPrompt(node, ctx.inputs, ctx.identityPrompt);

  while (iteration < maxIterations) {
    if (ctx.signal?.aborted) return { status: "cancelled", node_id: node.id, iterations: iteration };
    if (ctx.shouldPause?.()) return { status: "paused", node_id: node.id, iterations: iteration };

    const outcome = await streamOnce(ctx, system);
    if (ctx.signal?.aborted) return { status: "cancelled", node_id: node.id, iterations: iteration };

    if (outcome.fatal) {
      return {
        status: "failed",
        node_id: node.id,
        error: new ProviderFatalError(node.id, outcome.fatal.kind, outcome.fatal.message),
        iterations: iteration,
      };
    }
    if (outcome.recoverable && outcome.response === "" && outcome.toolCalls.length === 0) {
      throw new ConnectivityError(node.id, outcome.recoverable.kind, outcome.recoverable.message);
    }

    await conversation.append({
      role: "assistant",
      content: outcome.response,
      ...(outcome.toolCalls.length > 0 ? { tool_calls: outcome.toolCalls } : {}),
    });
    for (const call of outcome.toolCalls) {
      const result = await handleToolCall(ctx, call, accumulator);
      await conversation.append({ role: "tool", content: result, tool_call_id: call.id });
    }

    iteration++;
    const verdict = await ctx.judge.evaluate({
      node,
      accumulator,
      response: outcome.response,
      toolCallCount: outcome.toolCalls.length,
    });
    await conversation.writeCursor({
      node_id: node.id,
      iteration_count: iteration,
      output_accumulator: accumulator,
      updated_at: new Date().toISOString(),
    });
    await ctx.onProgress?.({ node_id: node.id, iteration, accumulator: structuredClone(accumulator), verdict });

    if (verdict.action === "accept") {
      return { status: "accepted", node_id: node.id, outputs: structuredClone(accumulator), iterations: iteration };
    }
    await conversation.append({ role: "user", content: verdict.feedback });
  }

  return {
    status: "failed",
    node_id: node.id,
    error: new IterationsExhaustedError(node.id, maxIterations, missingOutputs(node, accumulator)),
    iterations: iteration,
  };
}
