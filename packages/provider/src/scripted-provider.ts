import type { ProviderChunk, ProviderRequest, StreamingProvider } from "@switchyard/schemas";

export interface ScriptedTurn {
  chunks?: ProviderChunk[];
  /** Thrown after `chunks` have been streamed. */
  error?: unknown;
  /** The turn does not start streaming until this settles. */
  hold?: Promise<unknown>;
}

export type Script = ScriptedTurn[] | Record<string, ScriptedTurn[]>;

/**
 * Deterministic in-process provider. Plays scripted turns in order, either
 * from one queue or from a queue per node id, and records every request.
 */
export class ScriptedProvider implements StreamingProvider {
  readonly requests: ProviderRequest[] = [];
  private queues: Map<string, ScriptedTurn[]>;
  private shared: ScriptedTurn[] | null;
  private fallback?: ScriptedTurn;

  constructor(script: Script, options: { fallback?: ScriptedTurn } = {}) {
    if (Array.isArray(script)) {
      this.shared = [...script];
      this.queues = new Map();
    } else {
      this.shared = null;
      this.queues = new Map(Object.entries(script).map(([node, turns]) => [node, [...turns]]));
    }
    this.fallback = options.fallback;
  }

  remaining(nodeId?: string): number {
    if (this.shared) return this.shared.length;
    return nodeId ? (this.queues.get(nodeId)?.length ?? 0) : 0;
  }

  async *stream(request: ProviderRequest, signal?: AbortSignal): AsyncGenerator<ProviderChunk, void, undefined> {
    this.requests.push(structuredClone(request));
    const queue = this.shared ?? this.queues.get(request.node_id);
    const turn = queue?.shift() ?? this.fallback;
    if (!turn) {
      throw new Error(`ScriptedProvider: no turn left for node "${request.node_id}"`);
    }
    if (turn.hold) await turn.hold;
    for (const chunk of turn.chunks ?? []) {
      if (signal?.aborted) return;
      yield chunk;
    }
    if (turn.error !== undefined) throw turn.error;
  }
}

export function text(value: string): ProviderChunk {
  return { type: "text", text: value };
}

let callCounter = 0;

/** A `set_output` tool call, the way nodes publish declared outputs. */
export function setOutput(key: string, value: unknown): ProviderChunk {
  callCounter++;
  return { type: "tool_call", call: { id: `call_${callCounter}`, name: "set_output", input: { key, value } } };
}
