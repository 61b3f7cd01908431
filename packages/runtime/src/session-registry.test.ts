import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { WorkflowGraph } from "@switchyard/schemas";
import { SessionActiveError } from "@switchyard/schemas";
import { Journal } from "@switchyard/journal";
import { ConversationStore, SessionMemory, StateRecordStore } from "@switchyard/memory";
import { ScriptedProvider } from "@switchyard/provider";
import { ExecutionStream } from "@switchyard/kernel";
import { SessionRegistry } from "./session-registry.js";
import type { ActiveSession } from "./session-registry.js";

const graph: WorkflowGraph = {
  graph_id: "g",
  entry_node: "start",
  nodes: [{ id: "start", input_keys: [], output_keys: ["done"] }],
  edges: [],
  metadata: { conversation_mode: "continuous", identity_prompt: "", async_entry_points: [] },
};

// Nothing here runs, so no file is ever touched.
const root = join(tmpdir(), "switchyard-registry-unused");

function activeSession(agentId: string, sessionId: string): ActiveSession {
  const context = {
    session_id: sessionId,
    agent_id: agentId,
    conversation: new ConversationStore(join(root, sessionId)),
    memory: new SessionMemory(),
  };
  const owner = new ExecutionStream({
    graph,
    entryPoint: { id: "start", kind: "primary", input_keys: [] },
    session: context,
    store: new StateRecordStore(root),
    provider: new ScriptedProvider([]),
    journal: new Journal(join(root, "journal.jsonl")),
  });
  return { session_id: sessionId, agent_id: agentId, context, owner, guests: new Set(), pendingGuests: new Set(), closing: false, created_at: "2026-01-01T00:00:00.000Z" };
}

describe("SessionRegistry", () => {
  it("holds at most one live session per agent", () => {
    const registry = new SessionRegistry();
    registry.insert(activeSession("support", "s-1"));
    expect(() => registry.insert(activeSession("support", "s-2"))).toThrow(SessionActiveError);
    expect(registry.get("support")?.session_id).toBe("s-1");
    expect(registry.size).toBe(1);
  });

  it("keeps agents independent", () => {
    const registry = new SessionRegistry();
    registry.insert(activeSession("support", "s-1"));
    registry.insert(activeSession("billing", "s-2"));
    expect(registry.list().map((s) => s.agent_id)).toEqual(["support", "billing"]);
    expect(registry.findBySession("s-2")?.agent_id).toBe("billing");
    expect(registry.findBySession("s-3")).toBeUndefined();
  });

  it("removes an entry only for the matching session", () => {
    const registry = new SessionRegistry();
    registry.insert(activeSession("support", "s-1"));
    expect(registry.remove("support", "s-old")).toBe(false);
    expect(registry.get("support")).toBeDefined();
    expect(registry.remove("support", "s-1")).toBe(true);
    expect(registry.get("support")).toBeUndefined();
    expect(registry.remove("support", "s-1")).toBe(false);
  });
});
