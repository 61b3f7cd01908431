import { describe, it, expect } from "vitest";
import { v4 as uuid } from "uuid";
import {
  validateGraphData,
  validateStateRecordData,
  validateJournalEventData,
} from "./validator.js";

describe("validateGraphData", () => {
  const validGraph = () => ({
    graph_id: "support-agent",
    entry_node: "intake",
    nodes: [
      { id: "intake", input_keys: [], output_keys: ["ticket"] },
      { id: "on-webhook", input_keys: ["ticket"], output_keys: ["status"] },
    ],
    edges: [],
    metadata: {
      conversation_mode: "continuous",
      identity_prompt: "You are a support agent.",
      async_entry_points: [{ id: "on-webhook", kind: "async", input_keys: ["ticket"] }],
    },
  });

  it("accepts a valid graph", () => {
    const result = validateGraphData(validGraph());
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it("rejects a graph without nodes", () => {
    const graph = { ...validGraph(), nodes: [] };
    const result = validateGraphData(graph);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("/nodes: must NOT have fewer than 1 items");
  });

  it("rejects an unknown conversation mode", () => {
    const graph = validGraph();
    const result = validateGraphData({ ...graph, metadata: { ...graph.metadata, conversation_mode: "forked" } });
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toMatch(/^\/metadata\/conversation_mode:/);
  });

  it("rejects an entry point with an invalid kind", () => {
    const graph = validGraph();
    const result = validateGraphData({
      ...graph,
      metadata: { ...graph.metadata, async_entry_points: [{ id: "on-webhook", kind: "cron", input_keys: [] }] },
    });
    expect(result.valid).toBe(false);
  });

  it("rejects unknown node properties", () => {
    const graph = validGraph();
    const result = validateGraphData({
      ...graph,
      nodes: [{ id: "intake", input_keys: [], output_keys: [], retries: 3 }],
    });
    expect(result.valid).toBe(false);
  });
});

describe("validateStateRecordData", () => {
  const now = new Date().toISOString();
  const record = () => ({
    session_id: uuid(),
    agent_id: "support-agent",
    status: "running",
    memory: { ticket: "T-1" },
    conversation_ref: "/tmp/messages.jsonl",
    current_node: "intake",
    paused_at: null,
    resume_from_checkpoint: null,
    created_at: now,
    updated_at: now,
  });

  it("accepts a valid record", () => {
    expect(validateStateRecordData(record()).valid).toBe(true);
  });

  it("rejects an unknown status", () => {
    const result = validateStateRecordData({ ...record(), status: "failed" });
    expect(result.valid).toBe(false);
  });

  it("rejects a malformed timestamp", () => {
    const result = validateStateRecordData({ ...record(), updated_at: "yesterday" });
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toMatch(/^\/updated_at:/);
  });

  it("requires nullable fields to be present", () => {
    const { paused_at: _omitted, ...rest } = record();
    expect(validateStateRecordData(rest).valid).toBe(false);
  });
});

describe("validateJournalEventData", () => {
  it("accepts a valid event", () => {
    const result = validateJournalEventData({
      event_id: uuid(),
      timestamp: new Date().toISOString(),
      session_id: "sess-1",
      type: "execution.started",
      payload: {},
      seq: 0,
    });
    expect(result.valid).toBe(true);
  });

  it("rejects an unknown event type", () => {
    const result = validateJournalEventData({
      event_id: uuid(),
      timestamp: new Date().toISOString(),
      session_id: "sess-1",
      type: "plan.accepted",
      payload: {},
    });
    expect(result.valid).toBe(false);
  });
});
