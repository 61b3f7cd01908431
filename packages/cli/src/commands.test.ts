import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import type { StateRecord } from "@switchyard/schemas";
import { Journal, silentLogger } from "@switchyard/journal";
import { ConversationStore, StateRecordStore } from "@switchyard/memory";
import { loadRuntimeConfig } from "@switchyard/runtime";
import type { RuntimeConfig } from "@switchyard/runtime";
import {
  buildProgram,
  eventsCommand,
  inspectCommand,
  loadGraphFile,
  replayCommand,
  sessionsCommand,
  validateCommand,
} from "./commands.js";
import type { CliOutput } from "./commands.js";

const GRAPH_YAML = `
graph_id: support-agent
entry_node: intake
nodes:
  - id: intake
    input_keys: [customer_id]
    output_keys: [ticket]
  - id: classify
    input_keys: [ticket]
    output_keys: [category]
  - id: on_email
    input_keys: [customer_id]
    output_keys: [ticket]
edges:
  - { source: intake, target: classify }
  - { source: on_email, target: classify }
metadata:
  conversation_mode: continuous
  identity_prompt: You are a support agent.
  async_entry_points:
    - { id: on_email, kind: async, input_keys: [customer_id] }
`;

const CYCLIC_GRAPH = {
  graph_id: "cyclic",
  entry_node: "a",
  nodes: [
    { id: "a", input_keys: [], output_keys: [] },
    { id: "b", input_keys: [], output_keys: [] },
    { id: "c", input_keys: [], output_keys: [] },
  ],
  edges: [
    { source: "b", target: "c" },
    { source: "c", target: "b" },
  ],
  metadata: { conversation_mode: "continuous", identity_prompt: "", async_entry_points: [] },
};

function capture(): CliOutput & { lines: string[]; errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  return { lines, errors, out: (line) => lines.push(line), err: (line) => errors.push(line) };
}

describe("cli commands", () => {
  let root: string;
  let config: RuntimeConfig;
  let store: StateRecordStore;

  const writeRecord = async (overrides: Partial<StateRecord> = {}): Promise<StateRecord> => {
    const record: StateRecord = {
      session_id: "s-1",
      agent_id: "support",
      status: "paused",
      memory: { customer_id: "c-1" },
      conversation_ref: join(store.sessionDir("s-1"), "conversation", "messages.jsonl"),
      current_node: "intake",
      paused_at: "2026-03-01T10:00:00.000Z",
      resume_from_checkpoint: null,
      created_at: "2026-03-01T09:59:00.000Z",
      updated_at: "2026-03-01T10:00:00.000Z",
      ...overrides,
    };
    await store.write(record);
    return record;
  };

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "switchyard-cli-"));
    config = loadRuntimeConfig({ SWITCHYARD_STORAGE_ROOT: root });
    store = new StateRecordStore(config.storageRoot);
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await rm(root, { recursive: true, force: true });
  });

  describe("validate", () => {
    it("loads YAML graphs", async () => {
      const file = join(root, "graph.yaml");
      await writeFile(file, GRAPH_YAML, "utf-8");
      const graph = await loadGraphFile(file);
      expect(graph).toMatchObject({ graph_id: "support-agent", entry_node: "intake" });
    });

    it("accepts a valid graph", async () => {
      const file = join(root, "graph.yaml");
      await writeFile(file, GRAPH_YAML, "utf-8");
      const io = capture();
      expect(await validateCommand(file, io)).toBe(0);
      expect(io.lines).toEqual([`${file}: valid`]);
    });

    it("reports errors and unreachable nodes", async () => {
      const file = join(root, "graph.json");
      await writeFile(file, JSON.stringify(CYCLIC_GRAPH), "utf-8");
      const io = capture();
      expect(await validateCommand(file, io)).toBe(1);
      expect(io.lines).toEqual([
        `${file}: invalid`,
        '  error: Node "b" is unreachable from every entry point',
        '  error: Node "c" is unreachable from every entry point',
        "  unreachable: b, c",
      ]);
    });

    it("fails on an unreadable file", async () => {
      const file = join(root, "missing.yaml");
      const io = capture();
      expect(await validateCommand(file, io)).toBe(1);
      expect(io.errors).toHaveLength(1);
      expect(io.errors[0]).toMatch(new RegExp(`^Cannot read ${file.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}: `));
    });
  });

  describe("inspect", () => {
    it("prints the state record", async () => {
      const record = await writeRecord();
      const io = capture();
      expect(await inspectCommand("s-1", config, io)).toBe(0);
      expect(io.lines).toEqual([JSON.stringify(record, null, 2)]);
    });

    it("fails for an unknown session", async () => {
      const io = capture();
      expect(await inspectCommand("nope", config, io)).toBe(1);
      expect(io.errors).toEqual(["Session not found: nope"]);
    });
  });

  describe("sessions", () => {
    it("lists sessions with a record", async () => {
      const io = capture();
      await sessionsCommand(config, io);
      expect(io.lines).toEqual(["No sessions found."]);

      await writeRecord();
      const listed = capture();
      await sessionsCommand(config, listed);
      expect(listed.lines).toEqual(["s-1  [paused]  support  node=intake  2026-03-01T10:00:00.000Z"]);
    });
  });

  describe("replay", () => {
    const seedConversation = async () => {
      await writeRecord();
      const conversation = new ConversationStore(store.sessionDir("s-1"));
      await conversation.init();
      await conversation.append({ role: "user", content: "hello" });
      await conversation.checkpoint("after-greeting");
      await conversation.append({
        role: "assistant",
        content: "",
        tool_calls: [{ id: "call_1", name: "set_output", input: { key: "ticket", value: "T-1" } }],
      });
      await conversation.append({ role: "tool", content: "Recorded ticket", tool_call_id: "call_1" });
      return conversation;
    };

    it("prints the whole conversation", async () => {
      await seedConversation();
      const io = capture();
      expect(await replayCommand("s-1", {}, config, io)).toBe(0);
      expect(io.lines).toEqual([
        "Session s-1: 3 messages",
        "[0] user: hello",
        "[1] assistant: ",
        '      → set_output {"key":"ticket","value":"T-1"}',
        "[2] tool (call_1): Recorded ticket",
        "Conversation integrity: OK",
      ]);
    });

    it("starts at a checkpoint or sequence number", async () => {
      await seedConversation();
      const fromCheckpoint = capture();
      await replayCommand("s-1", { checkpoint: "after-greeting" }, config, fromCheckpoint);
      expect(fromCheckpoint.lines[0]).toBe("Session s-1 from checkpoint after-greeting: 2 messages");
      expect(fromCheckpoint.lines[1]).toBe("[1] assistant: ");

      const fromSeq = capture();
      await replayCommand("s-1", { from: 2 }, config, fromSeq);
      expect(fromSeq.lines.slice(0, 2)).toEqual(["Session s-1: 1 messages", "[2] tool (call_1): Recorded ticket"]);
    });

    it("shows the stored cursor", async () => {
      const conversation = await seedConversation();
      await conversation.writeCursor({
        node_id: "intake", iteration_count: 2, output_accumulator: { ticket: "T-1" }, updated_at: "2026-03-01T10:00:00.000Z",
      });
      const io = capture();
      await replayCommand("s-1", {}, config, io);
      expect(io.lines.at(-2)).toBe('Cursor: node=intake iteration=2 outputs={"ticket":"T-1"}');
    });

    it("fails for an unknown session", async () => {
      const io = capture();
      expect(await replayCommand("nope", {}, config, io)).toBe(1);
      expect(io.errors).toEqual(["Session not found: nope"]);
    });
  });

  describe("events", () => {
    it("prints a session's journal events", async () => {
      const journal = new Journal(config.journalPath, { fsync: false, lock: false, logger: silentLogger });
      await journal.init();
      const created = await journal.emit("s-1", "session.created", { agent_id: "support" });
      await journal.emit("s-2", "session.created", { agent_id: "other" });
      const closed = await journal.emit("s-1", "session.closed", {});
      await journal.close();

      const io = capture();
      expect(await eventsCommand("s-1", config, io)).toBe(0);
      const ts = (timestamp: string) => timestamp.split("T")[1]?.slice(0, 12) ?? "";
      expect(io.lines).toEqual([
        `[${ts(created.timestamp)}] session.created`,
        '         {"agent_id":"support"}',
        `[${ts(closed.timestamp)}] session.closed`,
        "Journal integrity: OK",
      ]);
    });

    it("reports a broken chain without rewriting the journal", async () => {
      const journal = new Journal(config.journalPath, { fsync: false, lock: false, logger: silentLogger });
      await journal.init();
      await journal.emit("s-1", "session.created", { agent_id: "support" });
      await journal.emit("s-1", "execution.started", {});
      await journal.emit("s-1", "execution.completed", {});
      await journal.close();

      const lines = (await readFile(config.journalPath, "utf-8")).trim().split("\n");
      lines[1] = JSON.stringify({ ...JSON.parse(lines[1] ?? "{}"), payload: { tampered: true } });
      const tampered = lines.join("\n") + "\n";
      await writeFile(config.journalPath, tampered, "utf-8");

      const io = capture();
      expect(await eventsCommand("s-1", config, io)).toBe(1);
      expect(io.lines).toEqual([]);
      expect(io.errors).toEqual([
        "Journal integrity: BROKEN (Journal integrity violation at event 2 (seq=2): hash chain broken)",
      ]);
      expect(await readFile(config.journalPath, "utf-8")).toBe(tampered);
    });

    it("reports a session without events", async () => {
      const io = capture();
      await eventsCommand("s-9", config, io);
      expect(io.lines).toEqual(["No events found for session s-9"]);
    });
  });

  describe("program", () => {
    const env = () => ({ SWITCHYARD_STORAGE_ROOT: root });

    it("dispatches subcommands", async () => {
      await writeRecord();
      const io = capture();
      await buildProgram(io, env()).parseAsync(["node", "switchyard", "inspect", "s-1"]);
      expect(io.lines).toHaveLength(1);
      expect(JSON.parse(io.lines[0] ?? "")).toMatchObject({ session_id: "s-1", status: "paused" });
      expect(process.exitCode).toBeUndefined();
    });

    it("sets a failing exit code", async () => {
      const file = join(root, "graph.json");
      await writeFile(file, JSON.stringify(CYCLIC_GRAPH), "utf-8");
      await buildProgram(capture(), env()).parseAsync(["node", "switchyard", "validate", file]);
      expect(process.exitCode).toBe(1);
    });

    it("rejects a malformed --from", async () => {
      const program = buildProgram(capture(), env());
      await expect(program.parseAsync(["node", "switchyard", "replay", "s-1", "--from", "abc"]))
        .rejects.toThrow('Invalid from: "abc" (must be a non-negative integer)');
    });
  });
});
