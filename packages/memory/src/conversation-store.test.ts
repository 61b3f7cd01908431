import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm, readFile, appendFile } from "node:fs/promises";
import { ConversationStore } from "./conversation-store.js";

describe("ConversationStore", () => {
  let dir: string;

  const open = async () => {
    const store = new ConversationStore(dir);
    await store.init();
    return store;
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "switchyard-conv-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("appends messages with sequence numbers and a hash chain", async () => {
    const store = await open();
    const first = await store.append({ role: "user", content: "hello" });
    const second = await store.append({ role: "assistant", content: "hi" });
    expect(first.seq).toBe(0);
    expect(second.seq).toBe(1);
    expect(first.hash_prev).toBeUndefined();
    expect(second.hash_prev).toMatch(/^[0-9a-f]{64}$/);
    expect(store.verifyIntegrity()).toEqual({ valid: true });
    expect(store.conversationRef).toBe(join(dir, "conversation", "messages.jsonl"));
  });

  it("replays the full history after reopening", async () => {
    const store = await open();
    await store.append({ role: "user", content: "one" });
    await store.append({ role: "assistant", content: "two" });

    const reopened = await open();
    const messages = await reopened.replay();
    expect(messages.map((m) => m.content)).toEqual(["one", "two"]);
    const third = await reopened.append({ role: "user", content: "three" });
    expect(third.seq).toBe(2);
    expect(reopened.verifyIntegrity()).toEqual({ valid: true });
  });

  it("replays from a sequence offset and from a named checkpoint", async () => {
    const store = await open();
    await store.append({ role: "user", content: "one" });
    await store.checkpoint("after-one");
    await store.append({ role: "user", content: "two" });
    await store.append({ role: "user", content: "three" });

    expect((await store.replay({ fromSeq: 2 })).map((m) => m.content)).toEqual(["three"]);
    expect((await store.replay({ checkpoint: "after-one" })).map((m) => m.content)).toEqual(["two", "three"]);
    await expect(store.replay({ checkpoint: "nope" })).rejects.toThrow("Unknown conversation checkpoint: nope");
  });

  it("rejects checkpoint names that escape the directory", async () => {
    const store = await open();
    await expect(store.checkpoint("../evil")).rejects.toThrow('Invalid checkpoint name: "../evil"');
  });

  it("stores the cursor independently of the message log", async () => {
    const store = await open();
    await store.append({ role: "user", content: "keep me" });
    expect(await store.readCursor()).toBeNull();

    await store.writeCursor({
      node_id: "triage",
      iteration_count: 4,
      output_accumulator: { verdict: "spam" },
      updated_at: new Date(0).toISOString(),
    });
    const written = await store.readCursor();
    expect(written?.iteration_count).toBe(4);
    expect(written?.output_accumulator).toEqual({ verdict: "spam" });

    const reset = await store.resetCursor("triage");
    expect(reset.iteration_count).toBe(0);
    expect(reset.output_accumulator).toEqual({});
    expect((await store.readCursor())?.iteration_count).toBe(0);
    expect((await store.replay()).map((m) => m.content)).toEqual(["keep me"]);
  });

  it("checkpoints capture the cursor at that moment", async () => {
    const store = await open();
    await store.writeCursor({ node_id: "a", iteration_count: 2, output_accumulator: {}, updated_at: "" });
    const checkpoint = await store.checkpoint("cp");
    expect(checkpoint.message_count).toBe(0);
    expect(checkpoint.cursor?.iteration_count).toBe(2);
    expect((await store.readCheckpoint("cp"))?.name).toBe("cp");
  });

  it("serializes concurrent appends", async () => {
    const store = await open();
    await Promise.all(Array.from({ length: 10 }, (_, i) => store.append({ role: "user", content: `m${i}` })));
    const lines = (await readFile(store.conversationRef, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(10);
    expect(store.verifyIntegrity()).toEqual({ valid: true });
  });

  it("drops a torn final line on init", async () => {
    const store = await open();
    await store.append({ role: "user", content: "whole" });
    await appendFile(store.conversationRef, '{"role":"assis', "utf-8");

    const reopened = await open();
    expect(reopened.messageCount).toBe(1);
    const next = await reopened.append({ role: "assistant", content: "after crash" });
    expect(next.seq).toBe(1);
    expect(reopened.verifyIntegrity()).toEqual({ valid: true });
  });
});
