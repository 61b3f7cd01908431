import { createHash } from "node:crypto";
import { appendFile, readFile, writeFile, mkdir, open, rename } from "node:fs/promises";
import { join } from "node:path";
import type {
  ConversationCheckpoint,
  ConversationMessage,
  Cursor,
  NewMessage,
} from "@switchyard/schemas";

const MESSAGES_FILE = "messages.jsonl";
const CURSOR_FILE = "cursor.json";
const CHECKPOINT_DIR = "checkpoints";
const CHECKPOINT_NAME = /^[A-Za-z0-9._-]{1,128}$/;

export interface ReplayOptions {
  /** Start from this message sequence number. */
  fromSeq?: number;
  /** Start from the offset recorded by a named checkpoint. */
  checkpoint?: string;
}

export function emptyCursor(nodeId: string | null = null): Cursor {
  return { node_id: nodeId, iteration_count: 0, output_accumulator: {}, updated_at: new Date().toISOString() };
}

/**
 * Per-session conversation: an append-only, hash-chained message log plus a
 * separately stored progress cursor. The two files are independent so the
 * cursor can be reset without touching history.
 *
 * One instance per session must be shared by every execution of that session;
 * appends are serialized through its write lock.
 */
export class ConversationStore {
  private dir: string;
  private messages: ConversationMessage[] = [];
  private lastHash: string | undefined;
  private writeLock: Promise<void> = Promise.resolve();
  private initialized = false;

  constructor(sessionDir: string) {
    this.dir = join(sessionDir, "conversation");
  }

  get conversationRef(): string {
    return join(this.dir, MESSAGES_FILE);
  }

  get messageCount(): number {
    return this.messages.length;
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    await mkdir(join(this.dir, CHECKPOINT_DIR), { recursive: true });
    let content = "";
    try {
      content = await readFile(this.conversationRef, "utf-8");
    } catch (err: unknown) {
      if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) throw err;
    }
    const lines = content.split("\n").filter(Boolean);
    const parsed: ConversationMessage[] = [];
    for (const line of lines) {
      try {
        parsed.push(JSON.parse(line) as ConversationMessage);
      } catch {
        // Only a torn final append can be unparseable; rewrite without it
        await writeFile(this.conversationRef, lines.slice(0, parsed.length).map((l) => l + "\n").join(""), "utf-8");
        break;
      }
    }
    this.messages = parsed;
    const last = lines[parsed.length - 1];
    this.lastHash = last !== undefined ? hash(last) : undefined;
    this.initialized = true;
  }

  async append(message: NewMessage): Promise<ConversationMessage> {
    return this.withWriteLock(async () => {
      const stored: ConversationMessage = {
        ...message,
        seq: this.messages.length,
        created_at: new Date().toISOString(),
        ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
      };
      const line = JSON.stringify(stored);
      await appendFile(this.conversationRef, line + "\n", "utf-8");
      this.messages.push(stored);
      this.lastHash = hash(line);
      return stored;
    });
  }

  /** Full history by default; a checkpoint or sequence offset narrows the start. */
  async replay(options: ReplayOptions = {}): Promise<ConversationMessage[]> {
    let from = options.fromSeq ?? 0;
    if (options.checkpoint !== undefined) {
      const checkpoint = await this.readCheckpoint(options.checkpoint);
      if (!checkpoint) throw new Error(`Unknown conversation checkpoint: ${options.checkpoint}`);
      from = checkpoint.message_count;
    }
    return this.messages.slice(Math.max(0, from));
  }

  async checkpoint(name: string): Promise<ConversationCheckpoint> {
    assertCheckpointName(name);
    const checkpoint: ConversationCheckpoint = {
      name,
      message_count: this.messages.length,
      cursor: await this.readCursor(),
      created_at: new Date().toISOString(),
    };
    await this.withWriteLock(() => atomicWriteJson(join(this.dir, CHECKPOINT_DIR, `${name}.json`), checkpoint));
    return checkpoint;
  }

  async readCheckpoint(name: string): Promise<ConversationCheckpoint | null> {
    assertCheckpointName(name);
    return readJson<ConversationCheckpoint>(join(this.dir, CHECKPOINT_DIR, `${name}.json`));
  }

  async readCursor(): Promise<Cursor | null> {
    return readJson<Cursor>(join(this.dir, CURSOR_FILE));
  }

  async writeCursor(cursor: Cursor): Promise<void> {
    const stamped = { ...cursor, updated_at: new Date().toISOString() };
    await this.withWriteLock(() => atomicWriteJson(join(this.dir, CURSOR_FILE), stamped));
  }

  async resetCursor(nodeId: string | null): Promise<Cursor> {
    const cursor = emptyCursor(nodeId);
    await this.withWriteLock(() => atomicWriteJson(join(this.dir, CURSOR_FILE), cursor));
    return cursor;
  }

  verifyIntegrity(): { valid: boolean; brokenAt?: number } {
    let prevHash: string | undefined;
    for (const [i, message] of this.messages.entries()) {
      if (i > 0 && message.hash_prev !== prevHash) return { valid: false, brokenAt: i };
      if (message.seq !== i) return { valid: false, brokenAt: i };
      prevHash = hash(JSON.stringify(message));
    }
    return { valid: true };
  }

  private async withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;
    try {
      return await fn();
    } finally {
      releaseLock();
    }
  }
}

function hash(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

function assertCheckpointName(name: string): void {
  if (!CHECKPOINT_NAME.test(name)) {
    throw new Error(`Invalid checkpoint name: "${name}"`);
  }
}

async function readJson<T>(path: string): Promise<T | null> {
  try {
    return JSON.parse(await readFile(path, "utf-8")) as T;
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

async function atomicWriteJson(path: string, value: unknown): Promise<void> {
  const tmpPath = `${path}.tmp`;
  const fh = await open(tmpPath, "w");
  try {
    await fh.writeFile(JSON.stringify(value) + "\n", "utf-8");
    await fh.sync();
  } finally {
    await fh.close();
  }
  await rename(tmpPath, path);
}
