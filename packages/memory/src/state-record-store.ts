import { readFile, readdir, mkdir, open, rename } from "node:fs/promises";
import { join } from "node:path";
import type { StateRecord } from "@switchyard/schemas";
import { StateRecordInvalidError, isStateRecord, validateStateRecordData } from "@switchyard/schemas";

const RECORD_FILE = "state.json";

/**
 * Durable per-session snapshot. Each session owns one directory under the
 * store root; the record itself is replaced atomically (tmp + fsync + rename).
 */
export class StateRecordStore {
  private root: string;
  private writeLock: Promise<void> = Promise.resolve();

  constructor(root: string) {
    this.root = root;
  }

  getRoot(): string {
    return this.root;
  }

  sessionDir(sessionId: string): string {
    return join(this.root, sessionId);
  }

  recordPath(sessionId: string): string {
    return join(this.sessionDir(sessionId), RECORD_FILE);
  }

  async read(sessionId: string): Promise<StateRecord | null> {
    let content: string;
    try {
      content = await readFile(this.recordPath(sessionId), "utf-8");
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }
    const data: unknown = JSON.parse(content);
    if (!isStateRecord(data)) {
      throw new StateRecordInvalidError(sessionId, validateStateRecordData(data).errors);
    }
    return data;
  }

  async write(record: StateRecord): Promise<void> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      await mkdir(this.sessionDir(record.session_id), { recursive: true });
      const target = this.recordPath(record.session_id);
      const tmpPath = `${target}.tmp`;
      const fh = await open(tmpPath, "w");
      try {
        await fh.writeFile(JSON.stringify(record, null, 2) + "\n", "utf-8");
        await fh.sync();
      } finally {
        await fh.close();
      }
      await rename(tmpPath, target);
    } finally {
      releaseLock();
    }
  }

  /** Session ids that have a record on disk. */
  async listSessions(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.root);
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
    const sessions: string[] = [];
    for (const entry of entries) {
      const record = await readFile(this.recordPath(entry), "utf-8").then(() => true, () => false);
      if (record) sessions.push(entry);
    }
    return sessions.sort();
  }
}
