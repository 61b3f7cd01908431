import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, open, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType, Logger } from "@switchyard/schemas";
import { validateJournalEventData } from "@switchyard/schemas";
import { redactRecord } from "./redact.js";
import { ConsoleLogger } from "./logger.js";

export interface JournalOptions {
  fsync?: boolean;
  redact?: boolean;
  /** Acquire an advisory lockfile so two processes never append to one journal. Default: true */
  lock?: boolean;
  /** How to handle a broken hash chain on init. "truncate" (default) keeps the valid prefix; "strict" throws. */
  recovery?: "truncate" | "strict";
  logger?: Logger;
}

export type JournalListener = (event: JournalEvent) => void;

/**
 * Append-only runtime event log. One JSON event per line, each carrying the
 * SHA-256 of the previous line so tampering or partial writes are detectable.
 */
export class Journal {
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private sessionIndex = new Map<string, JournalEvent[]>();
  private nextSeq = 0;
  private fsync: boolean;
  private redact: boolean;
  private lockEnabled: boolean;
  private lockPath: string;
  private locked = false;
  private recovery: "truncate" | "strict";
  private logger: Logger;

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.redact = options?.redact ?? true;
    this.lockEnabled = options?.lock ?? true;
    this.lockPath = `${filePath}.lock`;
    this.recovery = options?.recovery ?? "truncate";
    this.logger = options?.logger ?? new ConsoleLogger("journal");
  }

  async init(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    if (this.lockEnabled) {
      await this.acquireLock();
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);

    // A crash mid-append leaves a partial last line behind
    const last = lines[lines.length - 1];
    if (last !== undefined && !isJson(last)) {
      lines.pop();
      await writeFile(this.filePath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
      this.logger.warn("truncated incomplete last line", { file: this.filePath });
    }

    let maxSeq = -1;
    let prevHash: string | undefined;
    const index = new Map<string, JournalEvent[]>();
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = JSON.parse(line) as JournalEvent;
      if (i > 0 && event.hash_prev !== prevHash) {
        if (this.recovery === "strict") {
          throw new Error(`Journal integrity violation at event ${i} (seq=${event.seq}): hash chain broken`);
        }
        const valid = lines.slice(0, i);
        const tmpPath = `${this.filePath}.tmp`;
        await writeFile(tmpPath, valid.length > 0 ? valid.join("\n") + "\n" : "", "utf-8");
        await rename(tmpPath, this.filePath);
        this.logger.warn("recovered from broken hash chain", { at: i, dropped: lines.length - i });
        break;
      }
      prevHash = this.hash(line);
      const bucket = index.get(event.session_id);
      if (bucket) bucket.push(event);
      else index.set(event.session_id, [event]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }

    this.sessionIndex = index;
    this.nextSeq = maxSeq + 1;
    this.lastHash = prevHash;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>,
  ): Promise<JournalEvent> {
    const release = await this.acquireWriteLock();
    try {
      const seq = this.nextSeq;
      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        session_id: sessionId,
        type,
        payload: this.redact ? redactRecord(payload) : payload,
        ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
        seq,
      };

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);
      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // In-memory state only moves once the line is on disk
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;
      const bucket = this.sessionIndex.get(sessionId);
      if (bucket) bucket.push(event);
      else this.sessionIndex.set(sessionId, [event]);

      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          this.logger.error("journal listener threw", { type, error: errorMessage(err) });
        }
      }
      return event;
    } finally {
      release();
    }
  }

  /** Like emit, but reports failures to the logger instead of throwing. For failure paths. */
  async tryEmit(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>,
  ): Promise<JournalEvent | null> {
    try {
      return await this.emit(sessionId, type, payload);
    } catch (err) {
      this.logger.error("journal emit failed", { session_id: sessionId, type, error: errorMessage(err) });
      return null;
    }
  }

  async readAll(): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    return content.trim().split("\n").filter(Boolean)
      .map((line) => JSON.parse(line) as JournalEvent);
  }

  readSession(sessionId: string, types?: JournalEventType[]): JournalEvent[] {
    const events = this.sessionIndex.get(sessionId) ?? [];
    return types ? events.filter((e) => types.includes(e.type)) : [...events];
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    const events = await this.readAll();
    let prevHash: string | undefined;
    for (let i = 0; i < events.length; i++) {
      const event = events[i];
      if (!event) continue;
      if (i > 0 && event.hash_prev !== prevHash) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(JSON.stringify(event));
    }
    return { valid: true };
  }

  /** Waits for pending writes and releases the lockfile. */
  async close(): Promise<void> {
    await this.writeLock;
    if (this.lockEnabled && this.locked) {
      await unlink(this.lockPath).catch((err: unknown) => {
        this.logger.warn("lockfile already removed", { error: errorMessage(err) });
      });
      this.locked = false;
    }
  }

  getFilePath(): string {
    return this.filePath;
  }

  private async acquireWriteLock(): Promise<() => void> {
    let release: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { release = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;
    return release;
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }

  private async acquireLock(): Promise<void> {
    try {
      const fh = await open(this.lockPath, "wx");
      await fh.write(String(process.pid), undefined, "utf-8");
      await fh.close();
      this.locked = true;
      return;
    } catch (err: unknown) {
      if (!isErrno(err, "EEXIST")) throw err;
    }

    const pid = parseInt((await readFile(this.lockPath, "utf-8").catch(() => "")).trim(), 10);
    if (!Number.isNaN(pid) && isProcessAlive(pid)) {
      throw new Error(`Journal is locked by process ${pid} (lockfile: ${this.lockPath})`);
    }
    // Stale lock: owner is gone or the lockfile is unreadable
    await unlink(this.lockPath).catch((err: unknown) => {
      this.logger.debug("stale lockfile vanished before removal", { error: errorMessage(err) });
    });
    return this.acquireLock();
  }
}

function isJson(line: string): boolean {
  try {
    JSON.parse(line);
    return true;
  } catch {
    return false;
  }
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    return !isErrno(err, "ESRCH");
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
