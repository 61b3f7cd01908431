import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { Command } from "commander";
import yaml from "js-yaml";
import type { ConversationMessage } from "@switchyard/schemas";
import { Journal, errorMessage, silentLogger } from "@switchyard/journal";
import { ConversationStore, StateRecordStore } from "@switchyard/memory";
import { validateGraph } from "@switchyard/graph";
import { loadRuntimeConfig } from "@switchyard/runtime";
import type { RuntimeConfig } from "@switchyard/runtime";

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface ReplayCommandOptions {
  checkpoint?: string;
  from?: number;
}

function parseNonNegativeInt(value: string, label: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid ${label}: "${value}" (must be a non-negative integer)`);
  }
  return n;
}

/** Reads a graph document. `.json` files are parsed as JSON, anything else as YAML. */
export async function loadGraphFile(path: string): Promise<unknown> {
  const content = await readFile(path, "utf-8");
  return extname(path).toLowerCase() === ".json" ? JSON.parse(content) : yaml.load(content);
}

export async function validateCommand(path: string, io: CliOutput): Promise<number> {
  let data: unknown;
  try {
    data = await loadGraphFile(path);
  } catch (err) {
    io.err(`Cannot read ${path}: ${errorMessage(err)}`);
    return 1;
  }
  const result = validateGraph(data);
  io.out(`${path}: ${result.valid ? "valid" : "invalid"}`);
  for (const error of result.errors) io.out(`  error: ${error}`);
  for (const warning of result.warnings) io.out(`  warning: ${warning}`);
  if (result.unreachable.length > 0) io.out(`  unreachable: ${result.unreachable.join(", ")}`);
  return result.valid ? 0 : 1;
}

export async function inspectCommand(sessionId: string, config: RuntimeConfig, io: CliOutput): Promise<number> {
  const record = await new StateRecordStore(config.storageRoot).read(sessionId);
  if (!record) {
    io.err(`Session not found: ${sessionId}`);
    return 1;
  }
  io.out(JSON.stringify(record, null, 2));
  return 0;
}

export async function sessionsCommand(config: RuntimeConfig, io: CliOutput): Promise<number> {
  const store = new StateRecordStore(config.storageRoot);
  const sessions = await store.listSessions();
  if (sessions.length === 0) {
    io.out("No sessions found.");
    return 0;
  }
  for (const id of sessions) {
    const record = await store.read(id);
    if (!record) continue;
    io.out(`${id}  [${record.status}]  ${record.agent_id}  node=${record.current_node ?? "-"}  ${record.updated_at}`);
  }
  return 0;
}

function formatMessage(message: ConversationMessage): string[] {
  const lines = [`[${message.seq}] ${message.role}${message.tool_call_id ? ` (${message.tool_call_id})` : ""}: ${message.content}`];
  for (const call of message.tool_calls ?? []) {
    lines.push(`      → ${call.name} ${JSON.stringify(call.input)}`);
  }
  return lines;
}

export async function replayCommand(
  sessionId: string,
  options: ReplayCommandOptions,
  config: RuntimeConfig,
  io: CliOutput,
): Promise<number> {
  const store = new StateRecordStore(config.storageRoot);
  if (!(await store.read(sessionId))) {
    io.err(`Session not found: ${sessionId}`);
    return 1;
  }
  const conversation = new ConversationStore(store.sessionDir(sessionId));
  await conversation.init();
  const messages = await conversation.replay({ checkpoint: options.checkpoint, fromSeq: options.from });
  const scope = options.checkpoint !== undefined ? ` from checkpoint ${options.checkpoint}` : "";
  io.out(`Session ${sessionId}${scope}: ${messages.length} messages`);
  for (const message of messages) {
    for (const line of formatMessage(message)) io.out(line);
  }
  const cursor = await conversation.readCursor();
  if (cursor) {
    io.out(`Cursor: node=${cursor.node_id ?? "-"} iteration=${cursor.iteration_count} outputs=${JSON.stringify(cursor.output_accumulator)}`);
  }
  const integrity = conversation.verifyIntegrity();
  io.out(`Conversation integrity: ${integrity.valid ? "OK" : `BROKEN at message ${integrity.brokenAt}`}`);
  return integrity.valid ? 0 : 1;
}

/** Read-only: a broken chain is reported, never repaired. */
export async function eventsCommand(sessionId: string, config: RuntimeConfig, io: CliOutput): Promise<number> {
  const journal = new Journal(config.journalPath, { lock: false, recovery: "strict", logger: silentLogger });
  try {
    await journal.init();
  } catch (err) {
    io.err(`Journal integrity: BROKEN (${errorMessage(err)})`);
    return 1;
  }
  try {
    const events = journal.readSession(sessionId);
    if (events.length === 0) {
      io.out(`No events found for session ${sessionId}`);
      return 0;
    }
    for (const event of events) {
      const ts = event.timestamp.split("T")[1]?.slice(0, 12) ?? "";
      io.out(`[${ts}] ${event.type}`);
      if (Object.keys(event.payload).length > 0) io.out(`         ${JSON.stringify(event.payload)}`);
    }
    const integrity = await journal.verifyIntegrity();
    io.out(`Journal integrity: ${integrity.valid ? "OK" : `BROKEN at event ${integrity.brokenAt}`}`);
    return integrity.valid ? 0 : 1;
  } finally {
    await journal.close();
  }
}

/** Configuration is read lazily so `validate` works without a usable environment. */
export function buildProgram(
  io: CliOutput = consoleOutput,
  env: Record<string, string | undefined> = process.env,
): Command {
  const program = new Command();
  program.name("switchyard").description("Shared-session agent runtime").version("0.1.0");
  const config = () => loadRuntimeConfig(env);
  const exit = (code: number) => {
    if (code !== 0) process.exitCode = code;
  };

  program.command("validate").description("Validate a workflow graph file (YAML or JSON)")
    .argument("<file>", "Graph file")
    .action(async (file: string) => {
      exit(await validateCommand(file, io));
    });

  program.command("inspect").description("Print a session's state record")
    .argument("<id>", "Session ID")
    .action(async (sessionId: string) => {
      exit(await inspectCommand(sessionId, config(), io));
    });

  program.command("sessions").description("List sessions in the storage root")
    .action(async () => {
      exit(await sessionsCommand(config(), io));
    });

  program.command("replay").description("Print a session's conversation")
    .argument("<id>", "Session ID")
    .option("--checkpoint <name>", "Start at a named conversation checkpoint")
    .option("--from <seq>", "Start at a message sequence number")
    .action(async (sessionId: string, opts: { checkpoint?: string; from?: string }) => {
      const from = opts.from !== undefined ? parseNonNegativeInt(opts.from, "from") : undefined;
      exit(await replayCommand(sessionId, { checkpoint: opts.checkpoint, from }, config(), io));
    });

  program.command("events").description("Print a session's journal events")
    .argument("<id>", "Session ID")
    .action(async (sessionId: string) => {
      exit(await eventsCommand(sessionId, config(), io));
    });

  return program;
}
