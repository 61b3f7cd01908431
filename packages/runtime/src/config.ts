import { join, resolve } from "node:path";
import type { RetryPolicy } from "@switchyard/provider";
import { DEFAULT_RETRY_POLICY } from "@switchyard/provider";

export interface RuntimeConfig {
  storageRoot: string;
  journalPath: string;
  journalFsync: boolean;
  /** Iteration ceiling for nodes that declare none. */
  maxIterations: number;
  maxNodeTransitions: number;
  connectivityRetries: number;
  retry: RetryPolicy;
}

type Env = Record<string, string | undefined>;

function parseInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`Invalid ${name}: "${raw}" (must be an integer >= ${min})`);
  }
  return n;
}

function parseBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new Error(`Invalid ${name}: "${env[name] ?? ""}" (must be true or false)`);
}

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const storageRoot = resolve(env.SWITCHYARD_STORAGE_ROOT || "sessions");
  const baseDelayMs = parseInteger(env, "SWITCHYARD_BACKOFF_BASE_MS", DEFAULT_RETRY_POLICY.baseDelayMs, 0);
  const maxDelayMs = parseInteger(env, "SWITCHYARD_BACKOFF_MAX_MS", DEFAULT_RETRY_POLICY.maxDelayMs, 0);
  if (maxDelayMs < baseDelayMs) {
    throw new Error(`Invalid SWITCHYARD_BACKOFF_MAX_MS: ${maxDelayMs} is below SWITCHYARD_BACKOFF_BASE_MS (${baseDelayMs})`);
  }
  return {
    storageRoot,
    journalPath: env.SWITCHYARD_JOURNAL_PATH ? resolve(env.SWITCHYARD_JOURNAL_PATH) : join(storageRoot, "journal.jsonl"),
    journalFsync: parseBoolean(env, "SWITCHYARD_JOURNAL_FSYNC", true),
    maxIterations: parseInteger(env, "SWITCHYARD_MAX_ITERATIONS", 50, 1),
    maxNodeTransitions: parseInteger(env, "SWITCHYARD_MAX_NODE_TRANSITIONS", 100, 1),
    connectivityRetries: parseInteger(env, "SWITCHYARD_CONNECTIVITY_RETRIES", 3, 0),
    retry: {
      ...DEFAULT_RETRY_POLICY,
      maxRetries: parseInteger(env, "SWITCHYARD_PROVIDER_MAX_RETRIES", DEFAULT_RETRY_POLICY.maxRetries, 0),
      baseDelayMs,
      maxDelayMs,
    },
  };
}
