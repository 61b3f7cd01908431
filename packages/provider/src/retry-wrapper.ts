import type {
  ProviderErrorKind,
  ProviderRequest,
  StreamEvent,
  StreamingProvider,
} from "@switchyard/schemas";
import { ProviderError, TRANSIENT_ERROR_KINDS } from "@switchyard/schemas";

const NETWORK_SIGNATURES = ["econnreset", "econnrefused", "etimedout", "fetch failed", "socket hang up", "network error"];

export function classifyProviderError(err: unknown): ProviderErrorKind {
  if (err instanceof ProviderError && err.kind) return err.kind;
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    const status = err.status;
    if (status === 429) return "rate_limit";
    if (status === 401 || status === 403) return "authentication";
    if (status >= 500) return "internal_server";
    if (status >= 400) return "invalid_request";
  }
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    if (NETWORK_SIGNATURES.some((sig) => msg.includes(sig))) return "connection";
    if (msg.includes("rate limit")) return "rate_limit";
  }
  return "unknown";
}

export function isTransient(kind: ProviderErrorKind): boolean {
  return TRANSIENT_ERROR_KINDS.includes(kind);
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound of random jitter added to each delay. */
  jitterMs?: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 15_000,
  jitterMs: 250,
};

export function backoff(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const delay = Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
  return delay + random() * (policy.jitterMs ?? 0);
}

export interface RetryNotice {
  node_id: string;
  attempt: number;
  kind: ProviderErrorKind;
  delay_ms: number;
  message: string;
}

export interface ProviderRetryWrapperOptions {
  policy?: Partial<RetryPolicy>;
  onRetry?: (notice: RetryNotice) => void | Promise<void>;
  /** Injected so tests never wait on real delays. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Masks transient provider failures behind retries so the caller only ever
 * sees `recoverable_error` once every attempt has failed. Content delivered
 * to the caller is never replayed: a transient failure after the first event
 * surfaces immediately.
 */
export class ProviderRetryWrapper {
  private provider: StreamingProvider;
  private policy: RetryPolicy;
  private onRetry?: ProviderRetryWrapperOptions["onRetry"];
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private random: () => number;

  constructor(provider: StreamingProvider, options: ProviderRetryWrapperOptions = {}) {
    this.provider = provider;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.onRetry = options.onRetry;
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
  }

  getPolicy(): RetryPolicy {
    return { ...this.policy };
  }

  async *stream(request: ProviderRequest, signal?: AbortSignal): AsyncGenerator<StreamEvent, void, undefined> {
    for (let attempt = 1; ; attempt++) {
      let delivered = false;
      try {
        for await (const chunk of this.provider.stream(request, signal)) {
          delivered = true;
          if (chunk.type === "text") {
            yield { type: "content_delta", text: chunk.text };
          } else {
            yield { type: "tool_call", call: chunk.call };
          }
        }
        yield { type: "done" };
        return;
      } catch (err) {
        // A provider honouring the signal rejects once it fires; that is a stop, not a failure.
        if (signal?.aborted) {
          yield { type: "done" };
          return;
        }
        const kind = classifyProviderError(err);
        const message = err instanceof Error ? err.message : String(err);
        if (!isTransient(kind)) {
          yield { type: "fatal_error", kind, message };
          return;
        }
        if (delivered || attempt > this.policy.maxRetries) {
          yield { type: "recoverable_error", kind, message, attempts: attempt };
          yield { type: "done" };
          return;
        }
        const delay = backoff(attempt, this.policy, this.random);
        await this.onRetry?.({ node_id: request.node_id, attempt, kind, delay_ms: delay, message });
        await this.sleep(delay, signal);
      }
    }
  }
}
