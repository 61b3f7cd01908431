const SENSITIVE_KEYS = /^(authorization|password|secret|token|api[_-]?key|credential|private[_-]?key|access[_-]?token|refresh[_-]?token|client[_-]?secret|signing[_-]?secret|webhook[_-]?secret)$/i;
const SENSITIVE_VALUES = /Bearer\s|sk-ant-|sk-proj-|ghp_|github_pat_|xox[bpas]-|whsec_|eyJ[A-Za-z0-9_-]{10,}\.|-----BEGIN\s+(?:RSA\s+|EC\s+|OPENSSH\s+)?PRIVATE\s+KEY/;

export function redactPayload(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "string") return SENSITIVE_VALUES.test(value) ? "[REDACTED]" : value;
  if (typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(redactPayload);
  return redactRecord(Object.fromEntries(Object.entries(value)));
}

/** Webhook payloads land in the journal verbatim, so secrets are masked by key and by shape. */
export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(record)) {
    result[k] = SENSITIVE_KEYS.test(k) && typeof v === "string" ? "[REDACTED]" : redactPayload(v);
  }
  return result;
}
