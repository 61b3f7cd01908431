/**
 * Declared-variable memory of one session, shared in process by the owning
 * execution and every guest. Only the owner ever persists it.
 */
export class SessionMemory {
  private entries: Map<string, unknown>;

  constructor(initial: Record<string, unknown> = {}) {
    this.entries = new Map(Object.entries(initial));
  }

  get(key: string): unknown { return this.entries.get(key); }
  has(key: string): boolean { return this.entries.has(key); }
  set(key: string, value: unknown): void { this.entries.set(key, value); }
  delete(key: string): boolean { return this.entries.delete(key); }
  keys(): string[] { return [...this.entries.keys()]; }

  merge(values: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(values)) {
      this.entries.set(key, value);
    }
  }

  snapshot(): Record<string, unknown> {
    return structuredClone(Object.fromEntries(this.entries));
  }
}

/**
 * Restricts memory to exactly the declared input keys. Everything else,
 * including outputs of earlier runs, is dropped so a new trigger never sees
 * another run's completed-work markers.
 */
export function filterMemory(
  memory: Record<string, unknown>,
  inputKeys: readonly string[],
): Record<string, unknown> {
  const filtered: Record<string, unknown> = {};
  for (const key of inputKeys) {
    if (Object.prototype.hasOwnProperty.call(memory, key)) {
      filtered[key] = structuredClone(memory[key]);
    }
  }
  return filtered;
}
