import type { ProviderErrorKind } from "./types.js";

export abstract class SwitchyardError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** An async entry point was triggered while its agent has no live primary session. */
export class NoPrimarySessionError extends SwitchyardError {
  readonly code = "NO_PRIMARY_SESSION";

  constructor(readonly agentId: string, readonly entryPointId: string) {
    super(`No active primary session for agent "${agentId}" (entry point "${entryPointId}")`);
  }
}

export class SessionActiveError extends SwitchyardError {
  readonly code = "SESSION_ACTIVE";

  constructor(readonly agentId: string, readonly sessionId: string) {
    super(`Agent "${agentId}" already has an active primary session ${sessionId}`);
  }
}

export class SessionNotFoundError extends SwitchyardError {
  readonly code = "SESSION_NOT_FOUND";

  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
  }
}

export class UnknownEntryPointError extends SwitchyardError {
  readonly code = "UNKNOWN_ENTRY_POINT";

  constructor(readonly entryPointId: string, readonly graphId: string) {
    super(`Graph "${graphId}" has no entry point "${entryPointId}"`);
  }
}

export class GraphValidationError extends SwitchyardError {
  readonly code = "GRAPH_INVALID";

  constructor(readonly errors: string[]) {
    super(`Invalid workflow graph: ${errors.join("; ")}`);
  }
}

/**
 * Every provider attempt failed transiently and nothing was produced.
 * Raised from judging so the outer backoff path handles it instead of the
 * iteration budget.
 */
export class ConnectivityError extends SwitchyardError {
  readonly code = "CONNECTIVITY_FAILURE";

  constructor(
    readonly nodeId: string,
    readonly kind: ProviderErrorKind,
    message: string,
  ) {
    super(`Node "${nodeId}" lost provider connectivity (${kind}): ${message}`);
  }
}

export class ProviderFatalError extends SwitchyardError {
  readonly code = "PROVIDER_FATAL";

  constructor(readonly nodeId: string, readonly kind: ProviderErrorKind, message: string) {
    super(`Node "${nodeId}" provider failure (${kind}): ${message}`);
  }
}

export class IterationsExhaustedError extends SwitchyardError {
  readonly code = "ITERATIONS_EXHAUSTED";

  constructor(readonly nodeId: string, readonly maxIterations: number, readonly missing: string[]) {
    super(
      `Node "${nodeId}" exhausted ${maxIterations} iterations` +
      (missing.length > 0 ? ` (missing outputs: ${missing.join(", ")})` : ""),
    );
  }
}

export class InvalidTransitionError extends SwitchyardError {
  readonly code = "INVALID_TRANSITION";

  constructor(readonly from: string, readonly to: string) {
    super(`Invalid execution transition: ${from} → ${to}`);
  }
}

export class StateRecordInvalidError extends SwitchyardError {
  readonly code = "STATE_RECORD_INVALID";

  constructor(readonly sessionId: string, readonly errors: string[]) {
    super(`State record for ${sessionId} is invalid: ${errors.join(", ")}`);
  }
}

/**
 * Thrown by (or wrapped around) the underlying model client. `status` mirrors
 * the HTTP status code where the client reports one.
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    readonly kind?: ProviderErrorKind,
    readonly status?: number,
  ) {
    super(message);
    this.name = "ProviderError";
  }
}
