export { AgentRuntime } from "./agent-runtime.js";
export type {
  AgentRuntimeOptions,
  ActiveSessionInfo,
  ExecutionHandle,
  ResumeOptions,
  RoutedJournalEvent,
} from "./agent-runtime.js";
export { SessionRegistry } from "./session-registry.js";
export type { ActiveSession } from "./session-registry.js";
export { EventRouter, Executor, currentExecutorId } from "./event-router.js";
export type { ExecutorTask, RoutableEvent, RoutedHandler } from "./event-router.js";
export { loadRuntimeConfig } from "./config.js";
export type { RuntimeConfig } from "./config.js";
