export { OutputKeyJudge, missingOutputs } from "./judge.js";
export type { Judge, JudgeInput, JudgeVerdict } from "./judge.js";
export {
  runEventLoopNode,
  buildSystemPrompt,
  SET_OUTPUT_TOOL,
  DEFAULT_MAX_ITERATIONS,
} from "./event-loop-node.js";
export type {
  NodeMode,
  NodeResult,
  NodeProgress,
  EventLoopNodeContext,
  ToolInvoker,
} from "./event-loop-node.js";
export { OwnerAccess, GuestAccess, accessFor } from "./session-access.js";
export type { SessionAccess, SessionContext } from "./session-access.js";
export { ExecutionStream, transitionMarker } from "./execution-stream.js";
export type {
  ExecutionStatus,
  ExecutionRole,
  ExecutionResult,
  ExecutionStreamConfig,
} from "./execution-stream.js";
