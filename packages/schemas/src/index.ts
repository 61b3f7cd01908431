export * from "./types.js";
export * from "./errors.js";
export { validateGraphData, isWorkflowGraph, validateStateRecordData, isStateRecord, validateJournalEventData } from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { WorkflowGraphSchema } from "./graph.schema.js";
export { StateRecordSchema } from "./state-record.schema.js";
export { JournalEventSchema } from "./journal-event.schema.js";
