import AjvModule from "ajv";
import type { ErrorObject } from "ajv";
import addFormatsModule from "ajv-formats";
import { WorkflowGraphSchema } from "./graph.schema.js";
import { StateRecordSchema } from "./state-record.schema.js";
import { JournalEventSchema } from "./journal-event.schema.js";
import type { StateRecord, WorkflowGraph } from "./types.js";

// Both packages are CommonJS; under NodeNext the default import is module.exports.
const ajv = new AjvModule.default({ allErrors: true, strict: false });
addFormatsModule.default(ajv);

const validateGraph = ajv.compile(WorkflowGraphSchema);
const validateStateRecord = ajv.compile(StateRecordSchema);
const validateJournalEvent = ajv.compile(JournalEventSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateGraphData(data: unknown): ValidationResult {
  const valid = validateGraph(data);
  return toResult(valid, validateGraph.errors);
}

export function isWorkflowGraph(data: unknown): data is WorkflowGraph {
  return validateGraph(data);
}

export function validateStateRecordData(data: unknown): ValidationResult {
  const valid = validateStateRecord(data);
  return toResult(valid, validateStateRecord.errors);
}

export function isStateRecord(data: unknown): data is StateRecord {
  return validateStateRecord(data);
}

export function validateJournalEventData(data: unknown): ValidationResult {
  const valid = validateJournalEvent(data);
  return toResult(valid, validateJournalEvent.errors);
}
