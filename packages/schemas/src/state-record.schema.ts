const nullableString = { type: ["string", "null"] } as const;

export const StateRecordSchema = {
  type: "object",
  required: [
    "session_id", "agent_id", "status", "memory", "conversation_ref",
    "current_node", "paused_at", "resume_from_checkpoint", "created_at", "updated_at",
  ],
  properties: {
    session_id: { type: "string", minLength: 1 },
    agent_id: { type: "string", minLength: 1 },
    status: { type: "string", enum: ["running", "paused", "completed", "errored", "cancelled"] },
    memory: { type: "object" },
    conversation_ref: { type: "string" },
    current_node: nullableString,
    paused_at: nullableString,
    resume_from_checkpoint: nullableString,
    created_at: { type: "string", format: "date-time" },
    updated_at: { type: "string", format: "date-time" },
  },
  additionalProperties: false,
} as const;
