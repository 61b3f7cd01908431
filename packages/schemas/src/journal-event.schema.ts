export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "session_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    session_id: { type: "string", minLength: 1 },
    type: {
      type: "string",
      enum: [
        "session.created", "session.resumed", "session.closed",
        "execution.started", "execution.completed", "execution.failed",
        "execution.cancelled", "execution.paused",
        "node.started", "node.iteration", "node.accepted", "node.failed",
        "node.connectivity_retry",
        "provider.retry",
        "trigger.received", "trigger.rejected",
      ],
    },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
