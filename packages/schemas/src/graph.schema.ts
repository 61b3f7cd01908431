export const EntryPointSchema = {
  type: "object",
  required: ["id", "kind", "input_keys"],
  properties: {
    id: { type: "string", minLength: 1 },
    kind: { type: "string", enum: ["primary", "async"] },
    input_keys: { type: "array", items: { type: "string", minLength: 1 }, uniqueItems: true },
  },
  additionalProperties: false,
} as const;

export const NodeSchema = {
  type: "object",
  required: ["id", "input_keys", "output_keys"],
  properties: {
    id: { type: "string", minLength: 1 },
    description: { type: "string" },
    system_prompt: { type: "string" },
    input_keys: { type: "array", items: { type: "string", minLength: 1 } },
    output_keys: { type: "array", items: { type: "string", minLength: 1 } },
    max_iterations: { type: "integer", minimum: 1, maximum: 1000 },
  },
  additionalProperties: false,
} as const;

export const WorkflowGraphSchema = {
  type: "object",
  required: ["graph_id", "entry_node", "nodes", "edges", "metadata"],
  properties: {
    graph_id: { type: "string", minLength: 1 },
    entry_node: { type: "string", minLength: 1 },
    nodes: { type: "array", items: NodeSchema, minItems: 1 },
    edges: {
      type: "array",
      items: {
        type: "object",
        required: ["source", "target"],
        properties: {
          source: { type: "string", minLength: 1 },
          target: { type: "string", minLength: 1 },
        },
        additionalProperties: false,
      },
    },
    metadata: {
      type: "object",
      required: ["conversation_mode", "identity_prompt", "async_entry_points"],
      properties: {
        conversation_mode: { type: "string", enum: ["continuous", "isolated"] },
        identity_prompt: { type: "string" },
        async_entry_points: { type: "array", items: EntryPointSchema },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const;
