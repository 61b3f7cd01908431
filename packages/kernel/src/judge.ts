import type { NodeSpec } from "@switchyard/schemas";

export type JudgeVerdict =
  | { action: "accept" }
  | { action: "retry"; feedback: string };

export interface JudgeInput {
  node: NodeSpec;
  accumulator: Record<string, unknown>;
  response: string;
  toolCallCount: number;
}

export interface Judge {
  evaluate(input: JudgeInput): JudgeVerdict | Promise<JudgeVerdict>;
}

export function missingOutputs(node: NodeSpec, accumulator: Record<string, unknown>): string[] {
  return node.output_keys.filter((key) => !Object.prototype.hasOwnProperty.call(accumulator, key));
}

/**
 * Accepts once every declared output key has been set. Nodes that declare no
 * outputs are accepted on any non-empty response.
 */
export class OutputKeyJudge implements Judge {
  evaluate({ node, accumulator, response, toolCallCount }: JudgeInput): JudgeVerdict {
    if (node.output_keys.length === 0) {
      if (response.trim().length > 0 || toolCallCount > 0) return { action: "accept" };
      return { action: "retry", feedback: "The previous turn produced no response. Continue the task." };
    }
    const missing = missingOutputs(node, accumulator);
    if (missing.length === 0) return { action: "accept" };
    return {
      action: "retry",
      feedback: `Required outputs are still missing: ${missing.join(", ")}. Call set_output for each of them.`,
    };
  }
}
