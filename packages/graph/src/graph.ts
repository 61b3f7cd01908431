import type { EntryPointSpec, NodeSpec, WorkflowGraph } from "@switchyard/schemas";
import {
  GraphValidationError,
  UnknownEntryPointError,
  isWorkflowGraph,
  validateGraphData,
} from "@switchyard/schemas";

export interface GraphValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  /** Node ids not reachable from any entry candidate. */
  unreachable: string[];
}

export interface MaterializeOptions {
  /** Node the effective graph starts from. Defaults to the source's `entry_node`. */
  entryNode?: string;
}

/** Every node with no incoming edges, in declaration order. */
export function findEntryCandidates(graph: WorkflowGraph): string[] {
  const targets = new Set(graph.edges.map((e) => e.target));
  return graph.nodes.filter((n) => !targets.has(n.id)).map((n) => n.id);
}

export function getNode(graph: WorkflowGraph, nodeId: string): NodeSpec | undefined {
  return graph.nodes.find((n) => n.id === nodeId);
}

/** Next node along the first outgoing edge, or null at a terminal node. */
export function successorOf(graph: WorkflowGraph, nodeId: string): string | null {
  return graph.edges.find((e) => e.source === nodeId)?.target ?? null;
}

/** Breadth-first walk over outgoing edges from every start node. */
export function reachableFrom(graph: WorkflowGraph, starts: string[]): Set<string> {
  const adjacency = new Map<string, string[]>();
  for (const edge of graph.edges) {
    const list = adjacency.get(edge.source) ?? [];
    list.push(edge.target);
    adjacency.set(edge.source, list);
  }
  const visited = new Set<string>(starts);
  const queue = [...starts];
  for (let node = queue.shift(); node !== undefined; node = queue.shift()) {
    for (const next of adjacency.get(node) ?? []) {
      if (!visited.has(next)) {
        visited.add(next);
        queue.push(next);
      }
    }
  }
  return visited;
}

export function validateGraph(data: unknown): GraphValidationResult {
  if (!isWorkflowGraph(data)) {
    return { valid: false, errors: validateGraphData(data).errors, warnings: [], unreachable: [] };
  }
  const graph = data;
  const errors: string[] = [];
  const warnings: string[] = [];

  const ids = new Set<string>();
  for (const node of graph.nodes) {
    if (ids.has(node.id)) errors.push(`Duplicate node id "${node.id}"`);
    ids.add(node.id);
  }

  const incoming = new Map<string, number>();
  const outgoing = new Map<string, number>();
  for (const edge of graph.edges) {
    if (!ids.has(edge.source)) errors.push(`Edge source "${edge.source}" is not a node`);
    if (!ids.has(edge.target)) errors.push(`Edge target "${edge.target}" is not a node`);
    incoming.set(edge.target, (incoming.get(edge.target) ?? 0) + 1);
    outgoing.set(edge.source, (outgoing.get(edge.source) ?? 0) + 1);
  }

  if (!ids.has(graph.entry_node)) {
    errors.push(`Entry node "${graph.entry_node}" is not a node`);
  } else if (incoming.has(graph.entry_node)) {
    errors.push(`Entry node "${graph.entry_node}" has incoming edges`);
  }

  const declared = new Set<string>([graph.entry_node]);
  for (const entry of graph.metadata.async_entry_points) {
    if (entry.kind !== "async") {
      errors.push(`Async entry point "${entry.id}" must declare kind "async"`);
    }
    if (declared.has(entry.id)) {
      errors.push(`Entry point "${entry.id}" is declared more than once`);
      continue;
    }
    declared.add(entry.id);
    if (!ids.has(entry.id)) {
      errors.push(`Async entry point "${entry.id}" is not a node`);
    } else if (incoming.has(entry.id)) {
      errors.push(`Async entry point "${entry.id}" has incoming edges`);
    }
  }

  const candidates = findEntryCandidates(graph);
  for (const candidate of candidates) {
    if (!declared.has(candidate)) {
      warnings.push(`Node "${candidate}" has no incoming edges but is not a declared entry point`);
    }
  }
  for (const [source, count] of outgoing) {
    if (count > 1) warnings.push(`Node "${source}" has ${count} outgoing edges; only the first is followed`);
  }

  const reachable = reachableFrom(graph, candidates);
  const unreachable = graph.nodes.map((n) => n.id).filter((id) => !reachable.has(id));
  for (const id of unreachable) {
    errors.push(`Node "${id}" is unreachable from every entry point`);
  }

  return { valid: errors.length === 0, errors, warnings, unreachable };
}

/** Validates a graph document and returns it typed, or throws `GraphValidationError`. */
export function loadGraph(data: unknown): WorkflowGraph {
  const result = validateGraph(data);
  if (!result.valid || !isWorkflowGraph(data)) throw new GraphValidationError(result.errors);
  return data;
}

/**
 * Builds the graph an execution runs: the nodes reachable from the chosen
 * entry node and the edges between them. Graph-level metadata is copied
 * verbatim; conversation continuity and async routing depend on it.
 */
export function materializeGraph(source: WorkflowGraph, options: MaterializeOptions = {}): WorkflowGraph {
  const entryNode = options.entryNode ?? source.entry_node;
  if (!getNode(source, entryNode)) {
    throw new UnknownEntryPointError(entryNode, source.graph_id);
  }
  const keep = reachableFrom(source, [entryNode]);
  return {
    graph_id: source.graph_id,
    entry_node: entryNode,
    nodes: source.nodes.filter((n) => keep.has(n.id)).map((n) => structuredClone(n)),
    edges: source.edges.filter((e) => keep.has(e.source) && keep.has(e.target)).map((e) => ({ ...e })),
    metadata: structuredClone(source.metadata),
  };
}

/**
 * Resolves a trigger target to its entry point declaration. The primary entry
 * declares no input keys: it consumes the whole session memory.
 */
export function resolveEntryPoint(graph: WorkflowGraph, target: string): EntryPointSpec {
  if (target === graph.entry_node) {
    return { id: graph.entry_node, kind: "primary", input_keys: [] };
  }
  const entry = graph.metadata.async_entry_points.find((e) => e.id === target);
  if (!entry || !getNode(graph, entry.id)) {
    throw new UnknownEntryPointError(target, graph.graph_id);
  }
  return { id: entry.id, kind: "async", input_keys: [...entry.input_keys] };
}
