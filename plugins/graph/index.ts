// ---------------------------------------------------------------------------
// Graph-based composition
// ---------------------------------------------------------------------------
// Declarative DAG API that compiles down to the FlowBuilder DSL.
//
//   graph<TurnState>()
//     .addNode("identify", identify)
//     .addNode("search", search)
//     .addNode("web", web)
//     .addNode("weather", weather)
//     .addEdge("identify", "search")
//     .addEdge("search", "web", (s) => s.needsWebSearch)
//     .addEdge("search", "weather", (s) => !s.needsWebSearch)
//     .addEdge("web", "weather")
//     .compile();
// ---------------------------------------------------------------------------

import { FlowBuilder } from "../../src";
import type { FlowParams, NodeFn, NodeOptions } from "../../src";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type EdgeCondition<S, P extends FlowParams = FlowParams> = (
  shared: S,
  params: P,
) => boolean | Promise<boolean>;

export interface GraphNode<S, P extends FlowParams = FlowParams> {
  name: string;
  fn: NodeFn<S, P>;
  options?: NodeOptions;
}

export interface GraphEdge<S, P extends FlowParams = FlowParams> {
  from: string;
  to: string;
  /** If provided, the edge is only followed when the condition returns true. */
  condition?: EdgeCondition<S, P>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Topological sort
// ─────────────────────────────────────────────────────────────────────────────

function topologicalOrder<S, P extends FlowParams>(
  nodes: Map<string, GraphNode<S, P>>,
  edges: GraphEdge<S, P>[],
): string[] {
  const adj = new Map<string, string[]>();
  const inDegree = new Map<string, number>();
  for (const name of nodes.keys()) {
    adj.set(name, []);
    inDegree.set(name, 0);
  }
  for (const e of edges) {
    adj.get(e.from)?.push(e.to);
    inDegree.set(e.to, (inDegree.get(e.to) ?? 0) + 1);
  }

  // Kahn's algorithm; registration order breaks ties
  const queue: string[] = [];
  for (const [name, deg] of inDegree) {
    if (deg === 0) queue.push(name);
  }

  const order: string[] = [];
  for (let node = queue.shift(); node !== undefined; node = queue.shift()) {
    order.push(node);
    for (const next of adj.get(node) ?? []) {
      const deg = (inDegree.get(next) ?? 1) - 1;
      inDegree.set(next, deg);
      if (deg === 0) queue.push(next);
    }
  }

  if (order.length !== nodes.size) {
    const missing = [...nodes.keys()].filter((n) => !order.includes(n));
    throw new Error(
      `Graph has cycles involving: ${missing.join(", ")}. Pipelines must be acyclic.`,
    );
  }
  return order;
}

// ─────────────────────────────────────────────────────────────────────────────
// FlowGraph
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A directed acyclic graph of named steps.
 *
 * A node runs when it has no inbound edges, or when at least one inbound
 * edge comes from a node that ran during this run and that edge's condition
 * (if any) holds at the moment the node is reached. Nodes that do not run
 * are skipped silently.
 */
export class FlowGraph<S extends object, P extends FlowParams = FlowParams> {
  private nodes = new Map<string, GraphNode<S, P>>();
  private edges: GraphEdge<S, P>[] = [];

  /** Add a named node. Nodes only execute once the graph is compiled. */
  addNode(name: string, fn: NodeFn<S, P>, options?: NodeOptions): this {
    if (this.nodes.has(name)) {
      throw new Error(`Graph node "${name}" already exists`);
    }
    this.nodes.set(name, { name, fn, options });
    return this;
  }

  /** Add a directed edge, optionally guarded by `condition`. */
  addEdge(from: string, to: string, condition?: EdgeCondition<S, P>): this {
    this.edges.push({ from, to, condition });
    return this;
  }

  /** Node names in execution order. */
  order(): string[] {
    this.validate();
    return topologicalOrder(this.nodes, this.edges);
  }

  /**
   * Compile the nodes and edges into an executable flow. Each node becomes
   * one labelled branch step that either runs the node or skips it.
   */
  compile(into: FlowBuilder<S, P> = new FlowBuilder<S, P>()): FlowBuilder<S, P> {
    const order = this.order();

    // Which nodes ran, per shared-state object, so one compiled graph can
    // serve concurrent runs.
    const ran = new WeakMap<S, Set<string>>();
    const ranIn = (shared: S) => {
      let set = ran.get(shared);
      if (!set) {
        set = new Set();
        ran.set(shared, set);
      }
      return set;
    };

    for (const name of order) {
      const node = this.nodes.get(name);
      if (!node) continue;
      const inbound = this.edges.filter((e) => e.to === name);

      const router = async (shared: S, params: P) => {
        const seen = ranIn(shared);
        if (inbound.length > 0) {
          let reachable = false;
          for (const e of inbound) {
            if (!seen.has(e.from)) continue;
            if (!e.condition || (await e.condition(shared, params))) {
              reachable = true;
              break;
            }
          }
          if (!reachable) return "skip";
        }
        seen.add(name);
        return "run";
      };

      into.branch(router, { run: node.fn }, {
        ...node.options,
        label: node.options?.label ?? name,
      });
    }

    // Last step releases the bookkeeping for this run.
    into.then((shared) => {
      ran.delete(shared);
    });

    return into;
  }

  private validate(): void {
    if (this.nodes.size === 0) {
      throw new Error("Cannot compile an empty graph");
    }
    for (const e of this.edges) {
      if (!this.nodes.has(e.from))
        throw new Error(`Edge references unknown node "${e.from}"`);
      if (!this.nodes.has(e.to))
        throw new Error(`Edge references unknown node "${e.to}"`);
    }
  }
}

/** Create an empty `FlowGraph`. */
export function graph<S extends object, P extends FlowParams = FlowParams>(): FlowGraph<S, P> {
  return new FlowGraph<S, P>();
}
