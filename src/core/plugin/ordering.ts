/**
 * Plugin ordering constraints.
 *
 * Every relative registration ("A before B", "A after B") adds an edge
 * to a per-category graph of plugin keys. An edge that would close a
 * cycle is rejected at install time.
 */

import { PluginOrderingCycleError } from '../pipeline-error.js';
import type { HookCategory } from './types.js';

type Graph = Map<string, Set<string>>;

export class OrderingConstraints {
  private readonly graphs = new Map<HookCategory, Graph>();

  /**
   * Record that `earlier` runs before `later` for `category`.
   *
   * @throws PluginOrderingCycleError if `later` already runs before `earlier`.
   */
  require(category: HookCategory, earlier: string, later: string): void {
    const graph = this.graphFor(category);

    const path = earlier === later ? [later] : findPath(graph, later, earlier);
    if (path) {
      throw new PluginOrderingCycleError(category, [earlier, ...path]);
    }

    const successors = graph.get(earlier) ?? new Set<string>();
    successors.add(later);
    graph.set(earlier, successors);
  }

  /** Independent copy, for trying edges without committing them. */
  copy(): OrderingConstraints {
    const copy = new OrderingConstraints();
    for (const [category, graph] of this.graphs) {
      const cloned: Graph = new Map();
      for (const [key, successors] of graph) cloned.set(key, new Set(successors));
      copy.graphs.set(category, cloned);
    }
    return copy;
  }

  /** Plugins `key` must run before, for `category`. */
  successors(category: HookCategory, key: string): string[] {
    return [...(this.graphs.get(category)?.get(key) ?? [])];
  }

  private graphFor(category: HookCategory): Graph {
    let graph = this.graphs.get(category);
    if (!graph) {
      graph = new Map();
      this.graphs.set(category, graph);
    }
    return graph;
  }
}

/** Depth-first path from `from` to `to`, both included. */
function findPath(graph: Graph, from: string, to: string): string[] | null {
  const visited = new Set<string>();

  const visit = (node: string): string[] | null => {
    if (node === to) return [node];
    if (visited.has(node)) return null;
    visited.add(node);

    for (const next of graph.get(node) ?? []) {
      const rest = visit(next);
      if (rest) return [node, ...rest];
    }
    return null;
  };

  return visit(from);
}
