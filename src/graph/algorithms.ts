/**
 * Graph Algorithms
 * @module graph/algorithms
 *
 * Tarjan's strongly connected components over an adjacency mapping, O(V+E).
 */

export type Adjacency = ReadonlyMap<string, readonly string[]>;

export interface StronglyConnectedComponent {
  readonly nodes: readonly string[];
  /** More than one node, or a single node with an edge to itself */
  readonly isCycle: boolean;
}

/**
 * Components are returned so that every component comes after all
 * components reachable from it (successors first)
 */
export function tarjanSCC(nodes: Iterable<string>, adjacency: Adjacency): StronglyConnectedComponent[] {
  const index = new Map<string, number>();
  const lowlink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const sccs: StronglyConnectedComponent[] = [];
  let currentIndex = 0;

  function strongconnect(nodeId: string): void {
    index.set(nodeId, currentIndex);
    lowlink.set(nodeId, currentIndex);
    currentIndex++;
    stack.push(nodeId);
    onStack.add(nodeId);

    for (const successor of adjacency.get(nodeId) ?? []) {
      const visited = index.get(successor);
      if (visited === undefined) {
        strongconnect(successor);
        lowlink.set(nodeId, Math.min(lowlink.get(nodeId) ?? 0, lowlink.get(successor) ?? 0));
      } else if (onStack.has(successor)) {
        lowlink.set(nodeId, Math.min(lowlink.get(nodeId) ?? 0, visited));
      }
    }

    if (lowlink.get(nodeId) === index.get(nodeId)) {
      const scc: string[] = [];
      let member = stack.pop();
      while (member !== undefined) {
        onStack.delete(member);
        scc.push(member);
        if (member === nodeId) break;
        member = stack.pop();
      }

      sccs.push({
        nodes: scc,
        isCycle: scc.length > 1 || (adjacency.get(nodeId) ?? []).includes(nodeId),
      });
    }
  }

  for (const node of nodes) {
    if (!index.has(node)) {
      strongconnect(node);
    }
  }

  return sccs;
}

/**
 * Cyclic components only
 */
export function findCycles(nodes: Iterable<string>, adjacency: Adjacency): string[][] {
  return tarjanSCC(nodes, adjacency)
    .filter((scc) => scc.isCycle)
    .map((scc) => [...scc.nodes]);
}
