/**
 * Dependency graph helpers over service names
 */

export interface GraphNode {
  name: string;
  dependsOn: readonly string[];
}

/**
 * Find a dependency cycle, returned as a closed path (`["a", "b", "a"]`).
 * Edges to undeclared names are ignored.
 */
export function findCycle(nodes: readonly GraphNode[]): string[] | null {
  const byName = new Map(nodes.map((n) => [n.name, n]));
  const state = new Map<string, "visiting" | "done">();
  const stack: string[] = [];

  const visit = (name: string): string[] | null => {
    const current = state.get(name);
    if (current === "done") return null;
    if (current === "visiting") {
      return [...stack.slice(stack.indexOf(name)), name];
    }

    state.set(name, "visiting");
    stack.push(name);

    for (const dep of byName.get(name)?.dependsOn ?? []) {
      if (!byName.has(dep)) continue;
      const cycle = visit(dep);
      if (cycle) return cycle;
    }

    stack.pop();
    state.set(name, "done");
    return null;
  };

  for (const node of nodes) {
    const cycle = visit(node.name);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Order nodes so every node follows its dependencies. Among nodes that are
 * ready at the same time, declaration order wins.
 */
export function topologicalOrder(nodes: readonly GraphNode[]): string[] {
  const declared = new Set(nodes.map((n) => n.name));
  const remaining = new Map(
    nodes.map((n) => [n.name, new Set(n.dependsOn.filter((d) => declared.has(d)))])
  );
  const order: string[] = [];

  while (remaining.size > 0) {
    // Map iteration follows insertion, i.e. declaration order
    const next = [...remaining].find(([, deps]) => deps.size === 0);
    if (!next) {
      const cycle = findCycle(nodes);
      throw new Error(`Dependency cycle: ${(cycle ?? [...remaining.keys()]).join(" -> ")}`);
    }

    const [name] = next;
    order.push(name);
    remaining.delete(name);
    for (const deps of remaining.values()) deps.delete(name);
  }

  return order;
}
