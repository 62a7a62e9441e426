/**
 * Ordering and cycle detection over field-to-field key dependencies.
 */

/** A field and the fields it is computed from. */
export interface DependencyNode {
  readonly name: string;
  readonly dependsOn: readonly string[];
}

/**
 * Finds every distinct dependency cycle. Each cycle is returned as the path
 * that closes it, e.g. `["a", "b", "a"]`. Self-references are left to the
 * caller and not reported here.
 */
export const findCycles = (
  nodes: readonly DependencyNode[],
): readonly (readonly string[])[] => {
  const edges = new Map(nodes.map((n) => [n.name, n.dependsOn]));
  const visited = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const cycles: string[][] = [];
  const seen = new Set<string>();

  const visit = (name: string): void => {
    visited.add(name);
    stack.push(name);
    onStack.add(name);

    for (const next of edges.get(name) ?? []) {
      if (next === name) continue;
      if (onStack.has(next)) {
        const cycle = [...stack.slice(stack.indexOf(next)), next];
        const signature = [...new Set(cycle)].sort().join("\u0000");
        if (!seen.has(signature)) {
          seen.add(signature);
          cycles.push(cycle);
        }
      } else if (!visited.has(next) && edges.has(next)) {
        visit(next);
      }
    }

    stack.pop();
    onStack.delete(name);
  };

  for (const node of nodes) {
    if (!visited.has(node.name)) visit(node.name);
  }
  return cycles;
};

/**
 * Orders nodes so every node comes after the nodes it depends on. Ties keep
 * declaration order. Dependencies on names outside `nodes` are ignored.
 * Must only be called on an acyclic graph.
 *
 * @example
 * ```ts
 * topologicalOrder([
 *   { name: "pk", dependsOn: ["tenantKey"] },
 *   { name: "tenantKey", dependsOn: ["tenantId"] },
 * ]);
 * // ["tenantKey", "pk"]
 * ```
 */
export const topologicalOrder = (
  nodes: readonly DependencyNode[],
): readonly string[] => {
  const edges = new Map(nodes.map((n) => [n.name, n.dependsOn]));
  const done = new Set<string>();
  const order: string[] = [];

  const place = (name: string): void => {
    if (done.has(name)) return;
    done.add(name);
    for (const dep of edges.get(name) ?? []) {
      if (dep !== name && edges.has(dep)) place(dep);
    }
    order.push(name);
  };

  for (const node of nodes) place(node.name);
  return order;
};
