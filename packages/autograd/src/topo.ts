/**
 * Topological ordering of the operand DAG.
 *
 * Post-order depth-first walk over an explicit stack. Nodes are tracked by
 * identity: two distinct nodes holding equal values are distinct members.
 */

export interface GraphNode<T> {
  readonly operands: readonly T[];
}

interface Frame<T> {
  readonly node: T;
  /** Index of the next operand to visit. */
  next: number;
}

/**
 * Every node reachable from `root`, each appearing after all of its operands.
 * `root` is always last.
 */
export function topologicalOrder<T extends GraphNode<T>>(root: T): T[] {
  const order: T[] = [];
  const visited = new Set<T>([root]);
  const stack: Frame<T>[] = [{ node: root, next: 0 }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const operands = frame.node.operands;
    if (frame.next < operands.length) {
      const child = operands[frame.next++];
      if (!visited.has(child)) {
        visited.add(child);
        stack.push({ node: child, next: 0 });
      }
    } else {
      stack.pop();
      order.push(frame.node);
    }
  }
  return order;
}
