/**
 * pg-plan-insight - Tree Walk and Scoring Primitives
 */

import type { PlanNode } from "../types/index.js";

/**
 * Visit every node of the tree once, parent before children.
 *
 * Uses an explicit stack so deeply nested plans cannot overflow the call
 * stack. Children are visited in plan order.
 */
export function walkPlan(
  root: PlanNode,
  visit: (node: PlanNode, depth: number) => void,
): void {
  const stack: { node: PlanNode; depth: number }[] = [{ node: root, depth: 0 }];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;

    visit(current.node, current.depth);

    const children = current.node.plans;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) {
        stack.push({ node: child, depth: current.depth + 1 });
      }
    }
  }
}

/**
 * Count the nodes in a tree
 */
export function countNodes(root: PlanNode): number {
  let count = 0;
  walkPlan(root, () => {
    count++;
  });
  return count;
}

/**
 * Map a non-negative usage figure onto (0, 1]: 0 → 1, growing usage → 0.
 *
 * `1 / (1 + ln(1 + x))`. Negative input is treated as 0.
 */
export function normalizeUsage(x: number): number {
  const value = x > 0 ? x : 0;
  return 1 / (1 + Math.log1p(value));
}

/**
 * Round to a fixed number of decimal places
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
