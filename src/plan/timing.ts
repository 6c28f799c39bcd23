/**
 * pg-plan-insight - Per-Node Timing
 *
 * Flattens a TIMING ON plan into rows and keeps the slowest operators.
 */

import type { NodeTiming, PlanNode } from "../types/index.js";
import { walkPlan } from "./walk.js";

export const DEFAULT_TIMING_LIMIT = 20;

/**
 * The `limit` nodes with the highest actual total time, slowest first.
 * Ties keep plan order.
 */
export function collectNodeTimings(
  root: PlanNode,
  limit: number = DEFAULT_TIMING_LIMIT,
): NodeTiming[] {
  const rows: NodeTiming[] = [];

  walkPlan(root, (node) => {
    rows.push({
      nodeType: node.nodeType ?? null,
      relation: node.relationName ?? node.alias ?? null,
      actualTotalTime: node.actualTotalTime,
      actualRows: node.actualRows,
      planRows: node.planRows,
      sharedRead: node.sharedReadBlocks,
      tempIo: node.tempReadBlocks + node.tempWrittenBlocks,
    });
  });

  return rows
    .sort((a, b) => b.actualTotalTime - a.actualTotalTime)
    .slice(0, Math.max(0, limit));
}
