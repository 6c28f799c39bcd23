/**
 * pg-plan-insight - Plan Aggregator
 *
 * Whole-plan resource totals and the combined heuristic score.
 */

import type {
  AggregateMetrics,
  CounterMetric,
  PlanNode,
  ScoreWeights,
  TimedScoreWeights,
} from "../types/index.js";
import { normalizeUsage, roundTo, walkPlan } from "./walk.js";

/** Read-dominant blend used until a wall-clock sample exists */
export const DEFAULT_SCORE_WEIGHTS: Readonly<ScoreWeights> = {
  read: 0.85,
  cost: 0.15,
};

export const DEFAULT_TIMED_SCORE_WEIGHTS: Readonly<TimedScoreWeights> = {
  read: 0.5,
  time: 0.4,
  cost: 0.1,
};

const MIN_WEIGHT_SUM = 1e-9;

/**
 * Total → the node counter summed into it
 */
const COUNTER_SOURCES: readonly (readonly [
  CounterMetric,
  (node: PlanNode) => number,
])[] = [
  ["shared_read_total", (node) => node.sharedReadBlocks],
  ["shared_hit_total", (node) => node.sharedHitBlocks],
  ["temp_read_total", (node) => node.tempReadBlocks],
  ["temp_written_total", (node) => node.tempWrittenBlocks],
  ["rows_removed_total", (node) => node.rowsRemovedByFilter],
];

/**
 * Sum the buffer, temp-file and filter counters over every node and record
 * the root's cost and row estimates.
 */
export function aggregatePlan(root: PlanNode): AggregateMetrics {
  const totals: AggregateMetrics["totals"] = {
    shared_read_total: 0,
    shared_hit_total: 0,
    temp_read_total: 0,
    temp_written_total: 0,
    rows_removed_total: 0,
    total_cost_total: 0,
    plan_rows_root_sum: 0,
    actual_rows_root_sum: 0,
  };
  const scanTypes: Record<string, number> = {};

  walkPlan(root, (node) => {
    for (const [metric, read] of COUNTER_SOURCES) {
      totals[metric] += read(node);
    }
    if (node.nodeType !== undefined) {
      scanTypes[node.nodeType] = (scanTypes[node.nodeType] ?? 0) + 1;
    }
  });

  // Plan-level figures come from the root only
  totals.total_cost_total = root.totalCost;
  totals.plan_rows_root_sum = root.planRows;
  totals.actual_rows_root_sum = root.actualRows;

  return { totals, scanTypes };
}

/**
 * Blend the read and cost sub-scores. Result is in (0, 1].
 */
export function combinedScore(
  metrics: AggregateMetrics,
  weights: ScoreWeights = DEFAULT_SCORE_WEIGHTS,
): number {
  const sum = Math.max(weights.read + weights.cost, MIN_WEIGHT_SUM);
  const readScore = normalizeUsage(metrics.totals.shared_read_total);
  const costScore = normalizeUsage(metrics.totals.total_cost_total);

  return (weights.read / sum) * readScore + (weights.cost / sum) * costScore;
}

/**
 * Blend read, wall-clock and cost sub-scores once a median latency is known.
 *
 * Weights are re-normalized to sum to 1 whatever was supplied.
 */
export function combinedScoreWithTiming(
  metrics: AggregateMetrics,
  medianMs: number,
  weights: TimedScoreWeights = DEFAULT_TIMED_SCORE_WEIGHTS,
): number {
  const sum = Math.max(
    weights.read + weights.time + weights.cost,
    MIN_WEIGHT_SUM,
  );
  const readScore = normalizeUsage(metrics.totals.shared_read_total);
  const timeScore = normalizeUsage(medianMs);
  const costScore = normalizeUsage(metrics.totals.total_cost_total);

  return roundTo(
    (weights.read / sum) * readScore +
      (weights.time / sum) * timeScore +
      (weights.cost / sum) * costScore,
    12,
  );
}
