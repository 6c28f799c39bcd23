/**
 * pg-plan-insight - Evaluation Types
 */

import type { MetricName, NodeTiming, RankedResult } from "./plan.js";

/**
 * Metrics recorded for one evaluated query. Keys are snake_case because
 * they are written to metrics.json as-is.
 */
export type EvaluationMetrics = Record<MetricName, number> & {
  scan_types: Record<string, number>;
  timeouts: number;
  /** Combined score in (0, 1]; higher is better */
  combined_score: number;
  select_runs?: number | undefined;
  select_median_ms?: number | undefined;
  select_p95_ms?: number | undefined;
  select_error?: string | undefined;
  timing_plan_elapsed_ms?: number | undefined;
  timing_available?: boolean | undefined;
};

export interface EvaluationArtifacts {
  runDir: string;
  planPath: string;
  metricsPath: string;
  explainElapsedMs: number;
  planTimingPath?: string | undefined;
  perNodeTopTimePath?: string | undefined;
  bottlenecksPath?: string | undefined;
  bottlenecksMd?: string | undefined;
}

export interface EvaluationResult {
  metrics: EvaluationMetrics;
  artifacts: EvaluationArtifacts;
  bottlenecks?: RankedResult | undefined;
  nodeTimings?: NodeTiming[] | undefined;
}
