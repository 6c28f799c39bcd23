/**
 * pg-plan-insight - Query Evaluation
 *
 * Runs EXPLAIN for one query, aggregates and scores the plan, and
 * optionally samples wall-clock latency, collects a timing plan and ranks
 * bottlenecks. Every step's output is written to the run directory.
 */

import type { QueryExecutor } from "../executor/interface.js";
import { runExplain, runQuery } from "../executor/explain.js";
import {
  aggregatePlan,
  combinedScore,
  combinedScoreWithTiming,
} from "../plan/aggregator.js";
import { rankBottlenecks } from "../plan/ranker.js";
import { formatBottleneckReport } from "../plan/report.js";
import { collectNodeTimings } from "../plan/timing.js";
import { sampleLatencies } from "../sampling/latency.js";
import type {
  AggregateMetrics,
  EvaluationMetrics,
  EvaluationResult,
  ScoreWeights,
  TimedScoreWeights,
} from "../types/index.js";
import { logger } from "../utils/logger.js";
import { ArtifactWriter } from "./artifacts.js";

const log = logger.forModule("EVALUATOR");

export const PLAN_FILE = "plan.json";
export const METRICS_FILE = "metrics.json";
export const PLAN_TIMING_FILE = "plan_timing.json";
export const NODE_TIMES_FILE = "per_node_top_time.json";
export const BOTTLENECKS_FILE = "bottlenecks.md";

export interface EvaluateOptions {
  /** Directory receiving the artifacts of this run */
  outDir: string;
  /** Statement timeout in seconds; null disables it */
  timeoutSec: number | null;
  /**
   * Timed runs after one warm-up; 0 skips sampling. Each run is limited by
   * the statement timeout, or SELECT_FALLBACK_TIMEOUT_MS when it is null.
   */
  selectRuns?: number | undefined;
  /** Also collect a TIMING ON plan and the slowest nodes */
  timing?: boolean | undefined;
  attachBottlenecks?: boolean | undefined;
  bottlenecksPareto?: number | null | undefined;
  bottlenecksTop?: number | undefined;
  scoreWeights?: ScoreWeights | undefined;
  timedScoreWeights?: TimedScoreWeights | undefined;
}

/** Limit for each timed run when the statement timeout is disabled */
export const SELECT_FALLBACK_TIMEOUT_MS = 60000;

function toTimeoutMs(timeoutSec: number | null): number | undefined {
  return timeoutSec === null ? undefined : timeoutSec * 1000;
}

function initialMetrics(
  aggregate: AggregateMetrics,
  weights: ScoreWeights | undefined,
): EvaluationMetrics {
  return {
    ...aggregate.totals,
    scan_types: aggregate.scanTypes,
    timeouts: 0,
    combined_score: combinedScore(aggregate, weights),
  };
}

/**
 * Evaluate one SQL query against the database behind `executor`
 */
export async function evaluateQuery(
  executor: QueryExecutor,
  sqlText: string,
  options: EvaluateOptions,
): Promise<EvaluationResult> {
  const writer = new ArtifactWriter(options.outDir);
  const timeoutMs = toTimeoutMs(options.timeoutSec);

  log.info("Evaluating query", {
    operation: "evaluateQuery",
    entityId: options.outDir,
    timeoutMs,
  });

  const explain = await runExplain(executor, sqlText, { timeoutMs });
  const plan = explain.envelope.plan;
  const planPath = await writer.writeJson(PLAN_FILE, { Plan: explain.rawPlan });

  const aggregate = aggregatePlan(plan);
  const metrics = initialMetrics(aggregate, options.scoreWeights);
  const metricsPath = writer.pathFor(METRICS_FILE);

  const result: EvaluationResult = {
    metrics,
    artifacts: {
      runDir: options.outDir,
      planPath,
      metricsPath,
      explainElapsedMs: explain.elapsedMs,
    },
  };
  await writer.writeJson(METRICS_FILE, result);

  const selectRuns = options.selectRuns ?? 0;
  if (selectRuns > 0) {
    const selectTimeoutMs = timeoutMs ?? SELECT_FALLBACK_TIMEOUT_MS;
    const summary = await sampleLatencies(
      () => runQuery(executor, sqlText, { timeoutMs: selectTimeoutMs }),
      { runs: selectRuns },
    );

    if (summary.lastError !== undefined) {
      metrics.select_error = summary.lastError;
    }
    if (summary.medianMs !== undefined && summary.p95Ms !== undefined) {
      metrics.select_runs = selectRuns;
      metrics.select_median_ms = summary.medianMs;
      metrics.select_p95_ms = summary.p95Ms;
      metrics.combined_score = combinedScoreWithTiming(
        aggregate,
        summary.medianMs,
        options.timedScoreWeights,
      );
    }
    await writer.writeJson(METRICS_FILE, result);
  }

  if (options.timing === true) {
    const timed = await runExplain(executor, sqlText, {
      timeoutMs,
      timing: true,
    });
    const nodeTimings = collectNodeTimings(timed.envelope.plan);

    result.artifacts.planTimingPath = await writer.writeJson(PLAN_TIMING_FILE, {
      Plan: timed.rawPlan,
    });
    result.artifacts.perNodeTopTimePath = await writer.writeJson(
      NODE_TIMES_FILE,
      nodeTimings,
    );
    result.nodeTimings = nodeTimings;
    metrics.timing_plan_elapsed_ms = timed.elapsedMs;
    metrics.timing_available = true;
    await writer.writeJson(METRICS_FILE, result);
  }

  if (options.attachBottlenecks === true) {
    const ranked = rankBottlenecks(plan, {
      pareto: options.bottlenecksPareto,
      top: options.bottlenecksTop,
    });
    const report = formatBottleneckReport(ranked, { planName: PLAN_FILE });

    result.bottlenecks = ranked;
    result.artifacts.bottlenecksMd = report;
    result.artifacts.bottlenecksPath = await writer.writeText(
      BOTTLENECKS_FILE,
      report,
    );
    await writer.writeJson(METRICS_FILE, result);
  }

  log.info("Evaluation finished", {
    operation: "evaluateQuery",
    combinedScore: metrics.combined_score,
  });

  return result;
}
