/**
 * pg-plan-insight - Latency Sampling
 *
 * Repeated wall-clock runs of a query reduced to median and p95. A failed
 * run is recorded as NaN and the batch continues.
 */

import { errorMessage } from "../types/index.js";
import { roundTo } from "../plan/walk.js";
import { logger } from "../utils/logger.js";

const log = logger.forModule("SAMPLER");

export interface SampleOptions {
  /** Number of recorded runs */
  runs: number;
  /** Run once, unrecorded, before sampling (default: true) */
  warmup?: boolean | undefined;
}

export interface LatencySummary {
  /** One entry per recorded run; NaN for a failed run */
  samples: number[];
  /** Successful runs */
  ok: number;
  medianMs?: number | undefined;
  p95Ms?: number | undefined;
  /** Message of the most recent failure, warm-up included */
  lastError?: string | undefined;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? Number.NaN;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? Number.NaN;
  return (lower + upper) / 2;
}

/**
 * 95th percentile as the element at max(0, floor(n * 0.95) - 1) of the
 * ascending values
 */
export function p95(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.max(0, Math.floor(sorted.length * 0.95) - 1);
  return sorted[index] ?? Number.NaN;
}

/**
 * Call `run` repeatedly and summarize the successful durations
 */
export async function sampleLatencies(
  run: () => Promise<number>,
  options: SampleOptions,
): Promise<LatencySummary> {
  const runs = Math.max(0, Math.trunc(options.runs));
  const summary: LatencySummary = { samples: [], ok: 0 };

  if (options.warmup ?? true) {
    try {
      await run();
    } catch (error) {
      summary.lastError = errorMessage(error);
      log.warn("Warm-up run failed", {
        code: "SAMPLE_WARMUP_FAILED",
        error: summary.lastError,
      });
    }
  }

  for (let i = 0; i < runs; i++) {
    try {
      summary.samples.push(await run());
      summary.ok++;
    } catch (error) {
      summary.samples.push(Number.NaN);
      summary.lastError = errorMessage(error);
      log.warn("Sample run failed", {
        code: "SAMPLE_RUN_FAILED",
        run: i + 1,
        error: summary.lastError,
      });
    }
  }

  const succeeded = summary.samples.filter((value) => !Number.isNaN(value));
  if (succeeded.length > 0) {
    summary.medianMs = roundTo(median(succeeded), 3);
    summary.p95Ms = roundTo(p95(succeeded), 3);
  }

  log.debug("Latency sampling finished", {
    runs,
    ok: summary.ok,
    medianMs: summary.medianMs,
  });

  return summary;
}
