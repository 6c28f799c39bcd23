/**
 * pg-plan-insight - EXPLAIN and Timed Query Runs
 */

import { performance } from "node:perf_hooks";
import type { QueryExecutor } from "./interface.js";
import type { PlanEnvelope } from "../types/index.js";
import { PlanParseError, errorMessage } from "../types/index.js";
import { buildPlanTree, locatePlan } from "../plan/normalize.js";
import { logger } from "../utils/logger.js";

const log = logger.forModule("EXECUTOR");

export interface ExplainOptions {
  /** Statement timeout in milliseconds; absent or 0 means no limit */
  timeoutMs?: number | undefined;
  /** Collect per-node timings (TIMING ON, track_io_timing) */
  timing?: boolean | undefined;
}

export interface ExplainResult {
  envelope: PlanEnvelope;
  /** The root plan object exactly as the server returned it */
  rawPlan: Record<string, unknown>;
  elapsedMs: number;
}

export interface RunQueryOptions {
  timeoutMs?: number | undefined;
}

/** Session settings applied before a timing EXPLAIN and reset after it */
const TIMING_SETTINGS = ["track_io_timing", "enable_incremental_sort"] as const;

/**
 * Remove trailing whitespace and semicolons so the text can be embedded
 * after an EXPLAIN prefix
 */
export function stripTrailingSemicolons(sql: string): string {
  return sql.trim().replace(/[;\s]+$/, "");
}

export function buildExplainStatement(sql: string, timing = false): string {
  const options = [
    "ANALYZE",
    "BUFFERS",
    "COSTS ON",
    timing ? "TIMING ON" : "TIMING OFF",
    "FORMAT JSON",
  ];
  return `EXPLAIN (${options.join(", ")})\n${stripTrailingSemicolons(sql)}`;
}

/**
 * Run EXPLAIN ANALYZE for a query and parse the returned plan.
 *
 * The query is executed by the server. Driver errors (including statement
 * timeouts) reject with a QueryError carrying the server's message.
 */
export async function runExplain(
  executor: QueryExecutor,
  sql: string,
  options: ExplainOptions = {},
): Promise<ExplainResult> {
  const timing = options.timing ?? false;
  const session = await executor.createSession();

  try {
    if (timing) {
      for (const setting of TIMING_SETTINGS) {
        await session.execute(`SET ${setting} = on`);
      }
    }

    const start = performance.now();
    const result = await session.execute(
      buildExplainStatement(sql, timing),
      undefined,
      { timeoutMs: options.timeoutMs },
    );
    const elapsedMs = Math.round(performance.now() - start);

    const row = result.rows[0];
    if (row === undefined || !("QUERY PLAN" in row)) {
      throw new PlanParseError("EXPLAIN returned no plan row", {
        rowCount: result.rows.length,
      });
    }

    const located = locatePlan(row["QUERY PLAN"]);
    const envelope: PlanEnvelope = {
      plan: buildPlanTree(located.raw),
      planningTimeMs: located.planningTimeMs,
      executionTimeMs: located.executionTimeMs,
    };

    log.debug("EXPLAIN completed", {
      operation: "runExplain",
      elapsedMs,
      timing,
    });

    return { envelope, rawPlan: located.raw, elapsedMs };
  } catch (error) {
    log.error("EXPLAIN failed", {
      code: "PG_EXPLAIN_FAILED",
      operation: "runExplain",
      error: errorMessage(error),
    });
    throw error;
  } finally {
    if (timing) {
      for (const setting of TIMING_SETTINGS) {
        await session.execute(`RESET ${setting}`).catch((error: unknown) => {
          log.warn("Failed to reset session setting", {
            code: "PG_RESET_FAILED",
            setting,
            error: errorMessage(error),
          });
        });
      }
    }
    await session.disconnect();
  }
}

/**
 * Execute a query once and return its wall-clock duration in milliseconds
 */
export async function runQuery(
  executor: QueryExecutor,
  sql: string,
  options: RunQueryOptions = {},
): Promise<number> {
  const start = performance.now();
  await executor.execute(stripTrailingSemicolons(sql), undefined, {
    timeoutMs: options.timeoutMs,
  });
  return performance.now() - start;
}
