/**
 * pg-plan-insight - PostgreSQL Plan Analysis
 *
 * Aggregates EXPLAIN (ANALYZE, BUFFERS, FORMAT JSON) plans, scores them and
 * ranks the operators responsible for the worst inefficiency.
 *
 * @module pg-plan-insight
 */

// Export types
export * from "./types/index.js";

// Export the analysis engine
export * from "./plan/index.js";

// Export query execution
export type { QueryExecutor } from "./executor/interface.js";
export {
  PostgresExecutor,
  PostgresSessionExecutor,
  buildPoolConfig,
} from "./executor/postgres.js";
export {
  runExplain,
  runQuery,
  buildExplainStatement,
  stripTrailingSemicolons,
} from "./executor/explain.js";
export type {
  ExplainOptions,
  ExplainResult,
  RunQueryOptions,
} from "./executor/explain.js";

// Export sampling and evaluation
export { sampleLatencies, median, p95 } from "./sampling/latency.js";
export type { LatencySummary, SampleOptions } from "./sampling/latency.js";
export {
  evaluateQuery,
  SELECT_FALLBACK_TIMEOUT_MS,
} from "./evaluator/evaluate.js";
export type { EvaluateOptions } from "./evaluator/evaluate.js";
export { ArtifactWriter, defaultRunDir } from "./evaluator/artifacts.js";

// Export utilities
export {
  loadSettings,
  resolveDatabaseConfig,
  parseConnectionString,
} from "./config/settings.js";
export type { Settings, Env } from "./config/settings.js";
export { createProgram } from "./cli/program.js";
export { logger } from "./utils/logger.js";
