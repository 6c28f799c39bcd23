/**
 * pg-plan-insight - Plan Analysis Engine
 */

export {
  parsePlanDocument,
  parsePlanEnvelope,
  locatePlan,
  buildPlanTree,
} from "./normalize.js";
export type { LocatedPlan } from "./normalize.js";
export {
  aggregatePlan,
  combinedScore,
  combinedScoreWithTiming,
  DEFAULT_SCORE_WEIGHTS,
  DEFAULT_TIMED_SCORE_WEIGHTS,
} from "./aggregator.js";
export {
  groupBottlenecks,
  severityOf,
  rankBottlenecks,
  truncateFilter,
  DEFAULT_SEVERITY_WEIGHTS,
  DEFAULT_TOP,
  MAX_FILTER_LENGTH,
  UNKNOWN_KEY,
} from "./ranker.js";
export { hintFor, knownHintKinds, GENERIC_HINT } from "./hints.js";
export { formatBottleneckReport } from "./report.js";
export type { ReportOptions } from "./report.js";
export { collectNodeTimings, DEFAULT_TIMING_LIMIT } from "./timing.js";
export { walkPlan, countNodes, normalizeUsage, roundTo } from "./walk.js";
