/**
 * pg-plan-insight - Plan Types
 *
 * In-memory model of an EXPLAIN (FORMAT JSON) plan tree and the
 * structures derived from it by the aggregator and the ranker.
 */

/**
 * A single operator in the execution tree.
 *
 * Numeric attributes default to 0 when the plan omits them or carries a
 * malformed value. Children are kept in plan order.
 */
export interface PlanNode {
  readonly nodeType?: string | undefined;
  readonly relationName?: string | undefined;
  readonly alias?: string | undefined;
  readonly totalCost: number;
  readonly planRows: number;
  readonly actualRows: number;
  readonly actualTotalTime: number;
  readonly sharedReadBlocks: number;
  readonly sharedHitBlocks: number;
  readonly tempReadBlocks: number;
  readonly tempWrittenBlocks: number;
  readonly rowsRemovedByFilter: number;
  readonly filter?: string | undefined;
  readonly plans: readonly PlanNode[];
}

/**
 * Plan plus the envelope fields PostgreSQL emits next to it
 */
export interface PlanEnvelope {
  plan: PlanNode;
  planningTimeMs?: number | undefined;
  executionTimeMs?: number | undefined;
}

/**
 * Counters summed across every node of the tree
 */
export type CounterMetric =
  | "shared_read_total"
  | "shared_hit_total"
  | "temp_read_total"
  | "temp_written_total"
  | "rows_removed_total";

/**
 * Plan-level values taken from the root node only
 */
export type RootMetric =
  | "total_cost_total"
  | "plan_rows_root_sum"
  | "actual_rows_root_sum";

export type MetricName = CounterMetric | RootMetric;

/**
 * Whole-plan totals produced by a single aggregation walk
 */
export interface AggregateMetrics {
  totals: Record<MetricName, number>;
  /** Operator kind → number of nodes of that kind */
  scanTypes: Record<string, number>;
}

/**
 * Weights for the read/cost score blend (no wall-clock sample)
 */
export interface ScoreWeights {
  read: number;
  cost: number;
}

/**
 * Weights for the read/time/cost score blend
 */
export interface TimedScoreWeights {
  read: number;
  time: number;
  cost: number;
}

/**
 * Severity coefficients applied to the log-scaled group counters
 */
export interface SeverityWeights {
  sharedRead: number;
  tempIo: number;
  rowsRemoved: number;
  costK: number;
}

/**
 * Accumulated usage of every node sharing one (operator kind, relation) key
 */
export interface BottleneckGroup {
  nodeType: string;
  relation: string;
  sharedRead: number;
  tempIo: number;
  rowsRemoved: number;
  cost: number;
  count: number;
  /** Filter text → occurrences within the group */
  filters: Map<string, number>;
}

export interface FilterSample {
  text: string;
  count: number;
}

/**
 * One ranked bottleneck, as reported to callers
 */
export interface BottleneckEntry {
  nodeType: string;
  relation: string;
  severity: number;
  sharedRead: number;
  tempIo: number;
  rowsRemoved: number;
  totalCostK: number;
  occurrences: number;
  hint: string;
  filtersSample: FilterSample[];
}

export interface RankedResult {
  entries: BottleneckEntry[];
  /** Clamped cutoff, present when the pareto policy selected the entries */
  paretoCutoff?: number | undefined;
  /** Count limit, present when the top-K policy selected the entries */
  top?: number | undefined;
  groupCount: number;
  totalSeverity: number;
}

export interface RankOptions {
  pareto?: number | null | undefined;
  top?: number | undefined;
  severityWeights?: SeverityWeights | undefined;
}

/**
 * Per-node timing row extracted from a TIMING ON plan
 */
export interface NodeTiming {
  nodeType: string | null;
  relation: string | null;
  actualTotalTime: number;
  actualRows: number;
  planRows: number;
  sharedRead: number;
  tempIo: number;
}
