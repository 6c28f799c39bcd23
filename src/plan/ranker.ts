/**
 * pg-plan-insight - Bottleneck Ranker
 *
 * Groups plan nodes by (operator kind, relation), scores each group and
 * keeps the worst offenders by cumulative severity share or a fixed count.
 */

import type {
  BottleneckEntry,
  BottleneckGroup,
  FilterSample,
  PlanNode,
  RankOptions,
  RankedResult,
  SeverityWeights,
} from "../types/index.js";
import { logger } from "../utils/logger.js";
import { hintFor } from "./hints.js";
import { clamp, roundTo, walkPlan } from "./walk.js";

const log = logger.forModule("RANKER");

/**
 * Physical reads dominate, then temp spill, then filter waste, then planner
 * cost. A priority ordering, not a measured model; callers may override it.
 */
export const DEFAULT_SEVERITY_WEIGHTS: Readonly<SeverityWeights> = {
  sharedRead: 3,
  tempIo: 2,
  rowsRemoved: 1.5,
  costK: 1,
};

export const DEFAULT_TOP = 5;

/** Placeholder for a missing operator kind or relation */
export const UNKNOWN_KEY = "?";

export const MAX_FILTER_LENGTH = 140;

const FILTER_SAMPLE_SIZE = 2;

/**
 * Collapse newlines and cap a filter expression at MAX_FILTER_LENGTH
 * code points, marking the cut with an ellipsis.
 */
export function truncateFilter(filter: string): string {
  const flat = filter.replace(/\n/g, " ");
  // Array.from splits by code point, so surrogate pairs stay whole
  const chars = Array.from(flat);
  return chars.length > MAX_FILTER_LENGTH
    ? `${chars.slice(0, MAX_FILTER_LENGTH).join("")}…`
    : flat;
}

/**
 * Accumulate every node into the group for its (kind, relation) key.
 * Groups come back in first-seen (pre-order) order.
 */
export function groupBottlenecks(root: PlanNode): BottleneckGroup[] {
  const groups = new Map<string, BottleneckGroup>();

  walkPlan(root, (node) => {
    const nodeType = node.nodeType ?? UNKNOWN_KEY;
    const relation = node.relationName ?? node.alias ?? UNKNOWN_KEY;
    // JSON encoding keeps ("a b", "c") and ("a", "b c") apart
    const id = JSON.stringify([nodeType, relation]);

    let group = groups.get(id);
    if (group === undefined) {
      group = {
        nodeType,
        relation,
        sharedRead: 0,
        tempIo: 0,
        rowsRemoved: 0,
        cost: 0,
        count: 0,
        filters: new Map(),
      };
      groups.set(id, group);
    }

    group.sharedRead += node.sharedReadBlocks;
    group.tempIo += node.tempReadBlocks + node.tempWrittenBlocks;
    group.rowsRemoved += node.rowsRemovedByFilter;
    group.cost += node.totalCost;
    group.count += 1;

    if (node.filter !== undefined) {
      const text = truncateFilter(node.filter);
      group.filters.set(text, (group.filters.get(text) ?? 0) + 1);
    }
  });

  return [...groups.values()];
}

/**
 * Weighted log-scale severity of one group
 */
export function severityOf(
  group: BottleneckGroup,
  weights: SeverityWeights = DEFAULT_SEVERITY_WEIGHTS,
): number {
  return (
    weights.sharedRead * Math.log1p(Math.max(0, group.sharedRead)) +
    weights.tempIo * Math.log1p(Math.max(0, group.tempIo)) +
    weights.rowsRemoved * Math.log1p(Math.max(0, group.rowsRemoved)) +
    weights.costK * Math.log1p(Math.max(0, group.cost / 1000))
  );
}

function sampleFilters(filters: Map<string, number>): FilterSample[] {
  return [...filters.entries()]
    .map(([text, count]) => ({ text, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, FILTER_SAMPLE_SIZE);
}

function toEntry(group: BottleneckGroup, severity: number): BottleneckEntry {
  return {
    nodeType: group.nodeType,
    relation: group.relation,
    severity: roundTo(severity, 3),
    sharedRead: group.sharedRead,
    tempIo: group.tempIo,
    rowsRemoved: group.rowsRemoved,
    totalCostK: roundTo(group.cost / 1000, 1),
    occurrences: group.count,
    hint: hintFor(group.nodeType),
    filtersSample: sampleFilters(group.filters),
  };
}

/**
 * A pareto value of 0, null, undefined or NaN selects the top-K policy
 */
function isParetoRequested(pareto: number | null | undefined): pareto is number {
  return typeof pareto === "number" && !Number.isNaN(pareto) && pareto !== 0;
}

/**
 * Rank the plan's bottleneck groups.
 *
 * With a pareto fraction, returns the shortest severity-sorted prefix whose
 * cumulative share of total severity reaches the (clamped) fraction.
 * Otherwise returns the `top` highest-severity groups. Pareto wins when both
 * are given.
 */
export function rankBottlenecks(
  root: PlanNode,
  options: RankOptions = {},
): RankedResult {
  const weights = options.severityWeights ?? DEFAULT_SEVERITY_WEIGHTS;
  const scored = groupBottlenecks(root)
    .map((group) => ({ group, severity: severityOf(group, weights) }))
    .sort((a, b) => b.severity - a.severity);

  const totalSeverity = scored.reduce((sum, item) => sum + item.severity, 0);

  if (isParetoRequested(options.pareto)) {
    const cutoff = clamp(options.pareto, 0, 1);
    const denominator = totalSeverity || 1;
    const kept: typeof scored = [];
    let cumulative = 0;

    for (const item of scored) {
      kept.push(item);
      cumulative += item.severity;
      if (cumulative / denominator >= cutoff) break;
    }

    log.debug("Selected bottlenecks by pareto cutoff", {
      cutoff,
      groups: scored.length,
      selected: kept.length,
    });

    return {
      entries: kept.map(({ group, severity }) => toEntry(group, severity)),
      paretoCutoff: cutoff,
      groupCount: scored.length,
      totalSeverity,
    };
  }

  const top = Math.max(0, Math.trunc(options.top ?? DEFAULT_TOP));
  const kept = scored.slice(0, top);

  log.debug("Selected top bottlenecks", {
    top,
    groups: scored.length,
    selected: kept.length,
  });

  return {
    entries: kept.map(({ group, severity }) => toEntry(group, severity)),
    top,
    groupCount: scored.length,
    totalSeverity,
  };
}
