/**
 * pg-plan-insight - Plan Document Normalization
 *
 * Turns the JSON emitted by EXPLAIN (FORMAT JSON) into a PlanNode tree.
 * Producers frame the plan differently (psql prints a bare array, the pg
 * driver returns a "QUERY PLAN" row, saved artifacts hold {"Plan": …}),
 * so every framing is resolved here and the rest of the engine only sees
 * PlanNode.
 */

import { z } from "zod";
import type { PlanEnvelope, PlanNode } from "../types/index.js";
import { PlanParseError, errorMessage } from "../types/index.js";
import { logger } from "../utils/logger.js";

const log = logger.forModule("PLAN");

/** Keys that mark an object as a plan node rather than an envelope */
const PLAN_NODE_KEYS = ["Node Type", "Plans", "Total Cost"] as const;

function toNumber(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/**
 * Filter text of a raw value. Empty strings, `false`, `0` and NaN carry no
 * filter.
 */
function toText(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value === "" ? undefined : value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return value ? String(value) : undefined;
  }
  return undefined;
}

const numeric = z.unknown().transform(toNumber);
const counter = z.unknown().transform((value) => Math.trunc(toNumber(value)));
const label = z
  .unknown()
  .transform((value) =>
    typeof value === "string" && value !== "" ? value : undefined,
  );

/**
 * Lenient schema for one raw plan node. Every field accepts any value;
 * malformed numbers become 0 instead of failing the parse.
 */
const RawPlanNodeSchema = z.object({
  "Node Type": label,
  "Relation Name": label,
  Alias: label,
  "Total Cost": numeric,
  "Plan Rows": counter,
  "Actual Rows": counter,
  "Actual Total Time": numeric,
  "Shared Read Blocks": counter,
  "Shared Hit Blocks": counter,
  "Temp Read Blocks": counter,
  "Temp Written Blocks": counter,
  "Rows Removed by Filter": counter,
  Filter: z.unknown().transform(toText),
  Plans: z.unknown(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

type RawPlanFields = z.infer<typeof RawPlanNodeSchema>;

function toPlanNode(
  fields: RawPlanFields,
  children: readonly PlanNode[],
): PlanNode {
  return {
    nodeType: fields["Node Type"],
    relationName: fields["Relation Name"],
    alias: fields.Alias,
    totalCost: fields["Total Cost"],
    planRows: fields["Plan Rows"],
    actualRows: fields["Actual Rows"],
    actualTotalTime: fields["Actual Total Time"],
    sharedReadBlocks: fields["Shared Read Blocks"],
    sharedHitBlocks: fields["Shared Hit Blocks"],
    tempReadBlocks: fields["Temp Read Blocks"],
    tempWrittenBlocks: fields["Temp Written Blocks"],
    rowsRemovedByFilter: fields["Rows Removed by Filter"],
    filter: fields.Filter,
    plans: children,
  };
}

/**
 * Build the tree parent-first with an explicit stack. Each pending entry
 * carries the sibling list its node is appended to, so children keep plan
 * order without recursion.
 */
function buildTree(root: Record<string, unknown>): PlanNode {
  const top: PlanNode[] = [];
  const stack: {
    raw: Record<string, unknown>;
    siblings: PlanNode[];
    depth: number;
  }[] = [{ raw: root, siblings: top, depth: 0 }];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;

    const fields = RawPlanNodeSchema.parse(current.raw);
    const children: PlanNode[] = [];
    current.siblings.push(toPlanNode(fields, children));

    const rawChildren = Array.isArray(fields.Plans) ? fields.Plans : [];
    for (let i = rawChildren.length - 1; i >= 0; i--) {
      const child: unknown = rawChildren[i];
      if (isRecord(child)) {
        stack.push({ raw: child, siblings: children, depth: current.depth + 1 });
      } else {
        log.debug("Skipping non-object child plan", { depth: current.depth + 1 });
      }
    }
  }

  const [node] = top;
  if (node === undefined) {
    throw new PlanParseError("Plan document produced no root node");
  }
  return node;
}

/**
 * Parse JSON text, recovering the array embedded in mixed output
 * (e.g. notices printed around the plan).
 */
function parseJsonText(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const start = text.indexOf("[");
    const end = text.lastIndexOf("]");
    if (start !== -1 && end > start) {
      try {
        const embedded: unknown = JSON.parse(text.slice(start, end + 1));
        return embedded;
      } catch (inner) {
        log.debug("Embedded plan array is not valid JSON", {
          error: errorMessage(inner),
        });
      }
    }
    throw new PlanParseError(
      "Plan document is not valid JSON",
      { length: text.length },
      { cause: error },
    );
  }
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value)
    ? value
    : undefined;
}

/**
 * The raw plan object located inside a document, with envelope timings
 */
export interface LocatedPlan {
  raw: Record<string, unknown>;
  planningTimeMs?: number | undefined;
  executionTimeMs?: number | undefined;
}

function unwrapDocument(doc: unknown, depth = 0): LocatedPlan {
  if (depth > 3) {
    throw new PlanParseError("Plan document is nested too deeply");
  }

  if (Array.isArray(doc)) {
    if (doc.length === 0) {
      throw new PlanParseError("Plan document is an empty array");
    }
    return unwrapDocument(doc[0], depth + 1);
  }

  if (!isRecord(doc)) {
    throw new PlanParseError("Plan document root is not an object", {
      type: doc === null ? "null" : typeof doc,
    });
  }

  // pg returns EXPLAIN (FORMAT JSON) as a row with a "QUERY PLAN" column
  if ("QUERY PLAN" in doc) {
    return unwrapDocument(doc["QUERY PLAN"], depth + 1);
  }

  const wrapped = doc["Plan"];
  if (isRecord(wrapped)) {
    return {
      raw: wrapped,
      planningTimeMs: optionalNumber(doc["Planning Time"]),
      executionTimeMs: optionalNumber(doc["Execution Time"]),
    };
  }

  if (PLAN_NODE_KEYS.some((key) => key in doc)) {
    return { raw: doc };
  }

  throw new PlanParseError("Plan document has no recognizable plan structure", {
    fields: Object.keys(doc).slice(0, 10),
  });
}

/**
 * Find the plan object in any accepted framing without converting it
 */
export function locatePlan(input: unknown): LocatedPlan {
  const doc = typeof input === "string" ? parseJsonText(input.trim()) : input;
  return unwrapDocument(doc);
}

/**
 * Convert a located raw plan object into a PlanNode tree
 */
export function buildPlanTree(raw: Record<string, unknown>): PlanNode {
  return buildTree(raw);
}

/**
 * Parse a plan document and keep the envelope timings when present
 */
export function parsePlanEnvelope(input: unknown): PlanEnvelope {
  const located = locatePlan(input);
  return {
    plan: buildPlanTree(located.raw),
    planningTimeMs: located.planningTimeMs,
    executionTimeMs: located.executionTimeMs,
  };
}

/**
 * Parse a plan document (JSON text or parsed value) into its root node.
 *
 * Accepts a bare plan object, `{"Plan": …}`, either inside a top-level
 * array, and the `{"QUERY PLAN": […]}` row returned by pg.
 *
 * @throws PlanParseError when the input is not JSON or holds no plan
 */
export function parsePlanDocument(input: unknown): PlanNode {
  return parsePlanEnvelope(input).plan;
}
