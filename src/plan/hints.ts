/**
 * pg-plan-insight - Remediation Hints
 *
 * Static operator kind → hint table. Kinds not listed get GENERIC_HINT.
 */

export const GENERIC_HINT =
  "Pushdown filters; appropriate indexes; reduce intermediate cardinality";

const SCAN_HINT =
  "Add/adjust index; push filters earlier; consider Bitmap/Index Scan";
const BITMAP_HINT =
  "Ensure selectivity and correct join keys; consider covering index";
const SORT_HINT =
  "Reduce input rows pre-sort; add index matching ORDER BY; tune work_mem";
const HASH_HINT =
  "Reduce build-side size; add index for join; watch work_mem";

const HINTS: ReadonlyMap<string, string> = new Map([
  ["Seq Scan", SCAN_HINT],
  ["Bitmap Heap Scan", BITMAP_HINT],
  ["Bitmap Index Scan", BITMAP_HINT],
  ["Sort", SORT_HINT],
  ["Incremental Sort", SORT_HINT],
  ["Hash Join", HASH_HINT],
  ["HashAggregate", HASH_HINT],
  [
    "Nested Loop",
    "Ensure inner side has index on join key; consider join reorder",
  ],
  [
    "Merge Join",
    "Avoid global sorts: add indexes to supply order or change join",
  ],
  [
    "WindowAgg",
    "Replace with LATERAL/LIMIT 1 or DISTINCT ON; pre-filter partitions",
  ],
]);

/**
 * Remediation hint for an operator kind. Never empty.
 */
export function hintFor(nodeType: string): string {
  return HINTS.get(nodeType) ?? GENERIC_HINT;
}

/**
 * Operator kinds with a dedicated hint
 */
export function knownHintKinds(): string[] {
  return [...HINTS.keys()];
}
