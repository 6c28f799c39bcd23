/**
 * pg-plan-insight - Bottleneck Report Tests
 */

import { describe, it, expect } from "vitest";
import { formatBottleneckReport } from "../report.js";
import { rankBottlenecks } from "../ranker.js";
import { parsePlanDocument } from "../normalize.js";
import { rawNode, sampleJoinPlan } from "../../__tests__/mocks/index.js";

const SCAN_HINT =
  "Add/adjust index; push filters earlier; consider Bitmap/Index Scan";

describe("formatBottleneckReport", () => {
  it("should render a pareto selection with its header", () => {
    const result = rankBottlenecks(parsePlanDocument(sampleJoinPlan()), {
      pareto: 0.7,
    });

    expect(formatBottleneckReport(result, { planName: "plan.json" })).toBe(
      [
        "# Bottlenecks Summary",
        "",
        "Plan: plan.json",
        "(Pareto cutoff: 0.70)",
        "",
        "- 1. Seq Scan on orders | sev=30.384 | read=400 | temp=0 | rm=900 | cost_k=8.0",
        `  hint: ${SCAN_HINT}`,
        "  filters: (status = 'open'::text)×1",
        "- 2. Seq Scan on customers | sev=15.486 | read=120 | temp=0 | rm=0 | cost_k=2.0",
        `  hint: ${SCAN_HINT}`,
        "",
      ].join("\n"),
    );
  });

  it("should omit the header for a top-K selection without a plan name", () => {
    const result = rankBottlenecks(parsePlanDocument(sampleJoinPlan()), {
      top: 1,
    });
    const lines = formatBottleneckReport(result).split("\n");

    expect(lines[0]).toBe("# Bottlenecks Summary");
    expect(lines[1]).toBe("");
    expect(lines[2]).toMatch(/^- 1\. Seq Scan on orders \| sev=30\.384/);
  });

  it("should report an empty selection", () => {
    const result = rankBottlenecks(parsePlanDocument(rawNode("Result")), {
      top: 0,
    });

    expect(formatBottleneckReport(result)).toBe(
      "# Bottlenecks Summary\n\n_No bottlenecks found._\n",
    );
  });

  it("should list up to two filters with their counts", () => {
    const scan = (filter: string) =>
      rawNode("Seq Scan", {
        "Relation Name": "events",
        "Shared Read Blocks": 1,
        Filter: filter,
      });
    const plan = parsePlanDocument(
      rawNode("Append", {}, [scan("(a > 1)"), scan("(a > 1)"), scan("(b < 2)")]),
    );
    const report = formatBottleneckReport(rankBottlenecks(plan, { top: 1 }));

    expect(report.split("\n")).toContain("  filters: (a > 1)×2; (b < 2)×1");
  });
});
