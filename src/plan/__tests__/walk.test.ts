/**
 * pg-plan-insight - Tree Walk Tests
 */

import { describe, it, expect } from "vitest";
import { clamp, countNodes, normalizeUsage, roundTo, walkPlan } from "../walk.js";
import { parsePlanDocument } from "../normalize.js";
import type { PlanNode } from "../../types/index.js";
import { sampleJoinPlan } from "../../__tests__/mocks/index.js";

function makeNode(nodeType: string, plans: PlanNode[] = []): PlanNode {
  return {
    nodeType,
    totalCost: 0,
    planRows: 0,
    actualRows: 0,
    actualTotalTime: 0,
    sharedReadBlocks: 0,
    sharedHitBlocks: 0,
    tempReadBlocks: 0,
    tempWrittenBlocks: 0,
    rowsRemovedByFilter: 0,
    plans,
  };
}

describe("walkPlan", () => {
  it("should visit parents before children, in plan order", () => {
    const visited: [string | undefined, number][] = [];
    walkPlan(parsePlanDocument(sampleJoinPlan()), (node, depth) => {
      visited.push([node.relationName ?? node.nodeType, depth]);
    });

    expect(visited).toEqual([
      ["Hash Join", 0],
      ["orders", 1],
      ["Hash", 1],
      ["customers", 2],
    ]);
  });

  it("should handle a single-node tree", () => {
    expect(countNodes(makeNode("Result"))).toBe(1);
  });

  it("should walk very deep trees without overflowing the stack", () => {
    let node = makeNode("Seq Scan");
    for (let i = 0; i < 20000; i++) {
      node = makeNode("Nested Loop", [node]);
    }

    let maxDepth = 0;
    walkPlan(node, (_node, depth) => {
      maxDepth = Math.max(maxDepth, depth);
    });

    expect(countNodes(node)).toBe(20001);
    expect(maxDepth).toBe(20000);
  });
});

describe("normalizeUsage", () => {
  it("should map zero usage to 1", () => {
    expect(normalizeUsage(0)).toBe(1);
  });

  it("should treat negative usage as zero", () => {
    expect(normalizeUsage(-5)).toBe(1);
  });

  it("should decrease as usage grows", () => {
    const values = [0, 1, 10, 100, 1e6].map(normalizeUsage);
    for (let i = 1; i < values.length; i++) {
      expect(values[i]).toBeLessThan(values[i - 1] ?? 0);
      expect(values[i]).toBeGreaterThan(0);
    }
  });

  it("should follow 1 / (1 + ln(1 + x))", () => {
    expect(normalizeUsage(Math.E - 1)).toBeCloseTo(0.5, 12);
  });
});

describe("roundTo / clamp", () => {
  it("should round to the requested decimals", () => {
    expect(roundTo(30.384366, 3)).toBe(30.384);
    expect(roundTo(9.4745, 1)).toBe(9.5);
  });

  it("should clamp into range", () => {
    expect(clamp(1.5, 0, 1)).toBe(1);
    expect(clamp(-0.2, 0, 1)).toBe(0);
    expect(clamp(0.3, 0, 1)).toBe(0.3);
  });
});
