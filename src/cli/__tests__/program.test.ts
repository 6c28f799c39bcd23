/**
 * pg-plan-insight - CLI Program Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { CommanderError } from "commander";
import type { Command } from "commander";
import { createProgram } from "../program.js";
import type { CliIO } from "../program.js";
import type { DatabaseConfig } from "../../types/index.js";
import { QueryError, ValidationError } from "../../types/index.js";
import {
  explainResult,
  MockExecutor,
  sampleJoinPlan,
} from "../../__tests__/mocks/index.js";

const SCAN_HINT =
  "Add/adjust index; push filters earlier; consider Bitmap/Index Scan";

interface Harness {
  program: Command;
  output: string[];
  executor: MockExecutor;
  configs: DatabaseConfig[];
}

function harness(env: CliIO["env"] = {}): Harness {
  const output: string[] = [];
  const configs: DatabaseConfig[] = [];
  const executor = new MockExecutor((sql) =>
    sql.startsWith("EXPLAIN") ? explainResult(sampleJoinPlan()) : { rows: [] },
  );
  const program = createProgram({
    stdout: (text) => output.push(text),
    createExecutor: (config) => {
      configs.push(config);
      return executor;
    },
    env,
  });
  for (const command of [program, ...program.commands]) {
    command.exitOverride();
    command.configureOutput({ writeErr: () => {} });
  }
  return { program, output, executor, configs };
}

async function run(h: Harness, args: string[]): Promise<void> {
  await h.program.parseAsync(args, { from: "user" });
}

describe("CLI program", () => {
  let tmpDir: string;
  let planFile: string;
  let sqlFile: string;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "plan-insight-cli-"));
    planFile = path.join(tmpDir, "plan.json");
    sqlFile = path.join(tmpDir, "query.sql");
    await writeFile(planFile, JSON.stringify([{ Plan: sampleJoinPlan() }]));
    await writeFile(sqlFile, "SELECT * FROM orders;\n");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tmpDir, { recursive: true, force: true });
  });

  describe("bottlenecks", () => {
    it("should print a Markdown report", async () => {
      const h = harness();

      await run(h, ["bottlenecks", planFile, "--pareto", "0.7"]);

      expect(h.output.join("")).toBe(
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

    it("should print JSON with the top-K policy when pareto is 0", async () => {
      const h = harness();

      await run(h, ["bottlenecks", planFile, "--pareto", "0", "--top", "1", "--format", "json"]);

      const parsed: unknown = JSON.parse(h.output.join(""));
      expect(parsed).toMatchObject({
        plan_file: "plan.json",
        top: 1,
        groupCount: 4,
        entries: [{ nodeType: "Seq Scan", relation: "orders", severity: 30.384 }],
      });
    });

    it("should default to the pareto cutoff from the environment", async () => {
      const h = harness({ EVAL_BOTTLENECKS_PARETO: "0.4" });

      await run(h, ["bottlenecks", planFile, "--format", "json"]);

      expect(JSON.parse(h.output.join(""))).toMatchObject({
        paretoCutoff: 0.4,
        entries: [{ relation: "orders" }],
      });
    });

    it("should keep all groups with the default 0.9 cutoff", async () => {
      const h = harness();

      await run(h, ["bottlenecks", planFile]);

      expect(h.output.join("")).toContain("(Pareto cutoff: 0.90)");
      expect(h.output.join("")).toContain("- 4. Hash Join on ? | sev=7.940");
    });

    it("should reject an unknown format", async () => {
      const h = harness();

      await expect(run(h, ["bottlenecks", planFile, "--format", "html"])).rejects.toBeInstanceOf(
        CommanderError,
      );
      expect(h.output).toEqual([]);
    });

    it("should report a missing plan file", async () => {
      const h = harness();
      const missing = path.join(tmpDir, "missing.json");

      await expect(run(h, ["bottlenecks", missing])).rejects.toThrow(
        `Plan file not found: ${missing}`,
      );
    });
  });

  describe("aggregate", () => {
    it("should print totals, scan types and the score", async () => {
      const h = harness();

      await run(h, ["aggregate", planFile]);

      const parsed: unknown = JSON.parse(h.output.join(""));
      expect(parsed).toMatchObject({
        shared_read_total: 525,
        rows_removed_total: 900,
        total_cost_total: 12000,
        scan_types: { "Hash Join": 1, "Seq Scan": 2, Hash: 1 },
      });
      expect(parsed).toHaveProperty("combined_score");
    });

    it("should apply --weights", async () => {
      const h = harness();

      await run(h, ["aggregate", planFile, "--weights", "1,0"]);

      expect(JSON.parse(h.output.join(""))).toMatchObject({
        combined_score: expect.closeTo(1 / (1 + Math.log(526)), 12),
      });
    });

    it("should reject an unknown log level", async () => {
      const h = harness();

      await expect(run(h, ["aggregate", planFile, "--log-level", "loud"])).rejects.toThrow(
        ValidationError,
      );
    });
  });

  describe("evaluate", () => {
    it("should evaluate the query and print the result", async () => {
      const h = harness();
      const outDir = path.join(tmpDir, "run");

      await run(h, ["evaluate", sqlFile, "--out-dir", outDir, "--timeout", "5"]);

      expect(JSON.parse(h.output.join(""))).toMatchObject({
        artifacts_dir: outDir,
        metrics: { shared_read_total: 525, timeouts: 0 },
        artifacts: { planPath: path.join(outDir, "plan.json") },
      });
      expect(h.executor.executedQueries[0]?.options).toEqual({ timeoutMs: 5000 });
      expect(h.executor.disconnected).toBe(true);
    });

    it("should build the connection from flags and PG* variables", async () => {
      const h = harness({ PGPASSWORD: "test-secret", PGDATABASE: "warehouse" });

      await run(h, [
        "evaluate",
        sqlFile,
        "--out-dir",
        path.join(tmpDir, "run"),
        "--host",
        "db.local",
        "--pg-port",
        "6000",
        "--user",
        "analyst",
      ]);

      expect(h.configs).toEqual([
        {
          host: "db.local",
          port: 6000,
          username: "analyst",
          database: "warehouse",
          password: "test-secret",
        },
      ]);
    });

    it("should treat --timeout 0 as no limit", async () => {
      const h = harness();

      await run(h, ["evaluate", sqlFile, "--out-dir", path.join(tmpDir, "run"), "--timeout", "0"]);

      expect(h.executor.executedQueries[0]?.options?.timeoutMs).toBeUndefined();
    });

    it("should attach bottlenecks when requested", async () => {
      const h = harness();

      await run(h, [
        "evaluate",
        sqlFile,
        "--out-dir",
        path.join(tmpDir, "run"),
        "--attach-bottlenecks",
        "--bottlenecks-pareto",
        "0",
        "--bottlenecks-top",
        "2",
      ]);

      expect(JSON.parse(h.output.join(""))).toMatchObject({
        bottlenecks: { top: 2, entries: [{ relation: "orders" }, { relation: "customers" }] },
      });
    });

    it("should disconnect when the evaluation fails", async () => {
      const h = harness();
      h.executor.respondWith(() => {
        throw new QueryError("canceling statement due to statement timeout");
      });

      await expect(
        run(h, ["evaluate", sqlFile, "--out-dir", path.join(tmpDir, "run")]),
      ).rejects.toThrow("canceling statement due to statement timeout");
      expect(h.executor.disconnected).toBe(true);
    });

    it("should report a missing SQL file before connecting", async () => {
      const h = harness();
      const missing = path.join(tmpDir, "nope.sql");

      await expect(run(h, ["evaluate", missing])).rejects.toThrow(
        `SQL file not found: ${missing}`,
      );
      expect(h.configs).toEqual([]);
    });
  });
});
