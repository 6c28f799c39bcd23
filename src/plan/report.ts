/**
 * pg-plan-insight - Bottleneck Report
 */

import type { BottleneckEntry, RankedResult } from "../types/index.js";

export interface ReportOptions {
  /** Plan file name shown under the title */
  planName?: string | undefined;
}

function formatFilters(entry: BottleneckEntry): string {
  return entry.filtersSample
    .map((sample) => `${sample.text}×${String(sample.count)}`)
    .join("; ");
}

function formatEntry(entry: BottleneckEntry, position: number): string[] {
  const lines = [
    `- ${String(position)}. ${entry.nodeType} on ${entry.relation}` +
      ` | sev=${entry.severity.toFixed(3)}` +
      ` | read=${String(entry.sharedRead)}` +
      ` | temp=${String(entry.tempIo)}` +
      ` | rm=${String(entry.rowsRemoved)}` +
      ` | cost_k=${entry.totalCostK.toFixed(1)}`,
    `  hint: ${entry.hint}`,
  ];
  if (entry.filtersSample.length > 0) {
    lines.push(`  filters: ${formatFilters(entry)}`);
  }
  return lines;
}

/**
 * Render ranked bottlenecks as Markdown, one list item per entry
 */
export function formatBottleneckReport(
  result: RankedResult,
  options: ReportOptions = {},
): string {
  const lines = ["# Bottlenecks Summary", ""];

  const header: string[] = [];
  if (options.planName !== undefined) {
    header.push(`Plan: ${options.planName}`);
  }
  if (result.paretoCutoff !== undefined) {
    header.push(`(Pareto cutoff: ${result.paretoCutoff.toFixed(2)})`);
  }
  if (header.length > 0) {
    lines.push(...header, "");
  }

  if (result.entries.length === 0) {
    lines.push("_No bottlenecks found._");
  }
  result.entries.forEach((entry, index) => {
    lines.push(...formatEntry(entry, index + 1));
  });

  return `${lines.join("\n")}\n`;
}
