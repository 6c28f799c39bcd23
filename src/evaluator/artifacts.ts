/**
 * pg-plan-insight - Artifact Files
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { logger } from "../utils/logger.js";

const log = logger.forModule("EVALUATOR");

export const DEFAULT_ARTIFACTS_ROOT = "artifacts";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local-time run directory name, e.g. 20250118_093005
 */
export function timestampDirName(now: Date = new Date()): string {
  const date = `${String(now.getFullYear())}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${date}_${time}`;
}

export function defaultRunDir(
  root: string = DEFAULT_ARTIFACTS_ROOT,
  now: Date = new Date(),
): string {
  return path.join(root, timestampDirName(now));
}

/**
 * Writes the files of one evaluation run into a single directory
 */
export class ArtifactWriter {
  private prepared = false;

  constructor(readonly runDir: string) {}

  pathFor(name: string): string {
    return path.join(this.runDir, name);
  }

  private async ensureDir(): Promise<void> {
    if (this.prepared) return;
    await mkdir(this.runDir, { recursive: true });
    this.prepared = true;
  }

  async writeJson(name: string, value: unknown): Promise<string> {
    return this.writeText(name, `${JSON.stringify(value, null, 2)}\n`);
  }

  async writeText(name: string, content: string): Promise<string> {
    await this.ensureDir();
    const target = this.pathFor(name);
    await writeFile(target, content, "utf-8");
    log.debug("Artifact written", { entityId: target, bytes: content.length });
    return target;
  }
}
