#!/usr/bin/env node
/**
 * pg-plan-insight - CLI Entry Point
 */

import { createProgram } from "./cli/program.js";
import { PlanInsightError, errorMessage } from "./types/index.js";
import { logger } from "./utils/logger.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error("Command failed", {
      module: "CLI",
      code: error instanceof PlanInsightError ? error.code : "CLI_FAILED",
      error: errorMessage(error),
    });
    process.exitCode = 1;
  });
