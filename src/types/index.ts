/**
 * pg-plan-insight - Type Definitions
 */

export * from "./database.js";
export * from "./errors.js";
export * from "./plan.js";
export * from "./evaluation.js";
