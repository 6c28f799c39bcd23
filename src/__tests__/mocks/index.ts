/**
 * pg-plan-insight - Test Mocks
 *
 * Centralized mock factories for testing. All tests should import
 * mocks from this module for consistency.
 */

export { MockExecutor, explainResult } from "./executor.js";
export type { ExecutedQuery, Responder } from "./executor.js";

export {
  createMockPgResult,
  createMockPoolClient,
  createMockPool,
} from "./pool.js";
export type { MockPgResult, MockPool, MockPoolClient } from "./pool.js";

export { rawNode, sampleJoinPlan } from "./plans.js";
export type { RawPlan } from "./plans.js";
