/**
 * pg-plan-insight - Error Types
 *
 * Custom error classes for plan analysis and query execution.
 */

/**
 * Base error class for pg-plan-insight
 */
export class PlanInsightError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "PlanInsightError";
  }
}

/**
 * Plan document could not be parsed or has no plan structure
 */
export class PlanParseError extends PlanInsightError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, "PLAN_PARSE_ERROR", details, options);
    this.name = "PlanParseError";
  }
}

/**
 * Query execution error. The message is the driver's error text, unchanged.
 */
export class QueryError extends PlanInsightError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, "QUERY_ERROR", details, options);
    this.name = "QueryError";
  }
}

/**
 * Database connection error
 */
export class ConnectionError extends PlanInsightError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, "CONNECTION_ERROR", details, options);
    this.name = "ConnectionError";
  }
}

/**
 * Invalid configuration (environment or CLI)
 */
export class ConfigurationError extends PlanInsightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}

/**
 * Validation error for input parameters
 */
export class ValidationError extends PlanInsightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
