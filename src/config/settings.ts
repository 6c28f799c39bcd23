/**
 * pg-plan-insight - Environment Settings
 *
 * Reads connection and evaluation settings from environment variables.
 * A malformed value never aborts a run: it is logged and the default is
 * used instead. CLI flags are applied on top by the caller.
 */

import { z } from "zod";
import type {
  DatabaseConfig,
  ScoreWeights,
  TimedScoreWeights,
} from "../types/index.js";
import { ConfigurationError, errorMessage } from "../types/index.js";
import {
  DEFAULT_SCORE_WEIGHTS,
  DEFAULT_TIMED_SCORE_WEIGHTS,
} from "../plan/aggregator.js";
import { DEFAULT_TOP } from "../plan/ranker.js";
import { logger } from "../utils/logger.js";
import type { LogLevel } from "../utils/logger.js";

const log = logger.forModule("CONFIG");

export type Env = Record<string, string | undefined>;

export const DEFAULT_TIMEOUT_SEC = 60;
export const DEFAULT_PARETO = 0.9;

export interface Settings {
  database: DatabaseConfig;
  /** Statement timeout in seconds; null disables the limit */
  timeoutSec: number | null;
  scoreWeights: ScoreWeights;
  timedScoreWeights: TimedScoreWeights;
  bottlenecksPareto: number;
  bottlenecksTop: number;
  selectRuns: number;
  attachBottlenecks: boolean;
  logLevel?: LogLevel | undefined;
}

/**
 * Comma-separated list of `size` non-negative weights with a positive sum
 */
export function weightListSchema(size: number) {
  return z
    .string()
    .transform((raw) => raw.split(",").map((part) => Number(part.trim())))
    .pipe(
      z
        .array(z.number().finite().nonnegative())
        .length(size, { message: `Expected ${String(size)} weights` }),
    )
    .refine((weights) => weights.some((w) => w > 0), {
      message: "At least one weight must be positive",
    });
}

const TimeoutSchema = z.coerce
  .number()
  .finite()
  .nonnegative()
  .transform((seconds) => (seconds === 0 ? null : seconds));

const CountSchema = z.coerce.number().int().nonnegative();

const FractionSchema = z.coerce.number().finite();

const PortSchema = z.coerce.number().int().min(1).max(65535);

const FlagSchema = z
  .string()
  .transform((raw) => ["1", "true", "yes", "on"].includes(raw.toLowerCase()));

/**
 * Parse one environment value, falling back to `fallback` when it is unset
 * or invalid
 */
export function readEnv<T>(
  env: Env,
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
): T {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === "") {
    return fallback;
  }

  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }

  log.warn(`Ignoring invalid ${name}`, {
    code: "CONFIG_INVALID_VALUE",
    value: raw,
    reason: parsed.error.issues[0]?.message,
  });
  return fallback;
}

function readScoreWeights(env: Env): ScoreWeights {
  const defaults = DEFAULT_SCORE_WEIGHTS;
  const [read = defaults.read, cost = defaults.cost] = readEnv(
    env,
    "EVAL_CS_WEIGHTS_NO_TIME",
    weightListSchema(2),
    [defaults.read, defaults.cost],
  );
  return { read, cost };
}

function readTimedScoreWeights(env: Env): TimedScoreWeights {
  const defaults = DEFAULT_TIMED_SCORE_WEIGHTS;
  const [
    read = defaults.read,
    time = defaults.time,
    cost = defaults.cost,
  ] = readEnv(env, "EVAL_CS_WEIGHTS", weightListSchema(3), [
    defaults.read,
    defaults.time,
    defaults.cost,
  ]);
  return { read, time, cost };
}

/**
 * Parse a PostgreSQL connection string
 */
export function parseConnectionString(connectionString: string): DatabaseConfig {
  let url: URL;
  try {
    url = new URL(connectionString);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid PostgreSQL connection string: ${errorMessage(error)}`,
    );
  }

  if (url.protocol !== "postgres:" && url.protocol !== "postgresql:") {
    throw new ConfigurationError(
      `Unsupported connection string protocol: ${url.protocol}`,
    );
  }

  const config: DatabaseConfig = {
    connectionString,
    host: url.hostname || "localhost",
    port: parseInt(url.port, 10) || 5432,
    username: decodeURIComponent(url.username) || "postgres",
    database: decodeURIComponent(url.pathname.slice(1)) || "postgres",
  };
  if (url.password) config.password = decodeURIComponent(url.password);

  if (
    url.searchParams.get("ssl") === "true" ||
    url.searchParams.get("sslmode") === "require"
  ) {
    config.ssl = true;
  }

  return config;
}

/**
 * Connection overrides taken from CLI flags
 */
export interface ConnectionOverrides {
  postgres?: string | undefined;
  host?: string | undefined;
  port?: number | undefined;
  user?: string | undefined;
  password?: string | undefined;
  database?: string | undefined;
  ssl?: boolean | undefined;
}

/**
 * Build the database configuration: a connection string (flag, then
 * DATABASE_URL) wins; otherwise individual flags, then PG* variables.
 */
export function resolveDatabaseConfig(
  overrides: ConnectionOverrides = {},
  env: Env = process.env,
): DatabaseConfig {
  const connectionString = overrides.postgres ?? env["DATABASE_URL"];
  if (connectionString !== undefined && connectionString !== "") {
    const config = parseConnectionString(connectionString);
    if (overrides.ssl === true) config.ssl = true;
    return config;
  }

  const config: DatabaseConfig = {
    host: overrides.host ?? env["PGHOST"] ?? "localhost",
    port: overrides.port ?? readEnv(env, "PGPORT", PortSchema, 5432),
    username: overrides.user ?? env["PGUSER"] ?? "postgres",
    database: overrides.database ?? env["PGDATABASE"] ?? "postgres",
  };

  const password = overrides.password ?? env["PGPASSWORD"];
  if (password !== undefined) config.password = password;
  if (overrides.ssl === true) config.ssl = true;

  return config;
}

/**
 * Load all settings from the environment
 */
export function loadSettings(env: Env = process.env): Settings {
  const settings: Settings = {
    database: resolveDatabaseConfig({}, env),
    timeoutSec: readEnv<number | null>(
      env,
      "EVAL_TIMEOUT",
      TimeoutSchema,
      DEFAULT_TIMEOUT_SEC,
    ),
    scoreWeights: readScoreWeights(env),
    timedScoreWeights: readTimedScoreWeights(env),
    bottlenecksPareto: readEnv(
      env,
      "EVAL_BOTTLENECKS_PARETO",
      FractionSchema,
      DEFAULT_PARETO,
    ),
    bottlenecksTop: readEnv(
      env,
      "EVAL_BOTTLENECKS_TOP",
      CountSchema,
      DEFAULT_TOP,
    ),
    selectRuns: readEnv(env, "EVAL_SELECT_RUNS", CountSchema, 0),
    attachBottlenecks: readEnv<boolean>(
      env,
      "EVAL_ATTACH_BOTTLENECKS",
      FlagSchema,
      false,
    ),
  };

  const level = env["LOG_LEVEL"]?.trim().toLowerCase();
  if (level !== undefined && level !== "") {
    if (logger.isLevel(level)) {
      settings.logLevel = level;
    } else {
      log.warn("Ignoring invalid LOG_LEVEL", {
        code: "CONFIG_INVALID_VALUE",
        value: level,
      });
    }
  }

  return settings;
}
