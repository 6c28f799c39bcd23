/**
 * pg-plan-insight - PostgreSQL Executor
 *
 * QueryExecutor implementations over a pg pool. Statement timeouts are
 * applied per statement with SET statement_timeout and reset afterwards,
 * since the connection goes back to the pool.
 */

import pg from "pg";
import type { QueryExecutor } from "./interface.js";
import type {
  DatabaseConfig,
  QueryOptions,
  QueryResult,
} from "../types/index.js";
import { ConnectionError, QueryError, errorMessage } from "../types/index.js";
import { logger } from "../utils/logger.js";

const log = logger.forModule("EXECUTOR");

/**
 * Map connection settings onto a pg pool configuration
 */
export function buildPoolConfig(config: DatabaseConfig): pg.PoolConfig {
  const poolConfig: pg.PoolConfig = {
    max: config.pool?.max ?? 2,
    idleTimeoutMillis: config.pool?.idleTimeoutMillis ?? 10000,
    connectionTimeoutMillis: config.pool?.connectionTimeoutMillis ?? 10000,
    allowExitOnIdle: true,
    application_name: config.applicationName ?? "pg-plan-insight",
  };

  if (config.connectionString !== undefined) {
    poolConfig.connectionString = config.connectionString;
  } else {
    poolConfig.host = config.host;
    poolConfig.port = config.port;
    poolConfig.user = config.username;
    poolConfig.database = config.database;
    if (config.password !== undefined) {
      poolConfig.password = config.password;
    }
  }

  if (config.ssl === true) {
    poolConfig.ssl = { rejectUnauthorized: false };
  }

  return poolConfig;
}

function toQueryError(error: unknown, sql: string): QueryError {
  if (error instanceof QueryError) return error;
  return new QueryError(
    errorMessage(error),
    { sql: sql.substring(0, 100) },
    { cause: error },
  );
}

function timeoutOf(options?: QueryOptions): number {
  const timeoutMs = options?.timeoutMs;
  return timeoutMs !== undefined && timeoutMs > 0 ? Math.trunc(timeoutMs) : 0;
}

export class PostgresSessionExecutor implements QueryExecutor {
  constructor(private client: pg.PoolClient) {}

  async execute(
    sql: string,
    params?: unknown[],
    options?: QueryOptions,
  ): Promise<QueryResult> {
    const timeoutMs = timeoutOf(options);

    try {
      if (timeoutMs > 0) {
        await this.client.query(
          `SET statement_timeout = ${String(timeoutMs)}`,
        );
      }

      const result = await this.client.query<Record<string, unknown>>(
        sql,
        params,
      );
      return {
        rows: result.rows,
        rowCount: result.rowCount ?? undefined,
        fields: result.fields.map((f) => ({
          name: f.name,
          dataTypeID: f.dataTypeID,
        })),
      };
    } catch (error) {
      throw toQueryError(error, sql);
    } finally {
      if (timeoutMs > 0) {
        await this.client
          .query("SET statement_timeout = 0")
          .catch((error: unknown) => {
            log.warn("Failed to reset statement_timeout", {
              code: "PG_RESET_FAILED",
              error: errorMessage(error),
            });
          });
      }
    }
  }

  async disconnect(): Promise<void> {
    this.client.release();
  }

  async createSession(): Promise<QueryExecutor> {
    return this; // Already in a session
  }
}

export class PostgresExecutor implements QueryExecutor {
  private pool: pg.Pool;

  constructor(pool: pg.Pool) {
    this.pool = pool;
    this.pool.on("error", (err) => {
      log.error("Idle client error", {
        code: "PG_POOL_ERROR",
        error: err.message,
      });
    });
  }

  static fromConfig(config: DatabaseConfig): PostgresExecutor {
    return new PostgresExecutor(new pg.Pool(buildPoolConfig(config)));
  }

  async execute(
    sql: string,
    params?: unknown[],
    options?: QueryOptions,
  ): Promise<QueryResult> {
    const session = await this.createSession();
    try {
      return await session.execute(sql, params, options);
    } finally {
      await session.disconnect();
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  async createSession(): Promise<QueryExecutor> {
    try {
      const client = await this.pool.connect();
      return new PostgresSessionExecutor(client);
    } catch (error) {
      const message = errorMessage(error);
      log.error("Failed to acquire connection", {
        code: "PG_CONNECT_FAILED",
        error: message,
      });
      throw new ConnectionError(
        `Failed to connect to PostgreSQL: ${message}`,
        undefined,
        { cause: error },
      );
    }
  }
}
