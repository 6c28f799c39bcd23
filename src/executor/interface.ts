import type { QueryOptions, QueryResult } from "../types/index.js";

export interface QueryExecutor {
  execute(
    sql: string,
    params?: unknown[],
    options?: QueryOptions,
  ): Promise<QueryResult>;
  disconnect(): Promise<void>;
  // Returns an executor that uses a single dedicated connection
  createSession(): Promise<QueryExecutor>;
}
