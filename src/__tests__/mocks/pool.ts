/**
 * pg-plan-insight - Connection Pool Mock
 *
 * Provides mock implementation of pg Pool and PoolClient
 * for testing the executor without a real database.
 */

import { vi } from "vitest";

export interface MockPgResult {
  rows: Record<string, unknown>[];
  rowCount: number;
  fields: { name: string; dataTypeID: number }[];
}

export function createMockPgResult(
  rows: Record<string, unknown>[] = [],
): MockPgResult {
  return { rows, rowCount: rows.length, fields: [] };
}

/**
 * Create a mock PoolClient
 */
export function createMockPoolClient() {
  return {
    query: vi.fn().mockResolvedValue(createMockPgResult()),
    release: vi.fn(),
  };
}

export type MockPoolClient = ReturnType<typeof createMockPoolClient>;

/**
 * Create a mock pg Pool handing out `client`
 */
export function createMockPool(client: MockPoolClient = createMockPoolClient()) {
  return {
    client,
    connect: vi.fn().mockResolvedValue(client),
    end: vi.fn().mockResolvedValue(undefined),
    on: vi.fn().mockReturnThis(),
  };
}

export type MockPool = ReturnType<typeof createMockPool>;
