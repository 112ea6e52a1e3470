import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";
import { PersistenceError } from "./pipeline/errors";
import { logError } from "./logger";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;
export type Transaction = Parameters<Parameters<Database["transaction"]>[0]>[0];

export interface DatabaseHandle {
  pool: pg.Pool;
  db: Database;
}

export function createDatabase(connectionString: string): DatabaseHandle {
  if (!connectionString) {
    throw new Error(
      "DATABASE_URL must be set. Did you forget to provision a database?",
    );
  }

  // node-postgres takes both postgres:// and postgresql:// URLs
  const pool = new Pool({ connectionString });
  pool.on("error", (error) => {
    logError("Idle database client error", "db", error);
  });

  return { pool, db: drizzle(pool, { schema }) };
}

export async function wrapDbOperation<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new PersistenceError(
      `Database operation failed: ${operation}`,
      operation,
      { cause: error }
    );
  }
}

export function getNow(): string {
  return new Date().toISOString();
}
