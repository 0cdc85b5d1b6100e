import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import * as schema from './schema';

type DrizzleDB = PostgresJsDatabase<typeof schema>;

// Reuse one pool per process even when modules are re-evaluated (watch mode, hot reload).
const globalForDb = globalThis as unknown as { __tallyplan_db?: DrizzleDB };

export interface CreateDbOptions {
  connectionString?: string;
  poolMax?: number;
}

export function createDb(options: CreateDbOptions = {}): DrizzleDB {
  const connectionString = options.connectionString ?? process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required');
  }
  const client = postgres(connectionString, {
    max: options.poolMax ?? parseInt(process.env.DB_POOL_MAX || '2', 10),
    idle_timeout: 20,
    max_lifetime: 300,
    connect_timeout: 10,
  });
  return drizzle(client, { schema });
}

export function getDb(): DrizzleDB {
  if (!globalForDb.__tallyplan_db) {
    globalForDb.__tallyplan_db = createDb();
  }
  return globalForDb.__tallyplan_db;
}

export type Database = DrizzleDB;

export { sql, schema };
