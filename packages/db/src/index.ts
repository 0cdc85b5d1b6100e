export { createDb, getDb, sql, schema } from './client';
export type { Database, CreateDbOptions } from './client';
export * from './schema';
