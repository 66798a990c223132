import { PGlite } from '@electric-sql/pglite';

import { createPostgresExecutor, type PostgresClientLike } from '../../src/core/execution/executors/postgres-executor.js';
import type { DbExecutor } from '../../src/core/execution/db-executor.js';

const createPgliteClient = (db: PGlite): PostgresClientLike => ({
  async query(sql, params) {
    return await db.query<Record<string, unknown>>(sql, params);
  }
});

export const createPgliteExecutor = (db: PGlite): DbExecutor =>
  createPostgresExecutor(createPgliteClient(db));

export const openPglite = async (schemaSql: string): Promise<PGlite> => {
  const db = new PGlite();
  await db.exec(schemaSql);
  return db;
};

export const runSql = async (
  db: PGlite,
  sql: string,
  params: unknown[] = []
): Promise<void> => {
  await db.query(sql, params);
};

export const queryAll = async (
  db: PGlite,
  sql: string,
  params: unknown[] = []
): Promise<Record<string, unknown>[]> => {
  const result = await db.query<Record<string, unknown>>(sql, params);
  return result.rows;
};

export const PG_CATEGORIES_SQL = `
  CREATE TABLE categories (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL,
    lft INTEGER NOT NULL,
    rght INTEGER NOT NULL
  );
`;
