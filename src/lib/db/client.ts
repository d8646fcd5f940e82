import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';

import * as schema from '@/lib/db/schema';
import { serverEnv } from '@/lib/env/server';

import type { NodePgDatabase, NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';

export type Database = NodePgDatabase<typeof schema>;
/** The database or an open transaction on it. */
export type DbExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

let pool: Pool | null = null;
let db: Database | null = null;

export function getDb(): Database {
  if (db) return db;
  pool = new Pool({ connectionString: serverEnv.DATABASE_URL });
  db = drizzle({ client: pool, schema });
  return db;
}

export async function closeDb(): Promise<void> {
  const current = pool;
  pool = null;
  db = null;
  if (current) await current.end();
}
