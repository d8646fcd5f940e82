import { migrate } from 'drizzle-orm/node-postgres/migrator';

import { closeDb, getDb } from '@/lib/db/client';
import { errorMessage } from '@/lib/errors/error';

function log(message: string, extra?: Record<string, unknown>) {
  const payload = extra ? ` ${JSON.stringify(extra)}` : '';
  console.log(`[migrate] ${message}${payload}`);
}

async function main() {
  log('applying migrations', { folder: 'drizzle' });
  try {
    await migrate(getDb(), { migrationsFolder: './drizzle' });
    log('done');
  } catch (err) {
    log('migration failed', { error: errorMessage(err) });
    process.exitCode = 1;
  } finally {
    await closeDb();
  }
}

void main();
