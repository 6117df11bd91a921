// src/scripts/migrate.ts
import 'dotenv/config';
import { createContextId, errorMessage, logError, logInfo } from '../utils/logger';
import { ensureSchema } from '../db/schema';
import { db } from '../db/knex';

async function main() {
  const ctx = createContextId('migrateCLI');

  try {
    logInfo(ctx, 'Ensuring job engine schema', { env: process.env.NODE_ENV || 'development' });

    const created = await ensureSchema(db);

    logInfo(ctx, created.length ? 'Created tables' : 'Schema already up to date', { tables: created });
  } catch (err) {
    logError(ctx, 'Fatal error during migration', { error: errorMessage(err) });
    process.exitCode = 1;
  }
}

// Close the Knex pool so Node can exit
main().finally(async () => {
  try {
    await db.destroy();
  } catch (err) {
    logError('migrateCLI', 'Could not close the database pool', { error: errorMessage(err) });
  }
});
