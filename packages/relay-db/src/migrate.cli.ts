#!/usr/bin/env node
import { config } from 'dotenv';
import { join } from 'path';
import { createDb } from './db.js';
import { defaultMigrationsDir, migrate } from './migrate.js';

// .env from the repository root, then the working directory
config({ path: join(process.cwd(), '..', '..', '.env') });
config({ path: join(process.cwd(), '.env') });

async function main() {
  const db = createDb();
  const migrationsDir = defaultMigrationsDir();

  console.log('Running migrations from:', migrationsDir);
  const applied = await migrate(db, migrationsDir);

  if (applied.length === 0) {
    console.log('No new migrations to apply.');
  } else {
    console.log('Applied migrations:', applied.join(', '));
  }

  await db.$pool.end();
}

main().catch(e => {
  console.error(e);
  process.exit(1);
});
