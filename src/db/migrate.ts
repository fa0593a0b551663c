import { promises as fs } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { Migrator, FileMigrationProvider, Kysely } from 'kysely';

const MIGRATIONS_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'migrations');

/** Applies pending migrations and resolves to how many ran. */
export async function runMigrations<DB>(db: Kysely<DB>, migrationFolder: string = MIGRATIONS_DIR): Promise<number> {
  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({ fs, path, migrationFolder }),
  });

  const { error, results = [] } = await migrator.migrateToLatest();
  for (const result of results) {
    if (result.status === 'Success') console.log(`[migrate] ${result.migrationName} applied`);
    else if (result.status === 'Error') console.error(`[migrate] ${result.migrationName} failed`);
  }
  if (error) {
    throw error instanceof Error ? error : new Error(`Migration failed: ${String(error)}`);
  }

  const applied = results.filter((result) => result.status === 'Success').length;
  if (applied === 0) console.log('[migrate] schema is up to date');
  return applied;
}
