import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { migrateDatabase } from './migrate.js';
import * as schema from './schema.js';

export type TessellateDatabase = ReturnType<typeof createDatabase>;

export function createDatabase(path = ':memory:') {
  const sqlite = new Database(path);
  sqlite.pragma('journal_mode = WAL');
  // Nesting rows are removed with their workflow through ON DELETE CASCADE.
  sqlite.pragma('foreign_keys = ON');
  return drizzle(sqlite, { schema });
}

/** Opens (or creates) a revision database and brings its schema up to date. */
export function openRevisionDatabase(path: string): TessellateDatabase {
  const db = createDatabase(path);
  migrateDatabase(db);
  return db;
}
