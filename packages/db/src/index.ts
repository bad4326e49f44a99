export { createDatabase, openRevisionDatabase, type TessellateDatabase } from './connection.js';
export { migrateDatabase } from './migrate.js';
export { createSqlRevisionStore } from './revisionStore.js';
export * from './schema.js';
