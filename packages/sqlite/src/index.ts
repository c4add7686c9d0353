export { createSqliteDatabase, IN_MEMORY_DATABASE, type CreateSqliteDatabaseOptions } from './database.js';
export { runMigrations } from './migrations.js';
export { closeSqliteDatabase } from './close.js';
export { withControlledTransaction } from './transaction.js';

// Re-export the Kysely surface consumers need, so they do not depend on kysely directly
export {
  Kysely,
  sql,
  type Insertable,
  type Migration,
  type Selectable,
} from 'kysely';
