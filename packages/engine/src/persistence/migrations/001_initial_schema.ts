import { sql, type Kysely } from '@batchpay/sqlite';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('engine_state')
    .addColumn('id', 'integer', (col) => col.primaryKey().check(sql`id = 1`))
    .addColumn('owner', 'text', (col) => col.notNull())
    .addColumn('next_batch_id', 'integer', (col) => col.notNull().defaultTo(1))
    .addColumn('last_execution_timestamp', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('performance_metric', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('updated_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .execute();

  await db.schema
    .createTable('authorized_signers')
    .addColumn('principal', 'text', (col) => col.primaryKey())
    .addColumn('added_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .execute();

  await db.schema
    .createTable('batch_records')
    .addColumn('id', 'integer', (col) => col.primaryKey())
    .addColumn('timestamp', 'integer', (col) => col.notNull())
    .addColumn('caller', 'text', (col) => col.notNull())
    .addColumn('total_amount', 'text', (col) => col.notNull())
    .addColumn('success', 'integer', (col) => col.notNull())
    .addColumn('conditions_met', 'text', (col) => col.notNull())
    .addColumn('instruction_count', 'integer', (col) => col.notNull())
    .addColumn('failed_instruction_index', 'integer')
    .addColumn('failure_reason', 'text')
    .addColumn('created_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema.createIndex('idx_batch_records_caller').on('batch_records').column('caller').execute();

  await db.schema
    .createTable('ledger_balances')
    .addColumn('principal', 'text', (col) => col.primaryKey())
    .addColumn('balance', 'text', (col) => col.notNull())
    .addColumn('updated_at', 'text', (col) => col.notNull())
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('ledger_balances').execute();
  await db.schema.dropTable('batch_records').execute();
  await db.schema.dropTable('authorized_signers').execute();
  await db.schema.dropTable('engine_state').execute();
}
