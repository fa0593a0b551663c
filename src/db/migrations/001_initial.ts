import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  // listing_status: symbol registry fed by the listing extract
  await db.schema
    .createTable('listing_status')
    .ifNotExists()
    .addColumn('symbol', 'varchar(20)', (col) => col.primaryKey())
    .addColumn('name', 'varchar(255)')
    .addColumn('exchange', 'varchar(40)')
    .addColumn('asset_type', 'varchar(40)')
    .addColumn('ipo_date', 'date')
    .addColumn('delisting_date', 'date')
    .addColumn('status', 'varchar(20)', (col) => col.notNull().defaultTo('Active'))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .execute();

  // etl_watermarks: one row per (target, symbol)
  await db.schema
    .createTable('etl_watermarks')
    .ifNotExists()
    .addColumn('target', 'varchar(64)', (col) => col.notNull())
    .addColumn('symbol', 'varchar(20)', (col) => col.notNull())
    .addColumn('exchange', 'varchar(40)')
    .addColumn('asset_type', 'varchar(40)')
    .addColumn('status', 'varchar(20)', (col) => col.notNull().defaultTo('active'))
    .addColumn('delisting_date', 'date')
    .addColumn('eligibility', 'varchar(12)', (col) => col.notNull().defaultTo('ELIGIBLE'))
    .addColumn('first_observed_date', 'date')
    .addColumn('last_observed_date', 'date')
    .addColumn('last_success_at', 'timestamptz')
    .addColumn('consecutive_failures', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('last_error', 'varchar(2000)')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .addPrimaryKeyConstraint('etl_watermarks_pk', ['target', 'symbol'])
    .addCheckConstraint('etl_watermarks_failures_non_negative', sql`consecutive_failures >= 0`)
    .addCheckConstraint('etl_watermarks_eligibility_valid', sql`eligibility IN ('ELIGIBLE', 'INELIGIBLE', 'DELISTED')`)
    .execute();

  await sql`
    CREATE INDEX IF NOT EXISTS etl_watermarks_fetch_priority_idx
    ON etl_watermarks (target, last_success_at ASC NULLS FIRST, symbol ASC)
  `.execute(db);

  // etl_run_history: one summary per batch run
  await db.schema
    .createTable('etl_run_history')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('run_id', 'varchar(64)', (col) => col.notNull().unique())
    .addColumn('target', 'varchar(64)', (col) => col.notNull())
    .addColumn('status', 'varchar(40)', (col) => col.notNull())
    .addColumn('summary', 'jsonb', (col) => col.notNull())
    .addColumn('started_at', 'timestamptz')
    .addColumn('finished_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .execute();

  await sql`
    CREATE INDEX IF NOT EXISTS etl_run_history_target_created_idx
    ON etl_run_history (target, created_at DESC)
  `.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  for (const table of ['etl_run_history', 'etl_watermarks', 'listing_status']) {
    await db.schema.dropTable(table).ifExists().execute();
  }
}
