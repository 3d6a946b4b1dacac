import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('merchants')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('canonical_name', 'text', (col) => col.notNull())
    .addColumn('category', 'text', (col) => col.notNull())
    .addColumn('description', 'text')
    .addColumn('website', 'text')
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .execute();

  await db.schema
    .createTable('merchant_aliases')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('merchant_id', 'text', (col) =>
      col.notNull().references('merchants.id').onDelete('cascade')
    )
    .addColumn('alias', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('idx_merchant_aliases_merchant_alias')
    .on('merchant_aliases')
    .columns(['merchant_id', 'alias'])
    .unique()
    .execute();

  await db.schema
    .createTable('transactions')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('user_id', 'text', (col) => col.notNull())
    .addColumn('amount_cents', 'integer', (col) => col.notNull())
    .addColumn('currency', 'text', (col) => col.notNull().defaultTo('USD'))
    .addColumn('transaction_date', 'text', (col) => col.notNull())
    .addColumn('merchant_id', 'text', (col) => col.notNull().references('merchants.id'))
    .addColumn('status', 'text', (col) =>
      col.notNull().check(sql`status in ('pending', 'posted', 'refunded')`)
    )
    .addColumn('description', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('category', 'text')
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .execute();

  await db.schema
    .createIndex('idx_transactions_user_date')
    .on('transactions')
    .columns(['user_id', 'transaction_date'])
    .execute();

  await db.schema
    .createTable('disputes')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('transaction_id', 'text', (col) => col.notNull().references('transactions.id'))
    .addColumn('user_id', 'text', (col) => col.notNull())
    .addColumn('complaint', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) =>
      col.notNull().check(sql`status in ('flagged', 'under_review', 'resolved')`)
    )
    .addColumn('resolution_notes', 'text')
    .addColumn('created_at', 'text', (col) => col.notNull())
    .addColumn('updated_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('idx_disputes_user')
    .on('disputes')
    .columns(['user_id', 'created_at'])
    .execute();

  // At most one dispute per transaction that is not resolved
  await sql`
    create unique index idx_disputes_open_transaction
    on disputes (transaction_id)
    where status != 'resolved'
  `.execute(db);

  await db.schema
    .createTable('audit_events')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('user_id', 'text', (col) => col.notNull())
    .addColumn('event', 'text', (col) => col.notNull())
    .addColumn('entity_id', 'text')
    .addColumn('details', 'text', (col) => col.notNull().defaultTo('{}'))
    .addColumn('created_at', 'text', (col) => col.notNull())
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('audit_events').execute();
  await db.schema.dropTable('disputes').execute();
  await db.schema.dropTable('transactions').execute();
  await db.schema.dropTable('merchant_aliases').execute();
  await db.schema.dropTable('merchants').execute();
}
