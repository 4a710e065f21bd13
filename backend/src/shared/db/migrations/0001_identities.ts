import { Kysely, sql } from 'kysely';

// Migrations run against whatever schema exists at the time, hence Kysely<any>.
export async function up(db: Kysely<any>): Promise<void> {
  await sql`CREATE EXTENSION IF NOT EXISTS "pgcrypto";`.execute(db);

  await db.schema
    .createTable('identities')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('email', 'text', (col) => col.notNull().unique())
    .addColumn('username', 'text', (col) => col.unique())
    .addColumn('password_hash', 'text')
    // Unique constraints back up TokenGenerator: its existence check alone
    // cannot rule out two concurrent requests drawing the same token.
    .addColumn('reset_password_token', 'text', (col) => col.unique())
    .addColumn('reset_password_sent_at', 'timestamptz')
    .addColumn('confirmation_token', 'text', (col) => col.unique())
    .addColumn('confirmation_sent_at', 'timestamptz')
    .addColumn('confirmed_at', 'timestamptz')
    .addColumn('locked_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('identities').ifExists().execute();
}
