/**
 * Drizzle ORM schema for the parcel table.
 *
 * `status` is a plain text column with no CHECK constraint: rows holding an
 * unknown status must still load, so the store can report them as corrupt.
 */

import { sqliteTable, integer, text, index } from 'drizzle-orm/sqlite-core';

export const parcel = sqliteTable(
  'parcel',
  {
    number: integer('number').primaryKey({ autoIncrement: true }),
    client: integer('client').notNull(),
    status: text('status', { length: 128 }).notNull(),
    address: text('address', { length: 512 }).notNull(),
    createdAt: text('created_at', { length: 64 }).notNull(),
  },
  (table) => [
    index('parcel_client').on(table.client),
    index('parcel_created_at').on(table.createdAt),
  ],
);

/**
 * DDL matching the schema above, applied by ensureParcelSchema
 */
export const PARCEL_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS parcel (
  number INTEGER PRIMARY KEY AUTOINCREMENT,
  client INTEGER NOT NULL,
  status VARCHAR(128) NOT NULL,
  address VARCHAR(512) NOT NULL,
  created_at VARCHAR(64) NOT NULL
);
CREATE INDEX IF NOT EXISTS parcel_client ON parcel(client);
CREATE INDEX IF NOT EXISTS parcel_created_at ON parcel(created_at);
`;
