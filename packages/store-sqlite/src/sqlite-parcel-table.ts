import { and, eq } from 'drizzle-orm';
import type { Parcel, ParcelRow, ParcelTable } from '@parcelkeeper/core';
import type { DatabaseConnection } from './db/connection.js';
import { parcel } from './db/schema.js';

/**
 * SqliteParcelTable
 * ParcelTable over the `parcel` table via Drizzle ORM.
 *
 * better-sqlite3 runs every statement synchronously; the promises only carry
 * the ParcelTable shape.
 */
export class SqliteParcelTable implements ParcelTable {
  constructor(private readonly connection: DatabaseConnection) {}

  isOpen(): boolean {
    return this.connection.sqlite.open;
  }

  async insert(row: ParcelRow): Promise<number> {
    const result = this.connection.db
      .insert(parcel)
      .values({
        client: row.client,
        status: row.status,
        address: row.address,
        createdAt: row.createdAt,
      })
      .run();
    return Number(result.lastInsertRowid);
  }

  async findByNumber(number: number): Promise<Parcel | undefined> {
    return this.connection.db.select().from(parcel).where(eq(parcel.number, number)).get();
  }

  async findByClient(client: number): Promise<Parcel[]> {
    return this.connection.db
      .select()
      .from(parcel)
      .where(eq(parcel.client, client))
      .orderBy(parcel.number)
      .all();
  }

  async findStatus(number: number): Promise<string | undefined> {
    const row = this.connection.db
      .select({ status: parcel.status })
      .from(parcel)
      .where(eq(parcel.number, number))
      .get();
    return row?.status;
  }

  async updateStatusIf(number: number, expectedStatus: string, status: string): Promise<number> {
    return this.connection.db
      .update(parcel)
      .set({ status })
      .where(and(eq(parcel.number, number), eq(parcel.status, expectedStatus)))
      .run().changes;
  }

  async updateAddressIf(number: number, expectedStatus: string, address: string): Promise<number> {
    return this.connection.db
      .update(parcel)
      .set({ address })
      .where(and(eq(parcel.number, number), eq(parcel.status, expectedStatus)))
      .run().changes;
  }

  async deleteIf(number: number, expectedStatus: string): Promise<number> {
    return this.connection.db
      .delete(parcel)
      .where(and(eq(parcel.number, number), eq(parcel.status, expectedStatus)))
      .run().changes;
  }
}
