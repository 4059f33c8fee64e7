import type { ParcelRow, ParcelStoreOptions, ParcelTable } from "../interfaces/index.js";
import type { Parcel } from "../types/index.js";
import { GuardedParcelStore } from "./guarded-store.js";

/**
 * InMemoryParcelTable
 * Map-backed ParcelTable with the same statement semantics as the SQL table:
 * numbers are never reused, conditional writes report affected rows.
 */
export class InMemoryParcelTable implements ParcelTable {
  private parcels = new Map<number, Parcel>();
  private lastNumber = 0;
  private open = true;

  isOpen(): boolean {
    return this.open;
  }

  async insert(row: ParcelRow): Promise<number> {
    const number = ++this.lastNumber;
    this.parcels.set(number, { ...row, number });
    return number;
  }

  async findByNumber(number: number): Promise<Parcel | undefined> {
    const parcel = this.parcels.get(number);
    return parcel ? { ...parcel } : undefined;
  }

  async findByClient(client: number): Promise<Parcel[]> {
    return [...this.parcels.values()]
      .filter((parcel) => parcel.client === client)
      .map((parcel) => ({ ...parcel }));
  }

  async findStatus(number: number): Promise<string | undefined> {
    return this.parcels.get(number)?.status;
  }

  async updateStatusIf(number: number, expectedStatus: string, status: string): Promise<number> {
    const parcel = this.parcels.get(number);
    if (!parcel || parcel.status !== expectedStatus) return 0;
    parcel.status = status;
    return 1;
  }

  async updateAddressIf(number: number, expectedStatus: string, address: string): Promise<number> {
    const parcel = this.parcels.get(number);
    if (!parcel || parcel.status !== expectedStatus) return 0;
    parcel.address = address;
    return 1;
  }

  async deleteIf(number: number, expectedStatus: string): Promise<number> {
    const parcel = this.parcels.get(number);
    if (!parcel || parcel.status !== expectedStatus) return 0;
    this.parcels.delete(number);
    return 1;
  }

  /**
   * Store a row as-is, bypassing every rule (e.g. a corrupt status)
   */
  seed(row: ParcelRow): number {
    const number = ++this.lastNumber;
    this.parcels.set(number, { ...row, number });
    return number;
  }

  size(): number {
    return this.parcels.size;
  }

  clear(): void {
    this.parcels.clear();
  }

  close(): void {
    this.open = false;
  }
}

/**
 * InMemoryParcelStore
 * Parcel store for testing and local development
 * Not suitable for production use
 */
export class InMemoryParcelStore extends GuardedParcelStore {
  constructor(
    private readonly rows: InMemoryParcelTable = new InMemoryParcelTable(),
    options: ParcelStoreOptions = {}
  ) {
    super(rows, options);
  }

  /**
   * Insert a raw record without validation, returning its number
   */
  seed(row: ParcelRow): number {
    return this.rows.seed(row);
  }

  size(): number {
    return this.rows.size();
  }

  /**
   * Clear all data (useful for testing)
   */
  clear(): void {
    this.rows.clear();
  }

  /**
   * Drop the handle; every later call fails with NoConnection
   */
  close(): void {
    this.rows.close();
  }
}
