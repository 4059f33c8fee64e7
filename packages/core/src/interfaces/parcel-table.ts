import type { Parcel } from '../types/index.js';

export type ParcelRow = Omit<Parcel, 'number'>;

/**
 * ParcelTable
 * The relational handle a GuardedParcelStore runs its statements against.
 *
 * Each method is one statement. Conditional writes re-check the status the
 * guard saw and resolve with the number of affected rows, so a store can
 * tell a lost race from success.
 */
export interface ParcelTable {
  /** False once the underlying handle has been closed */
  isOpen(): boolean;

  /** Insert a row and resolve with the generated number */
  insert(row: ParcelRow): Promise<number>;

  findByNumber(number: number): Promise<Parcel | undefined>;

  findByClient(client: number): Promise<Parcel[]>;

  /** Status column only; undefined when the parcel does not exist */
  findStatus(number: number): Promise<string | undefined>;

  updateStatusIf(number: number, expectedStatus: string, status: string): Promise<number>;

  updateAddressIf(number: number, expectedStatus: string, address: string): Promise<number>;

  deleteIf(number: number, expectedStatus: string): Promise<number>;
}
