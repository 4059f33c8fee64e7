import type { Parcel, NewParcel } from '../types/index.js';
import type { OperationContext } from './operation-context.js';
import type { Logger } from './logger.js';

/**
 * ParcelStore
 * Guarded CRUD over parcel records.
 *
 * Every method rejects with a ParcelStoreError. A store without a live
 * database handle rejects with kind "NoConnection" before validating
 * anything else.
 */
export interface ParcelStore {
  /**
   * Insert a parcel and return its generated number.
   * The status must be one of registered, sent or delivered.
   */
  add(parcel: NewParcel, ctx?: OperationContext): Promise<number>;

  /** Load one parcel; rejects with "NotFound" when it does not exist */
  get(number: number, ctx?: OperationContext): Promise<Parcel>;

  /** All parcels of a client, in no particular order; empty when none */
  getByClient(client: number, ctx?: OperationContext): Promise<Parcel[]>;

  /** Move the status exactly one step forward */
  setStatus(number: number, status: string, ctx?: OperationContext): Promise<void>;

  /** Change the address of a registered parcel */
  setAddress(number: number, address: string, ctx?: OperationContext): Promise<void>;

  /** Remove a registered parcel */
  delete(number: number, ctx?: OperationContext): Promise<void>;
}

/**
 * Options shared by store implementations
 */
export interface ParcelStoreOptions {
  /** Default logger; OperationContext.logger overrides it per call */
  logger?: Logger;
}
