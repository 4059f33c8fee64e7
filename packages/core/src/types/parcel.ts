/**
 * Parcel domain type
 * A tracked shipment record owned by a client.
 */
export interface Parcel {
  /** Store-assigned identifier (0 before insertion) */
  number: number;

  /** Owning client identifier */
  client: number;

  /**
   * Lifecycle status as stored.
   * Normally a ParcelStatus; any other value marks a corrupt record.
   */
  status: string;

  /** Delivery address, editable while the parcel is registered */
  address: string;

  /** Creation timestamp, e.g. RFC 3339 */
  createdAt: string;
}

/**
 * Input to `add`. A supplied number is ignored; the store assigns one.
 */
export type NewParcel = Omit<Parcel, 'number'> & { number?: number };
