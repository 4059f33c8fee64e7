/**
 * ParcelStoreError
 * Structured error type thrown by parcel stores.
 * Callers branch on `kind` and read `details` for the parcel number and
 * statuses involved, without parsing the message.
 */

/**
 * Error kind determines how a caller reacts
 *
 * - "NoConnection": store has no live database handle
 * - "NewStatusUnrecognised": requested status is not a known token
 * - "StoredStatusUnrecognised": persisted status is not a known token (corrupt record)
 * - "InvalidStatusTransition": requested status is not exactly one step forward
 * - "RequireRegisteredStatus": address change or deletion outside "registered"
 * - "NotFound": no parcel with the given number
 * - "ConcurrentModification": the guarded row changed between check and write
 * - "InvalidParcel": input does not have the expected shape
 * - "Cancelled": the caller aborted the operation
 * - "Storage": the underlying driver failed
 */
export type ParcelErrorKind =
  | "NoConnection"
  | "NewStatusUnrecognised"
  | "StoredStatusUnrecognised"
  | "InvalidStatusTransition"
  | "RequireRegisteredStatus"
  | "NotFound"
  | "ConcurrentModification"
  | "InvalidParcel"
  | "Cancelled"
  | "Storage";

export type ParcelOperation =
  | "add"
  | "get"
  | "getByClient"
  | "setStatus"
  | "setAddress"
  | "delete";

/**
 * Context attached to every ParcelStoreError
 */
export interface ParcelErrorDetails {
  operation?: ParcelOperation;
  number?: number;
  client?: number;
  /** Status currently persisted for the parcel */
  storedStatus?: string;
  /** Status the caller asked for */
  newStatus?: string;
}

export class ParcelStoreError extends Error {
  readonly kind: ParcelErrorKind;

  readonly details: ParcelErrorDetails;

  /**
   * Raw validation output or driver payload, for debugging
   */
  readonly raw?: unknown;

  constructor(
    message: string,
    kind: ParcelErrorKind,
    details: ParcelErrorDetails = {},
    opts?: {
      cause?: unknown;
      raw?: unknown;
    }
  ) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    Object.setPrototypeOf(this, ParcelStoreError.prototype);
    this.name = "ParcelStoreError";
    this.kind = kind;
    this.details = details;
    this.raw = opts?.raw;
  }

  is(kind: ParcelErrorKind): boolean {
    return this.kind === kind;
  }
}

export function isParcelStoreError(
  error: unknown,
  kind?: ParcelErrorKind
): error is ParcelStoreError {
  if (!(error instanceof ParcelStoreError)) return false;
  return kind === undefined || error.kind === kind;
}

export function noConnection(operation: ParcelOperation): ParcelStoreError {
  return new ParcelStoreError(
    `${operation}: no database connection`,
    "NoConnection",
    { operation }
  );
}

export function notFound(operation: ParcelOperation, number: number): ParcelStoreError {
  return new ParcelStoreError(
    `${operation}: parcel ${number} not found`,
    "NotFound",
    { operation, number }
  );
}

export function concurrentModification(
  operation: ParcelOperation,
  number: number,
  storedStatus: string
): ParcelStoreError {
  return new ParcelStoreError(
    `${operation}: parcel ${number} changed after its status was read as "${storedStatus}"`,
    "ConcurrentModification",
    { operation, number, storedStatus }
  );
}

/**
 * Wrap a driver failure with the operation and identifier it happened under.
 * ParcelStoreErrors pass through unchanged.
 */
export function storageFailure(
  error: unknown,
  operation: ParcelOperation,
  details: Omit<ParcelErrorDetails, "operation"> = {}
): ParcelStoreError {
  if (error instanceof ParcelStoreError) return error;

  const subject =
    details.number !== undefined
      ? `parcel ${details.number}`
      : details.client !== undefined
        ? `client ${details.client}`
        : "parcel";
  const reason = error instanceof Error ? error.message : String(error);

  return new ParcelStoreError(
    `${operation} failed for ${subject}: ${reason}`,
    "Storage",
    { ...details, operation },
    { cause: error }
  );
}
