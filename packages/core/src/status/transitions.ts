/**
 * Parcel status lifecycle
 *
 *   registered → sent → delivered
 *
 * A status may only move one step forward. "delivered" is terminal.
 * A stored value outside this set marks a corrupt record: no transition
 * leaves it until the row is corrected by hand.
 */

import { ParcelStoreError, type ParcelOperation } from "../errors/index.js";

export const PARCEL_STATUSES = ["registered", "sent", "delivered"] as const;

export type ParcelStatus = (typeof PARCEL_STATUSES)[number];

const STATUS_RANK: Record<ParcelStatus, number> = {
  registered: 0,
  sent: 1,
  delivered: 2,
};

/**
 * Own-property lookup so inherited names ("toString", "constructor")
 * never pass as statuses.
 */
export function isParcelStatus(value: unknown): value is ParcelStatus {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(STATUS_RANK, value);
}

export function statusRank(status: ParcelStatus): number {
  return STATUS_RANK[status];
}

/**
 * The only status a parcel may move to next, or undefined once delivered
 */
export function nextStatus(status: ParcelStatus): ParcelStatus | undefined {
  return PARCEL_STATUSES[statusRank(status) + 1];
}

export function isTerminalStatus(status: ParcelStatus): boolean {
  return nextStatus(status) === undefined;
}

export interface StatusTransition {
  from: ParcelStatus;
  to: ParcelStatus;
}

/**
 * A new parcel may start in any known status; only updates are forward-only
 */
export function checkNewStatus(client: number, status: string): ParcelStatus {
  if (!isParcelStatus(status)) {
    throw new ParcelStoreError(
      `add: unrecognised new status "${status}" for client ${client}`,
      "NewStatusUnrecognised",
      { operation: "add", client, newStatus: status }
    );
  }
  return status;
}

/**
 * Validate a requested status change against the stored status.
 *
 * Checks run in a fixed order: the requested status first, then the stored
 * one, then the rank difference, which must be exactly 1.
 */
export function checkStatusTransition(
  number: number,
  storedStatus: string,
  newStatus: string
): StatusTransition {
  const details = { operation: "setStatus" as const, number, storedStatus, newStatus };

  if (!isParcelStatus(newStatus)) {
    throw new ParcelStoreError(
      `setStatus: unrecognised new status "${newStatus}" for parcel ${number}`,
      "NewStatusUnrecognised",
      details
    );
  }
  if (!isParcelStatus(storedStatus)) {
    throw new ParcelStoreError(
      `setStatus: unrecognised stored status "${storedStatus}" for parcel ${number}`,
      "StoredStatusUnrecognised",
      details
    );
  }
  if (statusRank(newStatus) - statusRank(storedStatus) !== 1) {
    throw new ParcelStoreError(
      `setStatus: invalid status transition "${storedStatus}" → "${newStatus}" for parcel ${number}`,
      "InvalidStatusTransition",
      details
    );
  }

  return { from: storedStatus, to: newStatus };
}

/**
 * Address changes and deletion are only allowed while the parcel is registered
 */
export function checkRegistered(
  operation: Extract<ParcelOperation, "setAddress" | "delete">,
  number: number,
  storedStatus: string
): void {
  if (storedStatus !== "registered") {
    throw new ParcelStoreError(
      `${operation}: requires registered status (parcel ${number} has status "${storedStatus}")`,
      "RequireRegisteredStatus",
      { operation, number, storedStatus }
    );
  }
}
