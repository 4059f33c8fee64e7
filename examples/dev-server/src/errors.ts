/**
 * Maps store errors to HTTP responses
 */

import { ParcelStoreError, type ParcelErrorKind } from '@parcelkeeper/core';

export interface ErrorBody {
  error: string;
  message: string;
  details: Record<string, unknown>;
}

export const STATUS_BY_KIND: Record<ParcelErrorKind, number> = {
  InvalidParcel: 400,
  NewStatusUnrecognised: 400,
  NotFound: 404,
  InvalidStatusTransition: 409,
  RequireRegisteredStatus: 409,
  ConcurrentModification: 409,
  StoredStatusUnrecognised: 422,
  NoConnection: 503,
  Cancelled: 503,
  Storage: 500,
};

export function toHttpError(error: unknown): { statusCode: number; body: ErrorBody } {
  if (error instanceof ParcelStoreError) {
    return {
      statusCode: STATUS_BY_KIND[error.kind],
      body: { error: error.kind, message: error.message, details: { ...error.details } },
    };
  }

  return {
    statusCode: 500,
    body: {
      error: 'Internal',
      message: error instanceof Error ? error.message : String(error),
      details: {},
    },
  };
}
