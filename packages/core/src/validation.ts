import { z } from 'zod';
import { ParcelStoreError, type ParcelErrorDetails, type ParcelOperation } from './errors/index.js';
import type { NewParcel } from './types/index.js';

/**
 * Zod schemas for runtime validation of store input.
 * Column limits follow the parcel table definition.
 */

export const MAX_ADDRESS_LENGTH = 512;
export const MAX_CREATED_AT_LENGTH = 64;

export const ParcelNumberSchema = z.number().int();

export const ClientIdSchema = z.number().int();

export const AddressSchema = z.string().max(MAX_ADDRESS_LENGTH);

/**
 * Status stays a free string here: membership in the status set is checked
 * by the lifecycle rules, which report it as NewStatusUnrecognised.
 */
export const NewParcelSchema = z.object({
  number: z.number().optional(),
  client: ClientIdSchema,
  status: z.string(),
  address: AddressSchema,
  createdAt: z.string().max(MAX_CREATED_AT_LENGTH),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Parse input or throw ParcelStoreError("InvalidParcel") with the zod issues attached
 */
export function parseOrThrow<T>(
  schema: z.ZodType<T>,
  input: unknown,
  operation: ParcelOperation,
  details: Omit<ParcelErrorDetails, 'operation'> = {}
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ParcelStoreError(
      `${operation}: invalid input: ${describeIssues(result.error)}`,
      'InvalidParcel',
      { ...details, operation },
      { raw: result.error.issues }
    );
  }
  return result.data;
}

export function parseNewParcel(input: NewParcel): NewParcel {
  return parseOrThrow(NewParcelSchema, input, 'add');
}
