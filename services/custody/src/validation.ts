/**
 * Input validation helpers
 *
 * Bridges zod schemas from @mintvault/shared to CustodyError codes.
 */

import { addressSchema, timestampMsSchema, type Address } from "@mintvault/shared";
import type { z } from "zod";
import { custodyError, type CustodyErrorCode } from "./errors.js";

/**
 * Parse a value with a schema, mapping any failure to a single error code.
 */
export function validateField<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  code: CustodyErrorCode,
  field?: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw custodyError(code, {
      context: {
        field,
        issues: result.error.issues.map((issue) => issue.message),
      },
    });
  }
  return result.data;
}

export function parseAddress(value: string): Address {
  return validateField(addressSchema, value, "INVALID_ADDRESS", "address");
}

export function parseTimestamp(value: number, code: CustodyErrorCode, field: string): number {
  return validateField(timestampMsSchema, value, code, field);
}
