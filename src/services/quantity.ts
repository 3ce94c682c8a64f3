import { z } from "zod";
import { ValidationError, zodIssues } from "../middleware/error.js";
import type { Quantity } from "../types/contracts.js";

export const MAX_QUANTITY_VALUE = 999_999.99;
export const MAX_UNIT_LENGTH = 50;

export const quantityValueSchema = z
  .number({ invalid_type_error: "Quantity value must be a number" })
  .finite()
  .min(0, "Quantity value cannot be negative")
  .max(MAX_QUANTITY_VALUE, `Quantity value cannot exceed ${MAX_QUANTITY_VALUE}`);

export const quantityUnitSchema = z
  .string({ invalid_type_error: "Quantity unit must be a string" })
  .min(1, "Quantity unit cannot be empty")
  .max(MAX_UNIT_LENGTH, `Quantity unit cannot exceed ${MAX_UNIT_LENGTH} characters`);

const quantitySchema = z.object({
  value: quantityValueSchema,
  unit: quantityUnitSchema,
});

/** Units are opaque labels: stored and compared verbatim, never converted. */
export function createQuantity(value: number, unit: string): Quantity {
  const parsed = quantitySchema.safeParse({ value, unit });
  if (!parsed.success) {
    throw new ValidationError("Invalid quantity", zodIssues(parsed.error));
  }
  return Object.freeze({ value: parsed.data.value, unit: parsed.data.unit });
}

/** Parses strings such as "250 g" or "1.5 cups". */
export function parseQuantity(text: string): Quantity {
  const match = /^\s*(\S+)\s+(.+?)\s*$/.exec(text);
  const value = match?.[1] !== undefined ? Number(match[1]) : Number.NaN;
  if (!match?.[2] || !Number.isFinite(value)) {
    throw new ValidationError(`Invalid quantity format: ${text}`, [
      { path: "quantity", message: "Expected '<value> <unit>'" },
    ]);
  }
  return createQuantity(value, match[2]);
}
