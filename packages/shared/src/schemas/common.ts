/**
 * Common Schema Primitives
 * Shared types used across all schemas
 */

import { z } from "zod";

// ============================================
// SCHEMA VERSIONING
// ============================================

export const CURRENT_SNAPSHOT_VERSION = 2;

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

const ADDRESS_PATTERN = /^0x[a-fA-F0-9]{40}$/;

/** Account identity: 20-byte hex address */
export const addressSchema = z.custom<`0x${string}`>(
  (value) => typeof value === "string" && ADDRESS_PATTERN.test(value),
  "Invalid account address"
);

/**
 * Unsigned integer amount as a decimal string.
 * Value and share amounts never travel as JS numbers.
 */
export const uintStringSchema = z
  .string()
  .regex(/^\d+$/, "Amount must be a non-negative integer string");

/** Signed integer amount as a decimal string */
export const intStringSchema = z
  .string()
  .regex(/^-?\d+$/, "Amount must be an integer string");

/** BigInt accepted from JSON (string), JS (bigint) or safe integer (number) */
export const bigIntSchema = z.union([
  z.bigint(),
  intStringSchema.transform((val) => BigInt(val)),
  z.number().int().transform((val) => BigInt(val)),
]);

/** Non-negative BigInt */
export const uintSchema = bigIntSchema.refine((val) => val >= 0n, {
  message: "Amount must be non-negative",
});

/** Epoch milliseconds */
export const epochMsSchema = z.number().int().nonnegative();
