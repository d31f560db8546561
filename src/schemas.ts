// ---------------------------------------------------------------------------
// Qantani SDK – Response Schemas
// ---------------------------------------------------------------------------
// Guards the shape the XML conversion produced before it is handed out as a
// typed result. Unknown fields pass through untouched.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { QantaniError } from "./errors";
import type { NativeValue } from "./types";

const text = z.string().nullable();

export const idealBankSchema = z
  .object({
    Id: z.string(),
    Name: z.string(),
  })
  .passthrough();

export const idealBanksSchema = z.array(idealBankSchema);

export const idealTransactionSchema = z
  .object({
    Status: text.optional(),
    BankURL: z.string(),
    Code: z.string(),
    TransactionID: z.string(),
    Acquirer: text,
  })
  .passthrough();

export const transactionStatusSchema = z
  .object({
    Date: text,
    ID: z.string(),
    Paid: text,
    Definitive: text,
    Consumer: z
      .object({
        Name: text,
        IBAN: text,
        Bank: text,
      })
      .passthrough(),
    MerchantID: text,
    CurrentDate: text,
  })
  .passthrough();

/**
 * Validate a converted response against a schema.
 *
 * @throws {QantaniError} `protocol_error` listing the offending paths.
 */
export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  value: NativeValue,
  command: string,
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw QantaniError.generate(
      "protocol_error",
      `Unexpected ${command} response: ${issues}`,
      200,
    );
  }
  return result.data;
}

/** Take the value under `key` from a single-entry mapping. */
export function unwrap(value: NativeValue, key: string, command: string): NativeValue {
  if (value !== null && typeof value === "object" && !Array.isArray(value) && key in value) {
    return value[key];
  }
  throw QantaniError.generate(
    "protocol_error",
    `Unexpected ${command} response: missing ${key}`,
    200,
  );
}
