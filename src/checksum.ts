// ---------------------------------------------------------------------------
// Qantani SDK – Checksums
// ---------------------------------------------------------------------------
// Request checksum:  sha1( values sorted by key, concatenated + secret )
// Return checksum:   sha1( transactionId + transactionCode + status + salt )
// ---------------------------------------------------------------------------

import { createHash, timingSafeEqual } from "node:crypto";
import type { RequestParams } from "./types";

/** SHA1 → lowercase hex. */
export function sha1Hex(data: string): string {
  return createHash("sha1").update(data, "utf8").digest("hex");
}

/**
 * Checksum proving knowledge of the merchant secret for one request.
 *
 * 1. Order parameters by key.
 * 2. Concatenate all values in that order.
 * 3. Append the merchant secret.
 * 4. Take the SHA1 hex digest.
 */
export function createChecksum(params: RequestParams, secret: string): string {
  const values = Object.keys(params)
    .sort(compareKeys)
    .map((key) => String(params[key]))
    .join("");
  return sha1Hex(`${values}${secret}`);
}

/**
 * Check the checksum Qantani appends to the return URL.
 *
 * Returns `false` rather than throwing; see `ReturnsResource.verify` for the
 * throwing variant.
 */
export function validateTransactionChecksum(
  checksum: string,
  transactionId: string | number,
  transactionCode: string,
  status: string | number,
  salt: string,
): boolean {
  const joined = [String(transactionId), transactionCode, String(status), salt].join("");
  return constantTimeEqual(checksum, sha1Hex(joined));
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Constant-time string comparison to prevent timing attacks. */
function constantTimeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, "utf8");
  const right = Buffer.from(b, "utf8");
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}
