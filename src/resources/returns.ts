// ---------------------------------------------------------------------------
// Qantani SDK – Return URL Verification
// ---------------------------------------------------------------------------
// After paying, the consumer is sent back to the merchant's return URL with
// the transaction id, status, a salt and a checksum. The checksum is
// sha1(transactionId + transactionCode + status + salt), where the code is
// the one returned when the transaction was created.
//
// Unlike the iDEAL/transactions resources this needs no credentials or
// HTTP client.
//
// Usage:
//   ```ts
//   import { Qantani } from "qantani";
//
//   const payload = Qantani.returns.verify({
//     checksum: query.checksum,
//     transactionId: query.id,
//     transactionCode: storedCode,
//     status: query.status,
//     salt: query.salt,
//   });
//   ```
// ---------------------------------------------------------------------------

import { validateTransactionChecksum } from "../checksum";
import { QantaniError } from "../errors";
import type { TransactionReturnPayload } from "../types";

export class ReturnsResource {
  /**
   * Check a return-URL checksum.
   *
   * @returns `true` when the checksum matches.
   */
  isValid(payload: TransactionReturnPayload): boolean {
    return validateTransactionChecksum(
      payload.checksum,
      payload.transactionId,
      payload.transactionCode,
      payload.status,
      payload.salt,
    );
  }

  /**
   * Verify a return-URL checksum and hand the payload back.
   *
   * @throws {QantaniError} `signature_verification_error` on mismatch.
   */
  verify(payload: TransactionReturnPayload): TransactionReturnPayload {
    if (!payload.checksum) {
      throw QantaniError.generate(
        "signature_verification_error",
        "Return payload carries no checksum",
      );
    }

    if (!this.isValid(payload)) {
      throw QantaniError.generate("signature_verification_error");
    }

    return payload;
  }
}
