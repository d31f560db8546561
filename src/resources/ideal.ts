// ---------------------------------------------------------------------------
// Qantani SDK – iDEAL Resource
// ---------------------------------------------------------------------------
// Bank listing and transaction creation for iDEAL payments.
// ---------------------------------------------------------------------------

import { QantaniError } from "../errors";
import type { HttpClient } from "../http";
import {
  idealBanksSchema,
  idealTransactionSchema,
  parseResponse,
  unwrap,
} from "../schemas";
import type {
  CreateIdealTransactionParams,
  IdealBank,
  IdealTransaction,
} from "../types";

/**
 * Resource class for iDEAL commands.
 *
 * @example
 * ```ts
 * const banks = await qantani.ideal.getBanks();
 *
 * const tx = await qantani.ideal.createTransaction({
 *   amount: 12.5,
 *   bankId: banks[0].Id,
 *   description: "Order 1001",
 *   returnUrl: "https://shop.example/return",
 * });
 *
 * // Redirect the consumer to their bank
 * console.log(tx.BankURL);
 * ```
 */
export class IdealResource {
  constructor(private readonly http: HttpClient) {}

  /**
   * List all banks available for iDEAL.
   *
   * @returns Banks in the order Qantani sends them; `[]` when none.
   * @throws  {QantaniError} on transport or provider failure.
   */
  async getBanks(): Promise<IdealBank[]> {
    const command = "IDEAL.GETBANKS";
    const banks = await this.http.request(command, {}, "./Banks");

    // An empty <Banks/> converts to { Banks: null }.
    if (banks !== null && typeof banks === "object" && !Array.isArray(banks)) {
      if (banks.Banks === null) return [];
    }

    return parseResponse(idealBanksSchema, banks, command);
  }

  /**
   * Initiate an iDEAL transaction in euros.
   *
   * @returns Redirect URL and the transaction id/code pair to keep for
   *          status checks.
   * @throws  {QantaniError} `invalid_request_error` for a non-positive amount.
   */
  async createTransaction(
    params: CreateIdealTransactionParams,
  ): Promise<IdealTransaction> {
    if (!Number.isFinite(params.amount) || params.amount <= 0) {
      throw QantaniError.generate(
        "invalid_request_error",
        "`amount` must be a positive number",
      );
    }

    const command = "IDEAL.EXECUTE";
    const response = await this.http.request(
      command,
      {
        Amount: formatAmount(params.amount),
        Currency: "EUR",
        Bank: params.bankId,
        Description: params.description,
        Return: params.returnUrl,
      },
      "./Response",
    );

    return parseResponse(
      idealTransactionSchema,
      unwrap(response, "Response", command),
      command,
    );
  }
}

/** Two decimals; an exact half cent rounds to the even cent. */
function formatAmount(amount: number): string {
  const eighths = amount * 8;
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    const lower = Math.floor(amount * 100);
    const cents = lower % 2 === 0 ? lower : lower + 1;
    return (cents / 100).toFixed(2);
  }
  return amount.toFixed(2);
}
