// ---------------------------------------------------------------------------
// Qantani SDK – Main Client
// ---------------------------------------------------------------------------
// The primary entry point for SDK consumers.
//
//   - Grouped resources: `qantani.ideal.getBanks()`,
//     `qantani.transactions.checkStatus(…)`
//   - Flat shortcuts for the same calls: `qantani.getIdealBanks()` …
//   - Resources are lazy properties, created once per client
//   - Credentials are read-only after construction
// ---------------------------------------------------------------------------

import { validateTransactionChecksum } from "./checksum";
import { HttpClient } from "./http";
import { IdealResource } from "./resources/ideal";
import { ReturnsResource } from "./resources/returns";
import { TransactionsResource } from "./resources/transactions";
import type {
  CreateIdealTransactionParams,
  IdealBank,
  IdealTransaction,
  QantaniConfig,
  RequestParams,
  TransactionStatus,
} from "./types";

/**
 * The Qantani SDK client.
 *
 * @example
 * ```ts
 * import { Qantani } from "qantani";
 *
 * const qantani = new Qantani({
 *   merchantId: 1234,
 *   merchantKey: "your-merchant-key",
 *   merchantSecret: process.env.QANTANI_SECRET ?? "",
 * });
 *
 * const banks = await qantani.getIdealBanks();
 * const tx = await qantani.createIdealTransaction({
 *   amount: 25,
 *   bankId: banks[0].Id,
 *   description: "Order 1001",
 *   returnUrl: "https://shop.example/return",
 * });
 * ```
 */
export class Qantani {
  /** Internal HTTP transport – shared across all resources. */
  private readonly http: HttpClient;

  /**
   * Static return-URL verification utility.
   *
   * Does NOT require a client instance.
   */
  static readonly returns = new ReturnsResource();

  private _ideal?: IdealResource;
  private _transactions?: TransactionsResource;

  /**
   * Create a new Qantani client.
   *
   * @throws {QantaniError} `invalid_request_error` when a credential is empty.
   */
  constructor(config: QantaniConfig) {
    this.http = new HttpClient(config);
  }

  /**
   * Verify the checksum appended to the return URL.
   *
   * `sha1(transactionId + transactionCode + status + salt) === checksum`
   */
  static validateTransactionChecksum(
    checksum: string,
    transactionId: string | number,
    transactionCode: string,
    status: string | number,
    salt: string,
  ): boolean {
    return validateTransactionChecksum(
      checksum,
      transactionId,
      transactionCode,
      status,
      salt,
    );
  }

  // ── Resource accessors ───────────────────────────────────────────────────

  /** iDEAL resource: bank listing and transaction creation. */
  get ideal(): IdealResource {
    if (!this._ideal) {
      this._ideal = new IdealResource(this.http);
    }
    return this._ideal;
  }

  /** Transaction status resource. */
  get transactions(): TransactionsResource {
    if (!this._transactions) {
      this._transactions = new TransactionsResource(this.http);
    }
    return this._transactions;
  }

  // ── Shortcuts ────────────────────────────────────────────────────────────

  /** Checksum for a parameter map, signed with this client's secret. */
  createChecksum(params: RequestParams): string {
    return this.http.checksum(params);
  }

  /** @see IdealResource.getBanks */
  getIdealBanks(): Promise<IdealBank[]> {
    return this.ideal.getBanks();
  }

  /** @see IdealResource.createTransaction */
  createIdealTransaction(
    params: CreateIdealTransactionParams,
  ): Promise<IdealTransaction> {
    return this.ideal.createTransaction(params);
  }

  /** @see TransactionsResource.checkStatus */
  checkTransactionStatus(
    transactionId: string | number,
    transactionCode: string,
  ): Promise<TransactionStatus> {
    return this.transactions.checkStatus(transactionId, transactionCode);
  }
}
