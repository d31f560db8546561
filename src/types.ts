// ---------------------------------------------------------------------------
// Qantani SDK – Type Definitions
// ---------------------------------------------------------------------------
// Response shapes mirror what the XML-to-native conversion produces for each
// command. Field names keep the provider's element names.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

// ── Native values ──────────────────────────────────────────────────────────
/** Result of converting an XML element into plain JS values. */
export type NativeValue = string | null | NativeValue[] | NativeRecord;

export interface NativeRecord {
  [key: string]: NativeValue;
}

/** Parameter values accepted in a request's `Parameters` block. */
export type ParamValue = string | number;

/** Ordered parameter map sent with a command. */
export type RequestParams = Record<string, ParamValue>;

// ── iDEAL ──────────────────────────────────────────────────────────────────
/** A bank available for iDEAL payments. */
export interface IdealBank {
  /** Bank identifier to pass as `bankId` (e.g. `"ASN_BANK"`). */
  readonly Id: string;
  /** Display name (e.g. `"ASN Bank"`). */
  readonly Name: string;
}

/** Parameters required to start an iDEAL transaction. */
export interface CreateIdealTransactionParams {
  /** Amount in euros; sent with two decimals (e.g. `12.5` → `"12.50"`). */
  amount: number;
  /** Bank identifier from `getIdealBanks()`. */
  bankId: string;
  /** Description shown to the consumer. */
  description: string;
  /** URL the consumer is sent back to after paying. */
  returnUrl: string;
}

/** Successful response of `IDEAL.EXECUTE`. */
export interface IdealTransaction {
  readonly Status?: string | null;
  /** URL to redirect the consumer to. */
  readonly BankURL: string;
  readonly Code: string;
  readonly TransactionID: string;
  readonly Acquirer: string | null;
}

// ── Transaction status ─────────────────────────────────────────────────────
/** Paying consumer details; empty until the bank reports them. */
export interface TransactionConsumer {
  readonly Name: string | null;
  readonly IBAN: string | null;
  readonly Bank: string | null;
}

/** Successful response of `TRANSACTIONSTATUS`. */
export interface TransactionStatus {
  /** `YYYY-MM-DD HH:MM` */
  readonly Date: string | null;
  readonly ID: string;
  /** `"Y"` or `"N"`. */
  readonly Paid: string | null;
  /** `"Y"` or `"N"`. */
  readonly Definitive: string | null;
  readonly Consumer: TransactionConsumer;
  readonly MerchantID: string | null;
  readonly CurrentDate: string | null;
}

// ── Return URL ─────────────────────────────────────────────────────────────
/** Values Qantani appends to the return URL after a payment. */
export interface TransactionReturnPayload {
  checksum: string;
  transactionId: string | number;
  transactionCode: string;
  status: string | number;
  salt: string;
}

// ── Client Config ──────────────────────────────────────────────────────────
/** Configuration options for initialising the Qantani client. */
export interface QantaniConfig {
  /** Merchant ID from the Qantani dashboard. */
  merchantId: string | number;
  /** Merchant key, sent with every request. */
  merchantKey: string;
  /** Merchant secret used for checksums. **Never sent over the wire.** */
  merchantSecret: string;
  /**
   * Override the API endpoint.
   * @default "https://www.qantanipayments.com/api/"
   */
  endpoint?: string;
  /**
   * Request timeout in milliseconds.
   * @default 30_000
   */
  timeout?: number;
  /** pino logger; a silent one is used when omitted. */
  logger?: Logger;
}
