// ---------------------------------------------------------------------------
// Qantani SDK – Public API Surface
// ---------------------------------------------------------------------------
// Everything re-exported here is part of the public contract.
// The transport (http.ts) stays internal.
// ---------------------------------------------------------------------------

// ── Main client ────────────────────────────────────────────────────────────
export { Qantani } from "./client";

// ── Errors ─────────────────────────────────────────────────────────────────
export { QantaniError } from "./errors";
export type { QantaniErrorCode } from "./errors";

// ── Checksums & XML helpers ────────────────────────────────────────────────
export { createChecksum, validateTransactionChecksum } from "./checksum";
export { findElement, parseXmlTree, xmlToNative } from "./xml";
export type { XmlNode } from "./xml";

// ── Types ──────────────────────────────────────────────────────────────────
export type {
  // Config
  QantaniConfig,
  // Requests
  ParamValue,
  RequestParams,
  // iDEAL
  IdealBank,
  CreateIdealTransactionParams,
  IdealTransaction,
  // Status
  TransactionStatus,
  TransactionConsumer,
  // Return URL
  TransactionReturnPayload,
  // Converted XML
  NativeValue,
  NativeRecord,
} from "./types";

// ── Version ────────────────────────────────────────────────────────────────
/** SDK version string for runtime introspection. */
export const SDK_VERSION = "0.1.0" as const;
