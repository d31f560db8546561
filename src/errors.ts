// ---------------------------------------------------------------------------
// Qantani SDK – Error Class
// ---------------------------------------------------------------------------
// Every failure surfaced by the SDK is a QantaniError. Callers tell the
// failure modes apart by `code`; nothing is retried or recovered locally.
// ---------------------------------------------------------------------------

/** Machine-readable error codes emitted by the SDK. */
export type QantaniErrorCode =
  | "remote_error" //                 non-200 HTTP status
  | "malformed_response" //           body is not well-formed XML
  | "protocol_error" //               response lacks an expected element
  | "api_error" //                    Status present but not "OK"
  | "network_error" //                fetch failed (DNS, TLS, timeout, etc.)
  | "invalid_request_error" //        bad config or call arguments
  | "signature_verification_error"; // return-URL checksum mismatch

/**
 * Base error class for all Qantani SDK errors.
 *
 * Every error includes:
 * - `code`       – a machine-readable error type
 * - `statusCode` – the HTTP status (or 0 when no response was involved)
 * - `raw`        – the raw response body, when one was read
 *
 * @example
 * ```ts
 * try {
 *   await qantani.getIdealBanks();
 * } catch (err) {
 *   if (err instanceof QantaniError) {
 *     switch (err.code) {
 *       case "api_error":     // err.message is the provider's Description
 *       case "network_error": // Provider unreachable
 *     }
 *   }
 * }
 * ```
 */
export class QantaniError extends Error {
  /** HTTP status code returned by the API (0 when not applicable). */
  public readonly statusCode: number;
  /** Machine-readable error classification. */
  public readonly code: QantaniErrorCode;
  /** Raw response body, when available. */
  public readonly raw?: string;

  constructor(
    message: string,
    statusCode: number,
    code: QantaniErrorCode,
    raw?: string,
  ) {
    super(message);
    this.name = "QantaniError";
    this.statusCode = statusCode;
    this.code = code;
    this.raw = raw;

    // Required for `instanceof` to work correctly when compiled to ES5
    // or when errors cross realm boundaries (e.g. vm contexts).
    Object.setPrototypeOf(this, QantaniError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QantaniError);
    }
  }

  /**
   * Factory used by the transport layer. Falls back to a generic message
   * per code when none is supplied.
   */
  static generate(
    code: QantaniErrorCode,
    message?: string,
    statusCode = 0,
    raw?: string,
  ): QantaniError {
    return new QantaniError(
      message ?? defaultMessage(code, statusCode),
      statusCode,
      code,
      raw,
    );
  }

  /** Human-readable representation for logging/debugging. */
  override toString(): string {
    return `[QantaniError: ${this.code}] ${this.message} (HTTP ${this.statusCode})`;
  }

  /** Serialise to a plain object – useful for structured logging. */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      raw: this.raw,
    };
  }
}

function defaultMessage(code: QantaniErrorCode, statusCode: number): string {
  switch (code) {
    case "remote_error":
      return `Qantani has an error (HTTP ${statusCode})`;
    case "malformed_response":
      return "Qantani delivered broken XML";
    case "protocol_error":
      return "Qantani does not follow their own API";
    case "api_error":
      return "Qantani rejected the request";
    case "network_error":
      return "Network error";
    case "invalid_request_error":
      return "Invalid request";
    case "signature_verification_error":
      return "Checksum did not match";
  }
}
