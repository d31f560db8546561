// ---------------------------------------------------------------------------
// Qantani SDK – HTTP Transport Layer
// ---------------------------------------------------------------------------
// A thin HTTP client built on the global `fetch()` API.
// Handles:
//   - Signing every command with the merchant credentials + checksum
//   - Posting the XML envelope as the `data` form field
//   - Timeouts via AbortController
//   - Mapping every failure onto QantaniError
//
// No retries: every call is exactly one round trip.
//
// This module is internal. Consumers interact via the Qantani client class.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import { createChecksum } from "./checksum";
import { QantaniError } from "./errors";
import { createLogger } from "./logger";
import type { NativeValue, QantaniConfig, RequestParams } from "./types";
import {
  buildRequestXml,
  findElement,
  parseXmlTree,
  xmlToNative,
  type XmlNode,
} from "./xml";

/** SDK version for the User-Agent header. */
const SDK_VERSION = "0.1.0";

export const DEFAULT_ENDPOINT = "https://www.qantanipayments.com/api/";

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Internal HTTP client used by every resource module.
 *
 * Resource methods only declare the command, its parameters and where the
 * result sits in the response.
 */
export class HttpClient {
  private readonly merchantId: string;
  private readonly merchantKey: string;
  private readonly merchantSecret: string;
  private readonly endpoint: string;
  private readonly timeout: number;
  private readonly logger: Logger;

  constructor(config: QantaniConfig) {
    const missing: string[] = [];
    if (isBlank(String(config.merchantId ?? ""))) missing.push("merchantId");
    if (isBlank(config.merchantKey)) missing.push("merchantKey");
    if (isBlank(config.merchantSecret)) missing.push("merchantSecret");

    if (missing.length > 0) {
      throw QantaniError.generate(
        "invalid_request_error",
        `Merchant credentials missing: ${missing.join(", ")}`,
      );
    }

    if (
      config.timeout !== undefined &&
      (!Number.isFinite(config.timeout) || config.timeout <= 0)
    ) {
      throw QantaniError.generate(
        "invalid_request_error",
        "`timeout` must be a positive number of milliseconds",
      );
    }

    this.merchantId = String(config.merchantId).trim();
    this.merchantKey = config.merchantKey.trim();
    this.merchantSecret = config.merchantSecret;
    this.endpoint = config.endpoint ?? DEFAULT_ENDPOINT;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.logger = createLogger(config.logger);
  }

  /** Checksum over a parameter map, signed with this merchant's secret. */
  checksum(params: RequestParams): string {
    return createChecksum(params, this.merchantSecret);
  }

  /**
   * Send a command and convert the element at `selector` into native values.
   *
   * @param command  - Action name, e.g. `"IDEAL.GETBANKS"`.
   * @param params   - Parameters; the block is omitted when empty.
   * @param selector - Path to the result element, relative to the root.
   * @throws {QantaniError} on any transport, parse or provider failure.
   */
  async request(
    command: string,
    params: RequestParams,
    selector: string,
  ): Promise<NativeValue> {
    const root = await this.send(command, params);

    const result = findElement(root, selector);
    if (!result) {
      throw QantaniError.generate(
        "protocol_error",
        `Qantani response has no element at ${selector}`,
        200,
      );
    }

    return xmlToNative(result);
  }

  // ── Private helpers ──────────────────────────────────────────────────────

  /** Post the envelope and return the checked response root. */
  private async send(command: string, params: RequestParams): Promise<XmlNode> {
    const xml = buildRequestXml({
      command,
      parameters: params,
      merchantId: this.merchantId,
      merchantKey: this.merchantKey,
      checksum: this.checksum(params),
    });

    this.logger.debug({ command, params: Object.keys(params) }, "Sending command");

    const body = await this.post(new URLSearchParams({ data: xml }));

    let root: XmlNode;
    try {
      root = parseXmlTree(body);
    } catch (error) {
      this.logger.debug({ command, err: error }, "Unparseable response");
      throw QantaniError.generate("malformed_response", undefined, 200, body);
    }

    const status = findElement(root, "Status");
    if (!status) {
      throw QantaniError.generate("protocol_error", undefined, 200, body);
    }

    if (status.text !== "OK") {
      const description = findElement(root, ".//Description");
      const message =
        description?.text ?? `Qantani returned status ${status.text ?? "(empty)"}`;

      this.logger.warn({ command, status: status.text, message }, "Command rejected");
      throw QantaniError.generate("api_error", message, 200, body);
    }

    return root;
  }

  /** POST the form and return the body of a 200 response. */
  private async post(form: URLSearchParams): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          Accept: "application/xml, text/xml",
          "User-Agent": `qantani-node/${SDK_VERSION}`,
        },
        body: form,
        signal: controller.signal,
      });

      this.logger.debug({ status: response.status }, "Received response");

      // Anything but 200 is a failure; the body is not inspected.
      if (response.status !== 200) {
        await response.body?.cancel();
        throw QantaniError.generate("remote_error", undefined, response.status);
      }

      return await response.text();
    } catch (error) {
      if (error instanceof QantaniError) throw error;

      if (error instanceof Error && error.name === "AbortError") {
        throw QantaniError.generate(
          "network_error",
          `Request timed out after ${this.timeout}ms`,
        );
      }

      const message = error instanceof Error ? error.message : String(error);
      throw QantaniError.generate("network_error", `Network error: ${message}`);
    } finally {
      clearTimeout(timer);
    }
  }
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}
