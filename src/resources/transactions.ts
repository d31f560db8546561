import type { HttpClient } from "../http";
import { parseResponse, transactionStatusSchema, unwrap } from "../schemas";
import type { TransactionStatus } from "../types";

/** Resource class for payment-method independent transaction commands. */
export class TransactionsResource {
  constructor(private readonly http: HttpClient) {}

  /**
   * Check the status of any transaction.
   *
   * @param transactionId   - `TransactionID` returned on creation.
   * @param transactionCode - `Code` returned on creation.
   * @returns Paid/definitive flags and consumer details.
   */
  async checkStatus(
    transactionId: string | number,
    transactionCode: string,
  ): Promise<TransactionStatus> {
    const command = "TRANSACTIONSTATUS";
    const response = await this.http.request(
      command,
      {
        TransactionID: transactionId,
        TransactionCode: transactionCode,
      },
      "./Transaction",
    );

    return parseResponse(
      transactionStatusSchema,
      unwrap(response, "Transaction", command),
      command,
    );
  }
}
