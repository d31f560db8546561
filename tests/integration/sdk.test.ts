// ---------------------------------------------------------------------------
// Qantani SDK – Integration Tests
// ---------------------------------------------------------------------------
// Tests the SDK as a consumer would use it: one Qantani instance driving a
// full iDEAL payment through an in-process fake of the Qantani endpoint.
// ---------------------------------------------------------------------------

import { afterEach, describe, expect, test, vi } from "vitest";
import { Qantani, QantaniError, createChecksum, parseXmlTree, findElement } from "../../src/index";

const SECRET = "test-secret";

interface FakeTransaction {
  id: string;
  code: string;
  paid: boolean;
}

/**
 * Minimal stand-in for the Qantani API: checks every checksum and answers
 * the three commands from in-memory state.
 */
function setupMockApi() {
  const transactions = new Map<string, FakeTransaction>();
  const received: string[] = [];

  const fetchMock = vi.fn(async (_input: string | URL | Request, init?: RequestInit) => {
    const xml = new URLSearchParams(String(init?.body)).get("data") ?? "";
    const root = parseXmlTree(xml);
    const command = findElement(root, "./Action/Name")?.text ?? "";
    received.push(command);

    const params: Record<string, string> = {};
    for (const child of findElement(root, "./Parameters")?.children ?? []) {
      params[child.tag] = child.text ?? "";
    }

    if (findElement(root, "./Merchant/Checksum")?.text !== createChecksum(params, SECRET)) {
      return reply("<Status>ERROR</Status><Error><Description>Invalid checksum</Description></Error>");
    }

    switch (command) {
      case "IDEAL.GETBANKS":
        return reply(
          "<Status>OK</Status><Banks>" +
            "<Bank><Id>ASN_BANK</Id><Name>ASN Bank</Name></Bank>" +
            "<Bank><Id>RABO</Id><Name>Rabobank</Name></Bank>" +
            "</Banks>",
        );

      case "IDEAL.EXECUTE": {
        if (params.Bank !== "ASN_BANK" && params.Bank !== "RABO") {
          return reply("<Status>ERROR</Status><Error><Description>Bad bank</Description></Error>");
        }
        const tx = { id: String(100 + transactions.size), code: `CODE-${transactions.size}`, paid: false };
        transactions.set(tx.id, tx);
        return reply(
          "<Status>OK</Status><Response><Status>OK</Status>" +
            `<BankURL>https://bank.example/pay?id=${tx.id}</BankURL>` +
            `<Code>${tx.code}</Code><TransactionID>${tx.id}</TransactionID>` +
            "<Acquirer>A</Acquirer></Response>",
        );
      }

      case "TRANSACTIONSTATUS": {
        const tx = transactions.get(params.TransactionID ?? "");
        if (!tx || tx.code !== params.TransactionCode) {
          return reply("<Status>ERROR</Status><Error><Description>Unknown transaction</Description></Error>");
        }
        const flag = tx.paid ? "Y" : "N";
        return reply(
          "<Status>OK</Status><Transaction>" +
            `<Date>2026-10-19 10:00</Date><ID>${tx.id}</ID><Paid>${flag}</Paid><Definitive>${flag}</Definitive>` +
            "<Consumer><Name/><IBAN/><Bank/></Consumer>" +
            "<MerchantID>1234</MerchantID><CurrentDate>2026-10-19 10:05</CurrentDate>" +
            "</Transaction>",
        );
      }

      default:
        return new Response("Not Found", { status: 404 });
    }
  });

  vi.stubGlobal("fetch", fetchMock);
  return { fetchMock, transactions, received };
}

function reply(inner: string): Response {
  return new Response(`<?xml version="1.0" encoding="UTF-8"?><Transaction>${inner}</Transaction>`, {
    status: 200,
    headers: { "Content-Type": "text/xml" },
  });
}

function createClient(merchantSecret = SECRET): Qantani {
  return new Qantani({
    merchantId: 1234,
    merchantKey: "test-key",
    merchantSecret,
    endpoint: "https://mock.qantani.test/api/",
  });
}

describe("SDK Integration – End-to-End Workflows", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("complete payment flow", () => {
    test("should list banks → create transaction → poll status", async () => {
      const api = setupMockApi();
      const qantani = createClient();

      const banks = await qantani.getIdealBanks();
      expect(banks).toEqual([
        { Id: "ASN_BANK", Name: "ASN Bank" },
        { Id: "RABO", Name: "Rabobank" },
      ]);

      const tx = await qantani.createIdealTransaction({
        amount: 19.99,
        bankId: banks[1].Id,
        description: "Order 1001",
        returnUrl: "https://shop.example/return",
      });
      expect(tx.BankURL).toBe("https://bank.example/pay?id=100");
      expect(tx.Code).toBe("CODE-0");

      const pending = await qantani.checkTransactionStatus(tx.TransactionID, tx.Code);
      expect(pending.Paid).toBe("N");

      const stored = api.transactions.get(tx.TransactionID);
      if (stored) stored.paid = true;

      const paid = await qantani.transactions.checkStatus(tx.TransactionID, tx.Code);
      expect(paid.Paid).toBe("Y");
      expect(paid.Definitive).toBe("Y");
      expect(paid.Consumer).toEqual({ Name: null, IBAN: null, Bank: null });

      expect(api.received).toEqual([
        "IDEAL.GETBANKS",
        "IDEAL.EXECUTE",
        "TRANSACTIONSTATUS",
        "TRANSACTIONSTATUS",
      ]);
    });

    test("should verify the return URL of a completed transaction", () => {
      const payload = {
        checksum: "a3efa32fc381ddb1abf892796599a2f2b027e232",
        transactionId: "123456",
        transactionCode: "TX-CODE-1",
        status: "100",
        salt: "pepper",
      };

      expect(Qantani.returns.verify(payload)).toBe(payload);
    });
  });

  describe("failures", () => {
    test("should surface a wrong secret as api_error", async () => {
      setupMockApi();

      await expect(createClient("wrong-secret").getIdealBanks()).rejects.toMatchObject({
        code: "api_error",
        message: "Invalid checksum",
      });
    });

    test("should surface a rejected bank as api_error", async () => {
      setupMockApi();

      const err = await createClient()
        .createIdealTransaction({
          amount: 5,
          bankId: "NOPE",
          description: "Order 1002",
          returnUrl: "https://shop.example/return",
        })
        .catch((error: unknown) => error);

      expect(err).toBeInstanceOf(QantaniError);
      expect(err).toMatchObject({ code: "api_error", message: "Bad bank" });
    });

    test("should reject a status check with the wrong code", async () => {
      setupMockApi();
      const qantani = createClient();
      const tx = await qantani.createIdealTransaction({
        amount: 5,
        bankId: "ASN_BANK",
        description: "Order 1003",
        returnUrl: "https://shop.example/return",
      });

      await expect(
        qantani.checkTransactionStatus(tx.TransactionID, "CODE-999"),
      ).rejects.toMatchObject({ code: "api_error", message: "Unknown transaction" });
    });
  });

  describe("independent clients", () => {
    test("should not share state between instances", async () => {
      const api = setupMockApi();

      const [first, second] = await Promise.all([
        createClient().getIdealBanks(),
        createClient().getIdealBanks(),
      ]);

      expect(first).toEqual(second);
      expect(api.fetchMock).toHaveBeenCalledTimes(2);
    });
  });
});
