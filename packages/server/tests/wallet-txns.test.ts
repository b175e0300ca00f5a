/**
 * Tests for the wallet transaction endpoints.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { WalletTxn } from "@acct-emulator/accounting";
import { authedRequest, createTestApp, issueToken } from "./setup.js";
import type { ErrorBody, TestApp } from "./setup.js";

let testApp: TestApp;
let token: string;

const CARD_TXN = {
  company_id: 1,
  date: "2024-11-20",
  amount: -1980,
  walletable_type: "credit_card",
  walletable_id: 2,
  description: "Office supplies",
};

beforeEach(() => {
  testApp = createTestApp();
  token = issueToken(testApp.emulator);
});

afterEach(() => {
  testApp.cleanup();
});

async function createTxn(body: Record<string, unknown> = CARD_TXN): Promise<WalletTxn> {
  const res = await testApp.app.request(authedRequest(token, "/api/1/wallet_txns", "POST", body));
  expect(res.status).toBe(201);
  return ((await res.json()) as { wallet_txn: WalletTxn }).wallet_txn;
}

async function listTxns(query: string): Promise<WalletTxn[]> {
  const res = await testApp.app.request(authedRequest(token, `/api/1/wallet_txns${query}`));
  expect(res.status).toBe(200);
  return ((await res.json()) as { wallet_txns: WalletTxn[] }).wallet_txns;
}

describe("POST /api/1/wallet_txns", () => {
  it("creates an unbooked transaction", async () => {
    const txn = await createTxn();

    expect(txn).toMatchObject({
      id: 1,
      company_id: 1,
      date: "2024-11-20",
      amount: -1980,
      entry_side: "expense",
      walletable_type: "credit_card",
      walletable_id: 2,
      description: "Office supplies",
      status: "unbooked",
    });
    expect(txn.deal_id).toBeUndefined();
  });

  it("reports the first missing field", async () => {
    const { amount: _amount, ...withoutAmount } = CARD_TXN;
    const res = await testApp.app.request(
      authedRequest(token, "/api/1/wallet_txns", "POST", withoutAmount),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "invalid_parameter",
      error_description: "Missing amount",
    } satisfies ErrorBody);
  });

  it("rejects an unknown walletable type", async () => {
    const res = await testApp.app.request(
      authedRequest(token, "/api/1/wallet_txns", "POST", { ...CARD_TXN, walletable_type: "safe" }),
    );

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error_description).toBe("Invalid walletable_type");
  });

  it("rejects a body that is not JSON", async () => {
    const res = await testApp.app.request(
      new Request("http://localhost/api/1/wallet_txns", {
        method: "POST",
        headers: { Authorization: `Bearer ${token}`, "Content-Type": "application/json" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "invalid_request",
      error_description: "Failed to parse request body",
    } satisfies ErrorBody);
  });
});

describe("GET /api/1/wallet_txns", () => {
  it("filters by company and status, with numeric status aliases", async () => {
    const first = await createTxn();
    await createTxn({ ...CARD_TXN, company_id: 2 });
    const third = await createTxn();
    await testApp.app.request(
      authedRequest(token, `/api/1/wallet_txns/${third.id}`, "PUT", { status: "settled" }),
    );

    expect((await listTxns("")).map((t) => t.id)).toEqual([1, 2, 3]);
    expect((await listTxns("?company_id=1&status=unbooked")).map((t) => t.id)).toEqual([first.id]);
    expect((await listTxns("?company_id=1&status=1")).map((t) => t.id)).toEqual([first.id]);
    expect((await listTxns("?status=2")).map((t) => t.id)).toEqual([third.id]);
  });

  it("rejects an unknown status", async () => {
    const res = await testApp.app.request(authedRequest(token, "/api/1/wallet_txns?status=3"));

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error_description).toBe("Invalid status");
  });
});

describe("/api/1/wallet_txns/:id", () => {
  it("gets, updates and deletes a transaction", async () => {
    const txn = await createTxn();

    const got = await testApp.app.request(authedRequest(token, `/api/1/wallet_txns/${txn.id}`));
    expect(((await got.json()) as { wallet_txn: WalletTxn }).wallet_txn).toEqual(txn);

    const put = await testApp.app.request(
      authedRequest(token, `/api/1/wallet_txns/${txn.id}`, "PUT", { description: "Toner" }),
    );
    const updated = ((await put.json()) as { wallet_txn: WalletTxn }).wallet_txn;
    expect(updated.description).toBe("Toner");
    expect(updated.status).toBe("unbooked");

    const del = await testApp.app.request(authedRequest(token, `/api/1/wallet_txns/${txn.id}`, "DELETE"));
    expect(del.status).toBe(204);
    expect(await del.text()).toBe("");

    const gone = await testApp.app.request(authedRequest(token, `/api/1/wallet_txns/${txn.id}`));
    expect(gone.status).toBe(404);
    expect(await gone.json()).toEqual({
      error: "not_found",
      error_description: "Wallet transaction not found",
    } satisfies ErrorBody);
  });

  it("rejects a settled transaction going back to unbooked", async () => {
    const txn = await createTxn();
    await testApp.app.request(
      authedRequest(token, `/api/1/wallet_txns/${txn.id}`, "PUT", { status: "settled", deal_id: 4 }),
    );

    const res = await testApp.app.request(
      authedRequest(token, `/api/1/wallet_txns/${txn.id}`, "PUT", { status: "unbooked" }),
    );

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error).toBe("invalid_parameter");
  });

  it("rejects a non-numeric id", async () => {
    const res = await testApp.app.request(authedRequest(token, "/api/1/wallet_txns/abc"));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "invalid_parameter",
      error_description: "Invalid wallet transaction ID",
    } satisfies ErrorBody);
  });

  it("returns 404 when deleting an unknown id", async () => {
    const res = await testApp.app.request(authedRequest(token, "/api/1/wallet_txns/42", "DELETE"));

    expect(res.status).toBe(404);
  });
});
