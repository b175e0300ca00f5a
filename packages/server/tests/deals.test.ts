/**
 * Tests for the deal endpoints, including settlement on create.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Deal, WalletTxn } from "@acct-emulator/accounting";
import { authedRequest, createTestApp, issueToken } from "./setup.js";
import type { ErrorBody, TestApp } from "./setup.js";

let testApp: TestApp;
let token: string;

const PAYMENT = {
  date: "2024-11-20",
  amount: 1980,
  from_walletable_type: "credit_card",
  from_walletable_id: 2,
};

function expenseDeal(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    company_id: 1,
    issue_date: "2024-11-20",
    type: "expense",
    details: [{ account_item_id: 504, tax_code: 136, amount: 1800, description: "Toner" }],
    payments: [PAYMENT],
    ...overrides,
  };
}

beforeEach(() => {
  testApp = createTestApp();
  token = issueToken(testApp.emulator);
});

afterEach(() => {
  testApp.cleanup();
});

async function postDeal(body: Record<string, unknown>): Promise<Response> {
  return testApp.app.request(authedRequest(token, "/api/1/deals", "POST", body));
}

describe("POST /api/1/deals", () => {
  it("creates a deal with computed vat and amount", async () => {
    const res = await postDeal(expenseDeal());

    expect(res.status).toBe(201);
    const { deal } = (await res.json()) as { deal: Deal };
    expect(deal).toMatchObject({
      id: 1,
      company_id: 1,
      issue_date: "2024-11-20",
      type: "expense",
      amount: 1980,
      payments: [{ id: 1, ...PAYMENT }],
    });
    expect(deal.details).toEqual([
      {
        id: 1,
        account_item_id: 504,
        account_item_name: "消耗品費",
        tax_code: 136,
        amount: 1800,
        vat: 180,
        description: "Toner",
      },
    ]);
  });

  it("defaults tax_code to 0", async () => {
    const res = await postDeal(expenseDeal({ details: [{ account_item_id: 509, amount: 300 }], payments: [] }));

    const { deal } = (await res.json()) as { deal: Deal };
    expect(deal.details[0]).toMatchObject({ tax_code: 0, vat: 0 });
    expect(deal.amount).toBe(300);
  });

  it("settles the matching wallet transaction", async () => {
    const txn = testApp.emulator.walletTxns.create({
      company_id: 1,
      date: "2024-11-20",
      amount: -1980,
      walletable_type: "credit_card",
      walletable_id: 2,
    });

    const { deal } = (await (await postDeal(expenseDeal())).json()) as { deal: Deal };

    const res = await testApp.app.request(authedRequest(token, `/api/1/wallet_txns/${txn.id}`));
    const { wallet_txn } = (await res.json()) as { wallet_txn: WalletTxn };
    expect(wallet_txn).toMatchObject({ status: "settled", deal_id: deal.id });
  });

  it("rejects an empty details list", async () => {
    const res = await postDeal(expenseDeal({ details: [] }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "invalid_parameter",
      error_description: "Missing details",
    } satisfies ErrorBody);
  });

  it("rejects a payment naming only the walletable type", async () => {
    const res = await postDeal(
      expenseDeal({ payments: [{ date: "2024-11-20", amount: 1980, from_walletable_type: "credit_card" }] }),
    );

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error_description).toBe(
      "Invalid payments.0.from_walletable_id",
    );
  });

  it("rejects an unknown deal type", async () => {
    const res = await postDeal(expenseDeal({ type: "transfer" }));

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error_description).toBe("Invalid type");
  });
});

describe("/api/1/deals", () => {
  it("lists deals filtered by company", async () => {
    await postDeal(expenseDeal());
    await postDeal(expenseDeal({ company_id: 2 }));

    const all = await testApp.app.request(authedRequest(token, "/api/1/deals"));
    const filtered = await testApp.app.request(authedRequest(token, "/api/1/deals?company_id=2"));

    expect(((await all.json()) as { deals: Deal[] }).deals).toHaveLength(2);
    expect(((await filtered.json()) as { deals: Deal[] }).deals.map((d) => d.id)).toEqual([2]);
  });

  it("updates a deal and recomputes its amount", async () => {
    await postDeal(expenseDeal());

    const res = await testApp.app.request(
      authedRequest(token, "/api/1/deals/1", "PUT", {
        ref_number: "INV-7",
        details: [{ account_item_id: 504, tax_code: 136, amount: 1000 }],
      }),
    );

    expect(res.status).toBe(200);
    const { deal } = (await res.json()) as { deal: Deal };
    expect(deal.ref_number).toBe("INV-7");
    expect(deal.amount).toBe(1100);
  });

  it("deletes a deal", async () => {
    await postDeal(expenseDeal());

    const del = await testApp.app.request(authedRequest(token, "/api/1/deals/1", "DELETE"));
    const get = await testApp.app.request(authedRequest(token, "/api/1/deals/1"));

    expect(del.status).toBe(204);
    expect(get.status).toBe(404);
    expect(((await get.json()) as ErrorBody).error_description).toBe("Deal not found");
  });

  it("rejects a zero id", async () => {
    const res = await testApp.app.request(authedRequest(token, "/api/1/deals/0"));

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error_description).toBe("Invalid deal ID");
  });
});
