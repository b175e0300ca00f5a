/**
 * End-to-end: card statement line → deal with payment → settled.
 */

import { describe, it, expect, afterEach } from "vitest";
import type { Deal, WalletTxn } from "@acct-emulator/accounting";
import type { TokenResponse } from "../src/routes/oauth.js";
import { authedRequest, createTestApp, formRequest } from "./setup.js";
import type { TestApp } from "./setup.js";

let testApp: TestApp | undefined;

afterEach(() => {
  testApp?.cleanup();
  testApp = undefined;
});

describe("booking a card transaction", () => {
  it("settles the transaction through a deal payment", async () => {
    const current = createTestApp();
    testApp = current;
    const { app } = current;

    const tokenRes = await app.request(formRequest("/oauth/token", { grant_type: "authorization_code" }));
    const { access_token: token } = (await tokenRes.json()) as TokenResponse;

    const created = await app.request(
      authedRequest(token, "/api/1/wallet_txns", "POST", {
        company_id: 1,
        date: "2024-11-20",
        amount: -1980,
        walletable_type: "credit_card",
        walletable_id: 2,
        description: "Stationery",
      }),
    );
    const { wallet_txn: txn } = (await created.json()) as { wallet_txn: WalletTxn };

    const unbooked = async (): Promise<number[]> => {
      const res = await app.request(authedRequest(token, "/api/1/wallet_txns?company_id=1&status=1"));
      return ((await res.json()) as { wallet_txns: WalletTxn[] }).wallet_txns.map((t) => t.id);
    };
    expect(await unbooked()).toEqual([txn.id]);

    const dealRes = await app.request(
      authedRequest(token, "/api/1/deals", "POST", {
        company_id: 1,
        issue_date: "2024-11-20",
        type: "expense",
        details: [{ account_item_id: 504, tax_code: 136, amount: 1800 }],
        payments: [
          { date: "2024-11-20", amount: 1980, from_walletable_type: "credit_card", from_walletable_id: 2 },
        ],
      }),
    );
    expect(dealRes.status).toBe(201);
    const { deal } = (await dealRes.json()) as { deal: Deal };
    expect(deal.amount).toBe(1980);

    expect(await unbooked()).toEqual([]);
    const settled = await app.request(authedRequest(token, `/api/1/wallet_txns/${txn.id}`));
    expect(((await settled.json()) as { wallet_txn: WalletTxn }).wallet_txn).toMatchObject({
      status: "settled",
      deal_id: deal.id,
    });

    // Deleting the deal leaves the settlement in place
    await app.request(authedRequest(token, `/api/1/deals/${deal.id}`, "DELETE"));
    expect(await unbooked()).toEqual([]);
  });
});
