/**
 * Tests for the manual journal endpoints.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Journal } from "@acct-emulator/accounting";
import { authedRequest, createTestApp, issueToken } from "./setup.js";
import type { ErrorBody, TestApp } from "./setup.js";

let testApp: TestApp;
let token: string;

const JOURNAL = {
  company_id: 1,
  issue_date: "2024-11-20",
  details: [
    { entry_type: "debit", account_item_id: 504, tax_code: 136, amount: 1800, vat: 180 },
    { entry_type: "credit", account_item_id: 203, amount: 1980 },
  ],
};

beforeEach(() => {
  testApp = createTestApp();
  token = issueToken(testApp.emulator);
});

afterEach(() => {
  testApp.cleanup();
});

describe("POST /api/1/journals", () => {
  it("creates a journal with named detail lines", async () => {
    const res = await testApp.app.request(authedRequest(token, "/api/1/journals", "POST", JOURNAL));

    expect(res.status).toBe(201);
    const { journal } = (await res.json()) as { journal: Journal };
    expect(journal.id).toBe(1);
    expect(journal.details.map((d) => [d.id, d.account_item_name, d.vat])).toEqual([
      [1, "消耗品費", 180],
      [2, "クレジットカード", 0],
    ]);
  });

  it("rejects an unknown entry type", async () => {
    const res = await testApp.app.request(
      authedRequest(token, "/api/1/journals", "POST", {
        ...JOURNAL,
        details: [{ entry_type: "both", account_item_id: 504, amount: 1 }],
      }),
    );

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error_description).toBe("Invalid details.0.entry_type");
  });

  it("rejects a malformed issue_date", async () => {
    const res = await testApp.app.request(
      authedRequest(token, "/api/1/journals", "POST", { ...JOURNAL, issue_date: "20/11/2024" }),
    );

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error_description).toBe("Invalid issue_date");
  });
});

describe("GET /api/1/journals", () => {
  it("lists and fetches journals", async () => {
    await testApp.app.request(authedRequest(token, "/api/1/journals", "POST", JOURNAL));
    await testApp.app.request(authedRequest(token, "/api/1/journals", "POST", { ...JOURNAL, company_id: 3 }));

    const list = await testApp.app.request(authedRequest(token, "/api/1/journals?company_id=3"));
    const one = await testApp.app.request(authedRequest(token, "/api/1/journals/1"));

    expect(((await list.json()) as { journals: Journal[] }).journals.map((j) => j.id)).toEqual([2]);
    expect(((await one.json()) as { journal: Journal }).journal.company_id).toBe(1);
  });

  it("returns 404 for an unknown journal", async () => {
    const res = await testApp.app.request(authedRequest(token, "/api/1/journals/8"));

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "not_found",
      error_description: "Journal not found",
    } satisfies ErrorBody);
  });
});
