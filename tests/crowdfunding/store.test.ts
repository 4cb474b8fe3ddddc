import { describe, expect, it } from "vitest";
import { newCampaign } from "../../src/crowdfunding/campaign.js";
import { InMemoryLedgerStore } from "../../src/crowdfunding/store.js";
import { START, draft } from "../helpers/harness.js";
import { creator, funderA, funderB } from "../helpers/participants.js";

describe("in-memory ledger store", () => {
  it("hands out copies of campaign records", () => {
    const store = new InMemoryLedgerStore();
    const campaign = newCampaign(0, creator, draft(), START);
    store.putCampaign(campaign);

    campaign.raisedAmount = 50;
    const fetched = store.getCampaign(0);
    if (!fetched) throw new Error("campaign missing");
    fetched.isActive = false;

    expect(store.getCampaign(0)).toMatchObject({ raisedAmount: 0, isActive: true });
    expect(store.getCampaign(1)).toBeUndefined();
  });

  it("iterates campaigns in id order", () => {
    const store = new InMemoryLedgerStore();
    for (const id of [2, 0, 1]) {
      store.putCampaign(newCampaign(id, creator, draft(), START));
    }

    expect(Array.from(store.campaigns()).map(c => c.id)).toEqual([0, 1, 2]);
  });

  it("keeps zeroed balances as entries", () => {
    const store = new InMemoryLedgerStore();
    store.putBalance(0, funderA, 5);
    store.putBalance(0, funderB, 3);
    store.putBalance(0, funderA, 0);

    expect(store.getBalance(0, funderA)).toBe(0);
    expect(store.getBalance(1, funderA)).toBe(0);
    expect(Array.from(store.balances(0))).toEqual([
      [funderA, 0],
      [funderB, 3]
    ]);
    expect(Array.from(store.balances(1))).toEqual([]);
  });

  it("appends contribution history per campaign", () => {
    const store = new InMemoryLedgerStore();
    store.appendContribution(0, { contributor: funderA, amount: 2, timestamp: START });
    store.appendContribution(1, { contributor: funderB, amount: 9, timestamp: START });
    store.appendContribution(0, { contributor: funderB, amount: 4, timestamp: START + 1 });

    store.contributions(0)[0].amount = 100;

    expect(store.contributions(0).map(r => r.amount)).toEqual([2, 4]);
    expect(store.contributions(1)).toHaveLength(1);
    expect(store.contributions(7)).toEqual([]);
  });

  it("starts with empty scalars", () => {
    const store = new InMemoryLedgerStore();

    expect(store.getNextCampaignId()).toBe(0);
    expect(store.getFeeBasisPoints()).toBe(0);
    expect(store.getAdministrator()).toBeUndefined();
  });
});
