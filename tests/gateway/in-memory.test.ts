import { describe, expect, it } from "vitest";
import { InMemoryGateway } from "../../src/gateway/in-memory.js";
import type { Payout, TransferResult } from "../../src/gateway/types.js";
import { creator, funderA, treasury } from "../helpers/participants.js";

describe("in-memory gateway", () => {
  it("escrows from a funded wallet", async () => {
    const gateway = new InMemoryGateway();
    gateway.fund(funderA, 50);

    await expect(gateway.escrow(funderA, 20)).resolves.toEqual({ ok: true, reference: "escrow-1" });
    expect(gateway.walletBalance(funderA)).toBe(30);
    expect(await gateway.balance()).toBe(20);
  });

  it("refuses to escrow more than the wallet holds", async () => {
    const gateway = new InMemoryGateway();
    gateway.fund(funderA, 5);

    await expect(gateway.escrow(funderA, 6)).resolves.toEqual({
      ok: false,
      reason: `insufficient funds: ${funderA} holds 5, needs 6`
    });
    expect(gateway.walletBalance(funderA)).toBe(5);
  });

  it("pays a batch as a whole", async () => {
    const gateway = new InMemoryGateway();
    gateway.strand(100);

    await expect(
      gateway.payAll([
        { to: creator, amount: 90 },
        { to: treasury, amount: 10 }
      ])
    ).resolves.toEqual({ ok: true, reference: "payout-1" });
    expect(gateway.walletBalance(creator)).toBe(90);
    expect(gateway.walletBalance(treasury)).toBe(10);
    expect(await gateway.balance()).toBe(0);
  });

  it("moves nothing when any recipient refuses", async () => {
    const gateway = new InMemoryGateway();
    gateway.strand(100);
    gateway.refuse(treasury);

    const result = await gateway.payAll([
      { to: creator, amount: 90 },
      { to: treasury, amount: 10 }
    ]);

    expect(result).toEqual({ ok: false, reason: `recipient ${treasury} refused the transfer` });
    expect(gateway.walletBalance(creator)).toBe(0);
    expect(await gateway.balance()).toBe(100);
  });

  it("never pays out more than custody holds", async () => {
    const gateway = new InMemoryGateway();
    gateway.strand(3);

    await expect(gateway.pay(creator, 4)).resolves.toEqual({ ok: false, reason: "custody holds 3, payouts need 4" });
  });

  it("runs the payout hook after crediting and reverts when it throws", async () => {
    const gateway = new InMemoryGateway();
    gateway.strand(10);
    const seen: number[] = [];
    gateway.onPayout((payout: Payout) => {
      seen.push(gateway.walletBalance(payout.to));
      throw new Error("not today");
    });

    await expect(gateway.pay(creator, 10)).resolves.toEqual({
      ok: false,
      reason: "recipient rejected payout: not today"
    });
    expect(seen).toEqual([10]);
    expect(gateway.walletBalance(creator)).toBe(0);
    expect(await gateway.balance()).toBe(10);
  });

  it("credits a plain deposit when nothing guards custody", async () => {
    const gateway = new InMemoryGateway();
    gateway.fund(funderA, 9);

    await expect(gateway.deposit(funderA, 4)).resolves.toEqual({ ok: true, reference: "deposit-1" });
    expect(gateway.walletBalance(funderA)).toBe(5);
    expect(await gateway.balance()).toBe(4);
  });

  it("lets the deposit guard refuse before any value moves", async () => {
    const gateway = new InMemoryGateway();
    gateway.fund(funderA, 9);
    const offered: number[] = [];
    gateway.guardDirectDeposits((_from, amount) => {
      offered.push(amount);
      throw new Error("use contribute");
    });

    await expect(gateway.deposit(funderA, 4)).rejects.toThrow("use contribute");
    expect(offered).toEqual([4]);
    expect(gateway.walletBalance(funderA)).toBe(9);
    expect(await gateway.balance()).toBe(0);
  });

  it("keeps a recipient from spending credits of a batch that may still revert", async () => {
    const gateway = new InMemoryGateway();
    gateway.strand(10);
    let respent: TransferResult | undefined;
    gateway.onPayout(async payout => {
      respent = await gateway.escrow(payout.to, payout.amount);
      throw new Error("changed my mind");
    });

    await expect(gateway.pay(creator, 10)).resolves.toEqual({
      ok: false,
      reason: "recipient rejected payout: changed my mind"
    });
    expect(respent).toEqual({ ok: false, reason: "custody is settling a payout" });
    expect(gateway.walletBalance(creator)).toBe(0);
    expect(await gateway.balance()).toBe(10);

    gateway.onPayout(null);
    gateway.fund(creator, 3);
    await expect(gateway.escrow(creator, 3)).resolves.toEqual({ ok: true, reference: "escrow-1" });
  });
});
