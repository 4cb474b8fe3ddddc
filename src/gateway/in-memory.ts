import { describeError } from "../crowdfunding/errors.js";
import type { PublicKeyLike } from "../crowdfunding/types.js";
import type { DirectDepositHandler, Payout, TransferGateway, TransferResult } from "./types.js";

/**
 * Runs when a recipient is credited, before the payout batch settles.
 * Throwing reverts the whole batch, the way a refusing recipient would.
 */
export type PayoutHook = (payout: Payout) => void | Promise<void>;

/**
 * In-process custody wallet. Identities hold spendable balances that escrow
 * moves into custody and payouts move back out.
 */
export class InMemoryGateway implements TransferGateway {
  private readonly wallets = new Map<PublicKeyLike, number>();
  private readonly refusing = new Set<PublicKeyLike>();
  private custody = 0;
  private sequence = 0;
  private hook: PayoutHook | null = null;
  private depositGuard: DirectDepositHandler | null = null;
  // payout batches whose hooks are still running
  private settling = 0;

  fund(identity: PublicKeyLike, amount: number): void {
    this.wallets.set(identity, this.walletBalance(identity) + amount);
  }

  walletBalance(identity: PublicKeyLike): number {
    return this.wallets.get(identity) ?? 0;
  }

  refuse(identity: PublicKeyLike): void {
    this.refusing.add(identity);
  }

  accept(identity: PublicKeyLike): void {
    this.refusing.delete(identity);
  }

  onPayout(hook: PayoutHook | null): void {
    this.hook = hook;
  }

  /** Value that reaches custody without any ledger call, e.g. a forced transfer */
  strand(amount: number): void {
    this.custody += amount;
  }

  guardDirectDeposits(handler: DirectDepositHandler): void {
    this.depositGuard = handler;
  }

  /**
   * A plain transfer into custody that bypasses `escrow`. The deposit guard
   * sees it first and may refuse it before any value moves.
   */
  async deposit(from: PublicKeyLike, amount: number): Promise<TransferResult> {
    this.depositGuard?.(from, amount);
    return this.moveIntoCustody(from, amount, "deposit");
  }

  async escrow(from: PublicKeyLike, amount: number): Promise<TransferResult> {
    return this.moveIntoCustody(from, amount, "escrow");
  }

  async pay(to: PublicKeyLike, amount: number): Promise<TransferResult> {
    return this.payAll([{ to, amount }]);
  }

  async payAll(payouts: readonly Payout[]): Promise<TransferResult> {
    const total = payouts.reduce((sum, payout) => sum + payout.amount, 0);
    if (total > this.custody) {
      return { ok: false, reason: `custody holds ${this.custody}, payouts need ${total}` };
    }
    const refused = payouts.find(payout => this.refusing.has(payout.to));
    if (refused) {
      return { ok: false, reason: `recipient ${refused.to} refused the transfer` };
    }

    for (const payout of payouts) {
      this.custody -= payout.amount;
      this.fund(payout.to, payout.amount);
    }

    this.settling += 1;
    try {
      for (const payout of payouts) {
        if (this.hook) await this.hook(payout);
      }
    } catch (err) {
      for (const payout of payouts) {
        this.fund(payout.to, -payout.amount);
        this.custody += payout.amount;
      }
      return { ok: false, reason: `recipient rejected payout: ${describeError(err)}` };
    } finally {
      this.settling -= 1;
    }
    return { ok: true, reference: this.nextReference("payout") };
  }

  async balance(): Promise<number> {
    return this.custody;
  }

  private moveIntoCustody(from: PublicKeyLike, amount: number, prefix: string): TransferResult {
    // credits of an unsettled batch may still be reverted
    if (this.settling > 0) {
      return { ok: false, reason: "custody is settling a payout" };
    }
    const available = this.walletBalance(from);
    if (available < amount) {
      return { ok: false, reason: `insufficient funds: ${from} holds ${available}, needs ${amount}` };
    }
    this.wallets.set(from, available - amount);
    this.custody += amount;
    return { ok: true, reference: this.nextReference(prefix) };
  }

  private nextReference(prefix: string): string {
    this.sequence += 1;
    return `${prefix}-${this.sequence}`;
  }
}
