import type { PublicKeyLike } from "../crowdfunding/types.js";

export interface Payout {
  to: PublicKeyLike;
  amount: number;
}

export type TransferResult =
  | { ok: true; reference: string }
  | { ok: false; reason: string };

/** Runs before value arriving outside `escrow` is credited; throwing refuses it */
export type DirectDepositHandler = (from: PublicKeyLike, amount: number) => void;

/**
 * Moves value in and out of escrow custody. Calls are not assumed idempotent:
 * the ledger issues each logical disbursement exactly once.
 */
export interface TransferGateway {
  /** Moves `amount` from `from` into custody */
  escrow(from: PublicKeyLike, amount: number): Promise<TransferResult>;
  pay(to: PublicKeyLike, amount: number): Promise<TransferResult>;
  /** Executes every payout or none of them */
  payAll(payouts: readonly Payout[]): Promise<TransferResult>;
  /** Value currently held in custody */
  balance(): Promise<number>;
  /**
   * Custody that can turn away plain transfers routes them through `handler`.
   * A Solana system account cannot refuse lamports, so it has no such hook.
   */
  guardDirectDeposits?(handler: DirectDepositHandler): void;
}
