import {
  Connection,
  Keypair,
  PublicKey,
  SystemProgram,
  Transaction,
  sendAndConfirmTransaction
} from "@solana/web3.js";
import type { Commitment, Signer } from "@solana/web3.js";
import { describeError } from "../crowdfunding/errors.js";
import type { PublicKeyLike } from "../crowdfunding/types.js";
import type { Payout, TransferGateway, TransferResult } from "./types.js";

const NO_FEE_PAYER = "no fee payer configured";

/** Supplied by the wallet collaborator: the signer able to spend for an identity */
export type SignerResolver = (identity: PublicKeyLike) => Signer | undefined | Promise<Signer | undefined>;

/** Signs, sends and confirms; resolves to the transaction signature */
export type TransactionSubmitter = (transaction: Transaction, signers: Signer[]) => Promise<string>;

export interface SolanaGatewayOptions {
  connection: Connection;
  /** Account that holds custodied lamports */
  escrow: Keypair;
  /** Pays network fees so they never come out of custody */
  feePayer?: Signer;
  resolveSigner?: SignerResolver;
  submit?: TransactionSubmitter;
  commitment?: Commitment;
}

/**
 * Custody on a Solana escrow account. A payout batch is a single transaction
 * of system transfers, so it lands or fails as a whole.
 *
 * The escrow account never pays fees, and its rent-exempt reserve is not
 * custody. Without a fee payer the gateway can still read its balance but
 * every transfer fails.
 */
export class SolanaGateway implements TransferGateway {
  private readonly connection: Connection;
  private readonly escrowKeypair: Keypair;
  private readonly feePayer: Signer | undefined;
  private readonly resolveSigner: SignerResolver;
  private readonly submit: TransactionSubmitter;
  private readonly commitment: Commitment;

  constructor(options: SolanaGatewayOptions) {
    this.connection = options.connection;
    this.escrowKeypair = options.escrow;
    if (options.feePayer?.publicKey.equals(options.escrow.publicKey)) {
      throw new Error("Fee payer must not be the escrow account");
    }
    this.feePayer = options.feePayer;
    this.resolveSigner = options.resolveSigner ?? (() => undefined);
    this.commitment = options.commitment ?? "confirmed";
    this.submit =
      options.submit ??
      ((transaction, signers) =>
        sendAndConfirmTransaction(this.connection, transaction, signers, { commitment: this.commitment }));
  }

  get escrowAddress(): PublicKeyLike {
    return this.escrowKeypair.publicKey.toBase58();
  }

  async escrow(from: PublicKeyLike, amount: number): Promise<TransferResult> {
    try {
      const feePayer = this.feePayer;
      if (!feePayer) {
        return { ok: false, reason: NO_FEE_PAYER };
      }
      const signer = await this.resolveSigner(from);
      if (!signer) {
        return { ok: false, reason: `no signer available for ${from}` };
      }
      if (signer.publicKey.toBase58() !== from) {
        return { ok: false, reason: `signer ${signer.publicKey.toBase58()} does not match ${from}` };
      }
      const transaction = new Transaction().add(
        SystemProgram.transfer({
          fromPubkey: signer.publicKey,
          toPubkey: this.escrowKeypair.publicKey,
          lamports: amount
        })
      );
      transaction.feePayer = feePayer.publicKey;
      const signature = await this.submit(transaction, [feePayer, signer]);
      return { ok: true, reference: signature };
    } catch (err) {
      return { ok: false, reason: describeError(err) };
    }
  }

  async pay(to: PublicKeyLike, amount: number): Promise<TransferResult> {
    return this.payAll([{ to, amount }]);
  }

  async payAll(payouts: readonly Payout[]): Promise<TransferResult> {
    if (payouts.length === 0) {
      return { ok: false, reason: "no payouts given" };
    }
    const feePayer = this.feePayer;
    if (!feePayer) {
      return { ok: false, reason: NO_FEE_PAYER };
    }
    try {
      const transaction = new Transaction();
      transaction.feePayer = feePayer.publicKey;
      for (const payout of payouts) {
        transaction.add(
          SystemProgram.transfer({
            fromPubkey: this.escrowKeypair.publicKey,
            toPubkey: new PublicKey(payout.to),
            lamports: payout.amount
          })
        );
      }
      const signature = await this.submit(transaction, [feePayer, this.escrowKeypair]);
      return { ok: true, reference: signature };
    } catch (err) {
      return { ok: false, reason: describeError(err) };
    }
  }

  /** Lamports above the escrow account's rent-exempt reserve */
  async balance(): Promise<number> {
    const [lamports, reserve] = await Promise.all([
      this.connection.getBalance(this.escrowKeypair.publicKey, this.commitment),
      this.connection.getMinimumBalanceForRentExemption(0, this.commitment)
    ]);
    return Math.max(0, lamports - reserve);
  }
}
