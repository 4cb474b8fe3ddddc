export { InMemoryGateway } from "./in-memory.js";
export type { PayoutHook } from "./in-memory.js";
export { SolanaGateway } from "./solana.js";
export type { SignerResolver, SolanaGatewayOptions, TransactionSubmitter } from "./solana.js";
export type { DirectDepositHandler, Payout, TransferGateway, TransferResult } from "./types.js";
export { createKeypairFile, loadKeypair } from "./keypair.js";
