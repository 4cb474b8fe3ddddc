import dotenv from "dotenv";

dotenv.config();

export function parseFeeBasisPoints(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return 250;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > 1_000) {
    throw new Error(`Invalid FEE_BASIS_POINTS "${raw}" (expected an integer from 0 to 1000)`);
  }
  return value;
}

export const RPC_URL =
  process.env.SOLANA_RPC_URL?.trim() || "https://api.testnet.solana.com";

export const LOG_LEVEL = process.env.LOG_LEVEL?.trim() || "info";

export const FEE_BASIS_POINTS = parseFeeBasisPoints(process.env.FEE_BASIS_POINTS);

export const ADMIN_PUBLIC_KEY = process.env.ADMIN_PUBLIC_KEY?.trim() || undefined;

export const FEE_RECIPIENT = process.env.FEE_RECIPIENT?.trim() || undefined;

export const ESCROW_KEYPAIR_PATH = process.env.ESCROW_KEYPAIR_PATH?.trim() || ".keys/escrow.json";
