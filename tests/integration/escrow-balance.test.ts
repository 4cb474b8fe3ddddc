import { Connection } from "@solana/web3.js";
import { describe, expect, it } from "vitest";
import { RPC_URL } from "../../src/env.js";
import { SolanaGateway } from "../../src/gateway/solana.js";
import { makeKeypair } from "../helpers/participants.js";

describe("integration: testnet custody", () => {
  const shouldRun = process.env.RUN_INTEGRATION === "1";
  const testFn = shouldRun ? it : it.skip;

  testFn("reads the escrow account balance", async () => {
    const gateway = new SolanaGateway({ connection: new Connection(RPC_URL, "confirmed"), escrow: makeKeypair(200) });

    const lamports = await gateway.balance();

    expect(Number.isSafeInteger(lamports)).toBe(true);
    expect(lamports).toBeGreaterThanOrEqual(0);
  });
});
