import { Connection } from "@solana/web3.js";
import { ESCROW_KEYPAIR_PATH, RPC_URL } from "./env.js";
import { SolanaGateway, createKeypairFile, loadKeypair } from "./gateway/index.js";

async function main() {
  if (process.argv.includes("--generate")) {
    const created = await createKeypairFile(ESCROW_KEYPAIR_PATH);
    console.log("Wrote escrow keypair:", ESCROW_KEYPAIR_PATH);
    console.log("Escrow address:", created.publicKey.toBase58());
  }

  const escrow = await loadKeypair(ESCROW_KEYPAIR_PATH);
  const gateway = new SolanaGateway({ connection: new Connection(RPC_URL, "confirmed"), escrow });
  const lamports = await gateway.balance();

  console.log("RPC URL:", RPC_URL);
  console.log("Escrow address:", gateway.escrowAddress);
  console.log("Custody above rent reserve (lamports):", lamports);
  console.log("Custody (SOL):", lamports / 1_000_000_000);
}

main().catch((err) => {
  const code = err instanceof Error && "code" in err ? err.code : undefined;
  if (code === "EEXIST") {
    console.error(`Escrow keypair already exists at ${ESCROW_KEYPAIR_PATH}`);
    process.exit(2);
  }
  if (code === "ENOENT") {
    console.error(`Missing ${ESCROW_KEYPAIR_PATH}. Run: npm run escrow-balance -- --generate`);
    process.exit(1);
  }
  console.error("Escrow balance check failed:", err);
  process.exit(1);
});
