import { Keypair } from "@solana/web3.js";
import { CampaignQueries, CrowdfundingLedger, InMemoryLedgerStore } from "./crowdfunding/index.js";
import type { Clock } from "./crowdfunding/index.js";
import { SECONDS_PER_DAY } from "./crowdfunding/types.js";
import { ADMIN_PUBLIC_KEY, FEE_BASIS_POINTS, FEE_RECIPIENT } from "./env.js";
import { InMemoryGateway } from "./gateway/index.js";
import { componentLogger } from "./logger.js";

const LAMPORTS_PER_SOL = 1_000_000_000;

/** Clock the demo advances by hand */
class DemoClock implements Clock {
  private current = Math.floor(Date.now() / 1000);

  now(): number {
    return this.current;
  }

  advanceDays(days: number): void {
    this.current += days * SECONDS_PER_DAY;
  }
}

async function main() {
  const log = componentLogger("demo");
  const clock = new DemoClock();
  const store = new InMemoryLedgerStore();
  const gateway = new InMemoryGateway();
  const administrator = ADMIN_PUBLIC_KEY ?? Keypair.generate().publicKey.toBase58();
  const ledger = new CrowdfundingLedger(
    { administrator, feeBasisPoints: FEE_BASIS_POINTS, feeRecipient: FEE_RECIPIENT },
    { store, gateway, clock }
  );
  const queries = new CampaignQueries(store, clock);

  const [creator, alice, bob] = [Keypair.generate(), Keypair.generate(), Keypair.generate()].map(k =>
    k.publicKey.toBase58()
  );
  gateway.fund(alice, 8 * LAMPORTS_PER_SOL);
  gateway.fund(bob, 8 * LAMPORTS_PER_SOL);

  const funded = ledger.createCampaign(creator, {
    title: "Community garden",
    description: "Raised beds and a tool shed",
    goalAmount: 10 * LAMPORTS_PER_SOL,
    durationDays: 30
  });
  const stalled = ledger.createCampaign(creator, {
    title: "Rooftop telescope",
    description: "Shared observatory for the block",
    goalAmount: 50 * LAMPORTS_PER_SOL,
    durationDays: 7
  });

  await ledger.contribute(funded, 4 * LAMPORTS_PER_SOL, alice);
  await ledger.contribute(funded, 6 * LAMPORTS_PER_SOL, bob);
  await ledger.contribute(stalled, 2 * LAMPORTS_PER_SOL, alice);

  const split = await ledger.withdrawFunds(funded, creator);
  log.info({ campaignId: funded, ...split }, "creator withdrew");

  clock.advanceDays(8);
  const refunded = await ledger.requestRefund(stalled, alice);
  log.info({ campaignId: stalled, refunded }, "contributor refunded");

  console.log("Ledger stats:", queries.getLedgerStats());
  console.log("Custody (lamports):", await gateway.balance());
  console.log("Creator wallet (lamports):", gateway.walletBalance(creator));
  console.log("Alice wallet (lamports):", gateway.walletBalance(alice));
}

main().catch((err) => {
  console.error("Demo failed:", err);
  process.exit(1);
});
