import { readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { committedValue } from "../../src/crowdfunding/campaign.js";
import { CampaignError } from "../../src/crowdfunding/errors.js";
import type { CampaignErrorKind } from "../../src/crowdfunding/errors.js";
import type { CampaignPhase } from "../../src/crowdfunding/types.js";
import { START, createHarness, expectLedgerInvariants } from "../helpers/harness.js";
import type { Harness } from "../helpers/harness.js";
import { admin, creator, funderA, funderB, funderC, treasury } from "../helpers/participants.js";

const participants: Record<string, string> = { admin, creator, treasury, funderA, funderB, funderC };

type Action =
  | { action: "create"; creator: string; goalAmount: number; durationDays: number; title?: string }
  | { action: "contribute"; campaign: number; from: string; amount: number }
  | { action: "withdraw"; campaign: number; by: string }
  | { action: "refund"; campaign: number; by: string }
  | { action: "cancel"; campaign: number; by: string }
  | { action: "set_fee"; value: number; by: string };

type Step = Action & {
  /** seconds after the scenario start */
  at: number;
  expectError?: CampaignErrorKind;
  returns?: unknown;
};

interface Scenario {
  name: string;
  description: string;
  feeBasisPoints: number;
  feeRecipient?: string;
  steps: Step[];
  expect: {
    feeBasisPoints?: number;
    campaigns: { id: number; phase: CampaignPhase; raisedAmount: number; contributorCount: number }[];
    /** wallet balance changes over the whole scenario */
    walletChanges: Record<string, number>;
  };
}

const scenarioDir = fileURLToPath(new URL("../scenarios/", import.meta.url));

function loadScenarios(): Scenario[] {
  return readdirSync(scenarioDir)
    .filter(file => file.endsWith(".json"))
    .sort()
    .map(file => JSON.parse(readFileSync(join(scenarioDir, file), "utf8")));
}

function who(name: string): string {
  const key = participants[name];
  if (key === undefined) throw new Error(`Unknown participant "${name}"`);
  return key;
}

async function perform(harness: Harness, step: Step): Promise<unknown> {
  const { ledger } = harness;
  switch (step.action) {
    case "create":
      return ledger.createCampaign(who(step.creator), {
        title: step.title ?? "Scenario campaign",
        description: "Replayed from a scenario file",
        goalAmount: step.goalAmount,
        durationDays: step.durationDays
      });
    case "contribute":
      return ledger.contribute(step.campaign, step.amount, who(step.from));
    case "withdraw":
      return ledger.withdrawFunds(step.campaign, who(step.by));
    case "refund":
      return ledger.requestRefund(step.campaign, who(step.by));
    case "cancel":
      return ledger.cancelCampaign(step.campaign, who(step.by));
    case "set_fee":
      return ledger.setFeeBasisPoints(step.value, who(step.by));
  }
}

async function replay(scenario: Scenario): Promise<void> {
  const harness = createHarness({
    feeBasisPoints: scenario.feeBasisPoints,
    feeRecipient: scenario.feeRecipient === undefined ? undefined : who(scenario.feeRecipient)
  });
  const startBalances = new Map(
    Object.keys(scenario.expect.walletChanges).map(name => [name, harness.gateway.walletBalance(who(name))])
  );

  for (const [index, step] of scenario.steps.entries()) {
    harness.clock.set(START + step.at);
    const label = `step ${index} (${step.action} at +${step.at}s)`;

    if (step.expectError) {
      const error = await perform(harness, step).then(
        () => undefined,
        (err: unknown) => err
      );
      expect(error, label).toBeInstanceOf(CampaignError);
      expect(error, label).toMatchObject({ kind: step.expectError });
      continue;
    }

    const result = await perform(harness, step);
    if (step.returns !== undefined) {
      expect(result, label).toEqual(step.returns);
    }
    expectLedgerInvariants(harness.store);
  }

  for (const expected of scenario.expect.campaigns) {
    expect(harness.queries.getCampaignPhase(expected.id)).toBe(expected.phase);
    expect(harness.queries.getCampaign(expected.id)).toMatchObject({
      raisedAmount: expected.raisedAmount,
      contributorCount: expected.contributorCount
    });
  }
  for (const [name, change] of Object.entries(scenario.expect.walletChanges)) {
    const before = startBalances.get(name) ?? 0;
    expect(harness.gateway.walletBalance(who(name)) - before, name).toBe(change);
  }
  if (scenario.expect.feeBasisPoints !== undefined) {
    expect(harness.queries.getFeeBasisPoints()).toBe(scenario.expect.feeBasisPoints);
  }
  expect(await harness.gateway.balance()).toBe(committedValue(harness.store.campaigns()));
}

describe("scenario replays", () => {
  for (const scenario of loadScenarios()) {
    it(`${scenario.name}: ${scenario.description}`, async () => {
      await replay(scenario);
    });
  }
});
