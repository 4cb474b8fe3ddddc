import { CampaignError } from "./errors.js";
import {
  BASIS_POINTS_DENOMINATOR,
  MAX_DURATION_DAYS,
  MAX_FEE_BASIS_POINTS,
  MIN_DURATION_DAYS,
  SECONDS_PER_DAY
} from "./types.js";
import type { CampaignDraft, CampaignPhase, CampaignRecord, Clock, FeeSplit, PublicKeyLike } from "./types.js";

export function assertPositiveAmount(amount: number, label: string): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new CampaignError("InvalidInput", `${label} must be a positive integer`);
  }
}

export function assertFeeBasisPoints(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_FEE_BASIS_POINTS) {
    throw new CampaignError("InvalidInput", `Fee must be an integer between 0 and ${MAX_FEE_BASIS_POINTS} basis points`);
  }
}

export function validateDraft(draft: CampaignDraft): void {
  if (draft.title.trim().length === 0) {
    throw new CampaignError("InvalidInput", "Title must not be empty");
  }
  if (draft.description.trim().length === 0) {
    throw new CampaignError("InvalidInput", "Description must not be empty");
  }
  assertPositiveAmount(draft.goalAmount, "Goal amount");
  if (
    !Number.isInteger(draft.durationDays) ||
    draft.durationDays < MIN_DURATION_DAYS ||
    draft.durationDays > MAX_DURATION_DAYS
  ) {
    throw new CampaignError(
      "InvalidInput",
      `Duration must be between ${MIN_DURATION_DAYS} and ${MAX_DURATION_DAYS} days`
    );
  }
}

export function newCampaign(id: number, creator: PublicKeyLike, draft: CampaignDraft, now: number): CampaignRecord {
  return {
    id,
    creator,
    title: draft.title,
    description: draft.description,
    goalAmount: draft.goalAmount,
    raisedAmount: 0,
    deadline: now + draft.durationDays * SECONDS_PER_DAY,
    createdAt: now,
    isActive: true,
    goalReached: false,
    fundsWithdrawn: false,
    contributorCount: 0
  };
}

/**
 * floor(amount * bp / 10000), split so that the product never leaves the
 * safe-integer range.
 */
export function computeFeeSplit(raisedAmount: number, feeBasisPoints: number): FeeSplit {
  const whole = Math.floor(raisedAmount / BASIS_POINTS_DENOMINATOR);
  const remainder = raisedAmount % BASIS_POINTS_DENOMINATOR;
  const feeAmount = whole * feeBasisPoints + Math.floor((remainder * feeBasisPoints) / BASIS_POINTS_DENOMINATOR);
  return { creatorAmount: raisedAmount - feeAmount, feeAmount };
}

/** floor(raised * 10000 / goal), exact for any safe-integer operands */
export function progressBasisPoints(raisedAmount: number, goalAmount: number): number {
  return Number((BigInt(raisedAmount) * BigInt(BASIS_POINTS_DENOMINATOR)) / BigInt(goalAmount));
}

export function acceptsContributions(campaign: CampaignRecord, now: number): boolean {
  return campaign.isActive && now < campaign.deadline;
}

export function isPastDeadline(campaign: CampaignRecord, now: number): boolean {
  return now > campaign.deadline;
}

export function campaignPhase(campaign: CampaignRecord, now: number): CampaignPhase {
  if (campaign.fundsWithdrawn) return "withdrawn";
  if (campaign.goalReached) return "funded";
  // only cancellation deactivates a campaign that never reached its goal
  if (!campaign.isActive) return "cancelled";
  if (now < campaign.deadline) return "active";
  return isPastDeadline(campaign, now) ? "refundable" : "closed";
}

/** Value that still belongs to campaigns, i.e. everything custody must keep */
export function committedValue(campaigns: Iterable<CampaignRecord>): number {
  let total = 0;
  for (const campaign of campaigns) {
    if (!campaign.fundsWithdrawn) total += campaign.raisedAmount;
  }
  return total;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000)
};
