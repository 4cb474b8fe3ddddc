export type PublicKeyLike = string;

/** Seconds in one campaign day */
export const SECONDS_PER_DAY = 86_400;

export const MIN_DURATION_DAYS = 1;
export const MAX_DURATION_DAYS = 365;

/** Upper bound for the platform fee (1000 bp = 10%) */
export const MAX_FEE_BASIS_POINTS = 1_000;
export const BASIS_POINTS_DENOMINATOR = 10_000;

export interface Clock {
  /** Current unix time in seconds */
  now(): number;
}

export interface CampaignDraft {
  title: string;
  description: string;
  /** Funding goal in lamports */
  goalAmount: number;
  durationDays: number;
}

export interface CampaignRecord {
  id: number;
  creator: PublicKeyLike;
  title: string;
  description: string;
  goalAmount: number;
  raisedAmount: number;
  /** Unix seconds after which the campaign stops accepting contributions */
  deadline: number;
  createdAt: number;
  isActive: boolean;
  goalReached: boolean;
  fundsWithdrawn: boolean;
  /** Identities currently holding a non-zero running balance */
  contributorCount: number;
}

export interface ContributionRecord {
  contributor: PublicKeyLike;
  amount: number;
  timestamp: number;
}

/**
 * Derived lifecycle phase.
 * `closed` covers the instant `now == deadline`, where a still-active campaign
 * neither accepts contributions nor pays refunds.
 */
export type CampaignPhase = "active" | "funded" | "withdrawn" | "cancelled" | "refundable" | "closed";

export interface FeeSplit {
  creatorAmount: number;
  feeAmount: number;
}

export interface LedgerConfig {
  administrator: PublicKeyLike;
  feeBasisPoints?: number;
  /** Receives withdrawal fees; the current administrator when omitted */
  feeRecipient?: PublicKeyLike;
}

export interface CampaignSummary {
  id: number;
  title: string;
  creator: PublicKeyLike;
  phase: CampaignPhase;
  goalAmount: number;
  raisedAmount: number;
  contributorCount: number;
  deadline: number;
  secondsRemaining: number;
  /** raisedAmount as a share of goalAmount, in basis points */
  progressBasisPoints: number;
}

export interface LedgerStats {
  totalCampaigns: number;
  activeCampaigns: number;
  fundedCampaigns: number;
  withdrawnCampaigns: number;
  cancelledCampaigns: number;
  refundableCampaigns: number;
  /** Value still attributed to campaigns that have not been withdrawn */
  totalCommitted: number;
  feeBasisPoints: number;
}
