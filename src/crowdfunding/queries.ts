import { acceptsContributions, campaignPhase, committedValue, isPastDeadline, progressBasisPoints } from "./campaign.js";
import { CampaignError } from "./errors.js";
import type { LedgerStore } from "./store.js";
import type {
  CampaignPhase,
  CampaignRecord,
  CampaignSummary,
  Clock,
  ContributionRecord,
  LedgerStats,
  PublicKeyLike
} from "./types.js";

/**
 * Read-only views over the ledger store. Nothing here writes.
 */
export class CampaignQueries {
  constructor(
    private readonly store: LedgerStore,
    private readonly clock: Clock
  ) {}

  getCampaign(campaignId: number): CampaignRecord {
    const campaign = Number.isInteger(campaignId) ? this.store.getCampaign(campaignId) : undefined;
    if (!campaign) {
      throw new CampaignError("NotFound", `Campaign ${campaignId} does not exist`);
    }
    return campaign;
  }

  getCampaignCount(): number {
    return this.store.getNextCampaignId();
  }

  /**
   * Running balance of `contributor`; 0 when they never contributed or were refunded.
   */
  getContribution(campaignId: number, contributor: PublicKeyLike): number {
    this.getCampaign(campaignId);
    return this.store.getBalance(campaignId, contributor);
  }

  /** Contribution history in the order it was recorded */
  getContributions(campaignId: number): ContributionRecord[] {
    this.getCampaign(campaignId);
    return this.store.contributions(campaignId);
  }

  isDeadlinePassed(campaignId: number): boolean {
    return isPastDeadline(this.getCampaign(campaignId), this.clock.now());
  }

  getTimeRemaining(campaignId: number): number {
    const campaign = this.getCampaign(campaignId);
    return Math.max(0, campaign.deadline - this.clock.now());
  }

  getCampaignPhase(campaignId: number): CampaignPhase {
    return campaignPhase(this.getCampaign(campaignId), this.clock.now());
  }

  /**
   * Campaigns that are active and still before their deadline. Linear scan.
   */
  countActiveCampaigns(): number {
    return this.listActiveCampaigns().length;
  }

  listActiveCampaigns(): CampaignRecord[] {
    const now = this.clock.now();
    return Array.from(this.store.campaigns()).filter(campaign => acceptsContributions(campaign, now));
  }

  listCampaignsByCreator(creator: PublicKeyLike): CampaignRecord[] {
    return Array.from(this.store.campaigns()).filter(campaign => campaign.creator === creator);
  }

  getFeeBasisPoints(): number {
    return this.store.getFeeBasisPoints();
  }

  getAdministrator(): PublicKeyLike | undefined {
    return this.store.getAdministrator();
  }

  getCampaignSummary(campaignId: number): CampaignSummary {
    const campaign = this.getCampaign(campaignId);
    const now = this.clock.now();
    return {
      id: campaign.id,
      title: campaign.title,
      creator: campaign.creator,
      phase: campaignPhase(campaign, now),
      goalAmount: campaign.goalAmount,
      raisedAmount: campaign.raisedAmount,
      contributorCount: campaign.contributorCount,
      deadline: campaign.deadline,
      secondsRemaining: Math.max(0, campaign.deadline - now),
      progressBasisPoints: progressBasisPoints(campaign.raisedAmount, campaign.goalAmount)
    };
  }

  getLedgerStats(): LedgerStats {
    const now = this.clock.now();
    const campaigns = Array.from(this.store.campaigns());
    const stats: LedgerStats = {
      totalCampaigns: campaigns.length,
      activeCampaigns: 0,
      fundedCampaigns: 0,
      withdrawnCampaigns: 0,
      cancelledCampaigns: 0,
      refundableCampaigns: 0,
      totalCommitted: committedValue(campaigns),
      feeBasisPoints: this.store.getFeeBasisPoints()
    };

    for (const campaign of campaigns) {
      switch (campaignPhase(campaign, now)) {
        case "active":
          stats.activeCampaigns++;
          break;
        case "funded":
          stats.fundedCampaigns++;
          break;
        case "withdrawn":
          stats.withdrawnCampaigns++;
          break;
        case "cancelled":
          stats.cancelledCampaigns++;
          break;
        case "refundable":
          stats.refundableCampaigns++;
          break;
        case "closed":
          break;
      }
    }
    return stats;
  }
}
