import type { CampaignRecord, ContributionRecord, PublicKeyLike } from "./types.js";

/**
 * Persistence port for the ledger. Every method is synchronous so that a
 * ledger operation can validate and commit without yielding in between.
 *
 * Records handed out are copies; writing back requires an explicit put.
 */
export interface LedgerStore {
  getCampaign(id: number): CampaignRecord | undefined;
  putCampaign(campaign: CampaignRecord): void;
  /** All campaigns in id order */
  campaigns(): IterableIterator<CampaignRecord>;

  getBalance(campaignId: number, contributor: PublicKeyLike): number;
  putBalance(campaignId: number, contributor: PublicKeyLike, amount: number): void;
  balances(campaignId: number): IterableIterator<[PublicKeyLike, number]>;

  appendContribution(campaignId: number, record: ContributionRecord): void;
  contributions(campaignId: number): ContributionRecord[];

  getNextCampaignId(): number;
  putNextCampaignId(id: number): void;
  getFeeBasisPoints(): number;
  putFeeBasisPoints(value: number): void;
  getAdministrator(): PublicKeyLike | undefined;
  putAdministrator(identity: PublicKeyLike): void;
}

export class InMemoryLedgerStore implements LedgerStore {
  private readonly campaignsById = new Map<number, CampaignRecord>();
  private readonly runningBalances = new Map<number, Map<PublicKeyLike, number>>();
  private readonly history = new Map<number, ContributionRecord[]>();
  private nextCampaignId = 0;
  private feeBasisPoints = 0;
  private administrator: PublicKeyLike | undefined;

  getCampaign(id: number): CampaignRecord | undefined {
    const campaign = this.campaignsById.get(id);
    return campaign ? { ...campaign } : undefined;
  }

  putCampaign(campaign: CampaignRecord): void {
    this.campaignsById.set(campaign.id, { ...campaign });
  }

  *campaigns(): IterableIterator<CampaignRecord> {
    const ids = Array.from(this.campaignsById.keys()).sort((a, b) => a - b);
    for (const id of ids) {
      const campaign = this.campaignsById.get(id);
      if (campaign) yield { ...campaign };
    }
  }

  getBalance(campaignId: number, contributor: PublicKeyLike): number {
    return this.runningBalances.get(campaignId)?.get(contributor) ?? 0;
  }

  putBalance(campaignId: number, contributor: PublicKeyLike, amount: number): void {
    let perCampaign = this.runningBalances.get(campaignId);
    if (!perCampaign) {
      perCampaign = new Map();
      this.runningBalances.set(campaignId, perCampaign);
    }
    // zero is kept: it marks an identity that contributed and was refunded
    perCampaign.set(contributor, amount);
  }

  *balances(campaignId: number): IterableIterator<[PublicKeyLike, number]> {
    const perCampaign = this.runningBalances.get(campaignId);
    if (!perCampaign) return;
    yield* Array.from(perCampaign.entries());
  }

  appendContribution(campaignId: number, record: ContributionRecord): void {
    const list = this.history.get(campaignId) ?? [];
    list.push({ ...record });
    this.history.set(campaignId, list);
  }

  contributions(campaignId: number): ContributionRecord[] {
    return (this.history.get(campaignId) ?? []).map(record => ({ ...record }));
  }

  getNextCampaignId(): number {
    return this.nextCampaignId;
  }

  putNextCampaignId(id: number): void {
    this.nextCampaignId = id;
  }

  getFeeBasisPoints(): number {
    return this.feeBasisPoints;
  }

  putFeeBasisPoints(value: number): void {
    this.feeBasisPoints = value;
  }

  getAdministrator(): PublicKeyLike | undefined {
    return this.administrator;
  }

  putAdministrator(identity: PublicKeyLike): void {
    this.administrator = identity;
  }
}
