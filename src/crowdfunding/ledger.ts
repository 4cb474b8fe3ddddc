import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import type { Payout, TransferGateway, TransferResult } from "../gateway/types.js";
import { componentLogger } from "../logger.js";
import {
  assertFeeBasisPoints,
  assertPositiveAmount,
  committedValue,
  computeFeeSplit,
  isPastDeadline,
  newCampaign,
  validateDraft
} from "./campaign.js";
import { CampaignError, describeError } from "./errors.js";
import { LoggingEventSink } from "./events.js";
import type { CampaignEvent, EventSink } from "./events.js";
import type { LedgerStore } from "./store.js";
import type { CampaignDraft, CampaignRecord, Clock, FeeSplit, LedgerConfig, PublicKeyLike } from "./types.js";

export interface LedgerDependencies {
  store: LedgerStore;
  gateway: TransferGateway;
  clock: Clock;
  events?: EventSink;
  logger?: Logger;
}

/**
 * Escrow ledger for crowdfunding campaigns.
 *
 * Every mutating call validates and writes its final state synchronously, and
 * only then awaits the gateway. While that await is pending the campaign is
 * marked in flight: re-entrant calls see the completed state, and any call
 * that would still pass its checks is rejected with CampaignBusy. A failed
 * transfer restores the records written before it.
 */
export class CrowdfundingLedger {
  private readonly store: LedgerStore;
  private readonly gateway: TransferGateway;
  private readonly clock: Clock;
  private readonly events: EventSink;
  private readonly logger: Logger;
  private readonly feeRecipient: PublicKeyLike | undefined;
  private readonly inFlight = new Set<number>();
  private sweeping = false;

  constructor(config: LedgerConfig, deps: LedgerDependencies) {
    if (config.administrator.trim().length === 0) {
      throw new CampaignError("InvalidInput", "Administrator identity must not be empty");
    }
    const feeBasisPoints = config.feeBasisPoints ?? 0;
    assertFeeBasisPoints(feeBasisPoints);

    this.store = deps.store;
    this.gateway = deps.gateway;
    this.clock = deps.clock;
    this.logger = deps.logger ?? componentLogger("ledger");
    this.events = deps.events ?? new LoggingEventSink(this.logger);
    this.feeRecipient = config.feeRecipient;
    this.gateway.guardDirectDeposits?.((from, amount) => this.rejectDirectDeposit(from, amount));

    // a store that already has an administrator was initialized before
    if (this.store.getAdministrator() === undefined) {
      this.store.putAdministrator(config.administrator);
      this.store.putFeeBasisPoints(feeBasisPoints);
    }
  }

  createCampaign(creator: PublicKeyLike, draft: CampaignDraft): number {
    if (creator.trim().length === 0) {
      throw new CampaignError("InvalidInput", "Creator identity must not be empty");
    }
    validateDraft(draft);

    const now = this.clock.now();
    const id = this.store.getNextCampaignId();
    const campaign = newCampaign(id, creator, draft, now);
    this.store.putCampaign(campaign);
    this.store.putNextCampaignId(id + 1);

    this.publish({
      type: "campaign_created",
      ...this.stamp(now),
      campaignId: id,
      creator,
      title: campaign.title,
      goalAmount: campaign.goalAmount,
      deadline: campaign.deadline
    });
    return id;
  }

  /**
   * Escrows `amount` from `from` and credits it to the campaign.
   * Resolves to the campaign's new raised total.
   */
  async contribute(campaignId: number, amount: number, from: PublicKeyLike): Promise<number> {
    const campaign = this.requireCampaign(campaignId);
    const now = this.clock.now();
    if (!campaign.isActive) {
      throw new CampaignError("InactiveCampaign", "Campaign is not accepting contributions");
    }
    if (now >= campaign.deadline) {
      throw new CampaignError("DeadlineExpired", "Campaign deadline has passed");
    }
    assertPositiveAmount(amount, "Contribution");
    if (!Number.isSafeInteger(campaign.raisedAmount + amount)) {
      throw new CampaignError("InvalidInput", "Contribution would overflow the campaign total");
    }
    if (from === campaign.creator) {
      throw new CampaignError("SelfFundingForbidden", "Creators cannot contribute to their own campaign");
    }

    return this.guarded(campaignId, async () => {
      await this.settle(`Escrow of ${amount} from ${from}`, () => this.gateway.escrow(from, amount));

      // the guard kept every other writer off this campaign during the escrow
      const current = this.requireCampaign(campaignId);
      const previous = this.store.getBalance(campaignId, from);
      const raisedAmount = current.raisedAmount + amount;
      const crossed = !current.goalReached && raisedAmount >= current.goalAmount;

      this.store.putBalance(campaignId, from, previous + amount);
      this.store.putCampaign({
        ...current,
        raisedAmount,
        contributorCount: previous === 0 ? current.contributorCount + 1 : current.contributorCount,
        goalReached: current.goalReached || crossed
      });
      this.store.appendContribution(campaignId, { contributor: from, amount, timestamp: now });

      this.publish({
        type: "contribution_received",
        ...this.stamp(now),
        campaignId,
        contributor: from,
        amount,
        totalRaised: raisedAmount
      });
      if (crossed) {
        this.publish({ type: "goal_reached", ...this.stamp(now), campaignId, totalRaised: raisedAmount });
      }
      return raisedAmount;
    });
  }

  /**
   * Pays the raised total to the creator, less the fee in effect right now.
   */
  async withdrawFunds(campaignId: number, requester: PublicKeyLike): Promise<FeeSplit> {
    const campaign = this.requireCampaign(campaignId);
    if (requester !== campaign.creator) {
      throw new CampaignError("Unauthorized", "Only the campaign creator can withdraw");
    }
    if (!campaign.goalReached) {
      throw new CampaignError("GoalNotReached", "Campaign goal has not been reached");
    }
    if (campaign.fundsWithdrawn) {
      throw new CampaignError("AlreadyWithdrawn", "Funds have already been withdrawn");
    }
    if (campaign.raisedAmount === 0) {
      throw new CampaignError("NothingToWithdraw", "Campaign holds no funds");
    }

    return this.guarded(campaignId, async () => {
      const feeBasisPoints = this.store.getFeeBasisPoints();
      const split = computeFeeSplit(campaign.raisedAmount, feeBasisPoints);
      const feeRecipient = this.currentFeeRecipient();

      this.store.putCampaign({ ...campaign, fundsWithdrawn: true, isActive: false });

      const payouts: Payout[] = [{ to: campaign.creator, amount: split.creatorAmount }];
      if (split.feeAmount > 0) {
        payouts.push({ to: feeRecipient, amount: split.feeAmount });
      }
      try {
        await this.settle(`Withdrawal from campaign ${campaignId}`, () => this.gateway.payAll(payouts));
      } catch (err) {
        this.store.putCampaign(campaign);
        this.logger.warn({ err, campaignId }, "withdrawal rolled back");
        throw err;
      }

      this.publish({
        type: "funds_withdrawn",
        ...this.stamp(),
        campaignId,
        creator: campaign.creator,
        creatorAmount: split.creatorAmount,
        feeAmount: split.feeAmount,
        feeRecipient,
        feeBasisPoints
      });
      return split;
    });
  }

  /**
   * Returns the requester's whole running balance once the campaign has
   * failed to reach its goal.
   */
  async requestRefund(campaignId: number, requester: PublicKeyLike): Promise<number> {
    const campaign = this.requireCampaign(campaignId);
    if (campaign.isActive && !isPastDeadline(campaign, this.clock.now())) {
      throw new CampaignError("CampaignStillActive", "Campaign is still running");
    }
    if (campaign.goalReached) {
      throw new CampaignError("CampaignSucceeded", "Campaign reached its goal; refunds are closed");
    }
    if (campaign.fundsWithdrawn) {
      throw new CampaignError("AlreadyWithdrawn", "Funds have already been withdrawn");
    }
    const amount = this.store.getBalance(campaignId, requester);
    if (amount === 0) {
      throw new CampaignError("NoContributionFound", "No contribution to refund");
    }

    return this.guarded(campaignId, async () => {
      this.store.putBalance(campaignId, requester, 0);
      this.store.putCampaign({
        ...campaign,
        raisedAmount: campaign.raisedAmount - amount,
        contributorCount: campaign.contributorCount - 1
      });

      try {
        await this.settle(`Refund of ${amount} to ${requester}`, () => this.gateway.pay(requester, amount));
      } catch (err) {
        this.store.putBalance(campaignId, requester, amount);
        this.store.putCampaign(campaign);
        this.logger.warn({ err, campaignId, requester }, "refund rolled back");
        throw err;
      }

      this.publish({ type: "refund_issued", ...this.stamp(), campaignId, contributor: requester, amount });
      return amount;
    });
  }

  cancelCampaign(campaignId: number, requester: PublicKeyLike): void {
    const campaign = this.requireCampaign(campaignId);
    if (requester !== campaign.creator) {
      throw new CampaignError("Unauthorized", "Only the campaign creator can cancel");
    }
    if (!campaign.isActive) {
      throw new CampaignError("AlreadyInactive", "Campaign is already inactive");
    }
    if (campaign.raisedAmount > 0) {
      throw new CampaignError("HasContributions", "Campaign already has contributions");
    }
    this.assertIdle(campaignId);

    this.store.putCampaign({ ...campaign, isActive: false });
    this.publish({ type: "campaign_cancelled", ...this.stamp(), campaignId, creator: campaign.creator });
  }

  /**
   * Applies to every withdrawal made after this call, including campaigns
   * created under an earlier rate.
   */
  setFeeBasisPoints(value: number, requester: PublicKeyLike): void {
    this.requireAdministrator(requester);
    assertFeeBasisPoints(value);

    const previousBasisPoints = this.store.getFeeBasisPoints();
    this.store.putFeeBasisPoints(value);
    this.publish({ type: "fee_updated", ...this.stamp(), previousBasisPoints, feeBasisPoints: value });
  }

  transferAdministration(administrator: PublicKeyLike, requester: PublicKeyLike): void {
    const previousAdministrator = this.requireAdministrator(requester);
    if (administrator.trim().length === 0) {
      throw new CampaignError("InvalidInput", "Administrator identity must not be empty");
    }
    if (administrator === previousAdministrator) {
      throw new CampaignError("InvalidInput", "Identity is already the administrator");
    }

    this.store.putAdministrator(administrator);
    this.publish({ type: "administration_transferred", ...this.stamp(), previousAdministrator, administrator });
  }

  /**
   * Pays the administrator whatever custody holds beyond the value committed
   * to campaigns. Campaign records are never touched.
   */
  async emergencySweep(requester: PublicKeyLike): Promise<number> {
    const administrator = this.requireAdministrator(requester);
    if (this.sweeping || this.inFlight.size > 0) {
      throw new CampaignError("CampaignBusy", "Transfers are in flight");
    }

    this.sweeping = true;
    try {
      let held: number;
      try {
        held = await this.gateway.balance();
      } catch (err) {
        throw new CampaignError("TransferFailed", `Custody balance unavailable: ${describeError(err)}`, { cause: err });
      }
      const stranded = held - committedValue(this.store.campaigns());
      if (stranded <= 0) {
        throw new CampaignError("NothingToSweep", "Custody holds no value outside campaign accounting");
      }

      await this.settle(`Sweep of ${stranded} to ${administrator}`, () => this.gateway.pay(administrator, stranded));
      this.publish({ type: "emergency_sweep", ...this.stamp(), administrator, amount: stranded });
      return stranded;
    } finally {
      this.sweeping = false;
    }
  }

  /**
   * Value only enters custody through contribute. Gateways that can refuse a
   * plain transfer call this before crediting it.
   */
  rejectDirectDeposit(from: PublicKeyLike, amount: number): never {
    this.logger.warn({ from, amount }, "direct deposit rejected");
    throw new CampaignError("DirectDepositRejected", "Direct deposits are not accepted; use contribute");
  }

  private requireCampaign(campaignId: number): CampaignRecord {
    const campaign = Number.isInteger(campaignId) ? this.store.getCampaign(campaignId) : undefined;
    if (!campaign) {
      throw new CampaignError("NotFound", `Campaign ${campaignId} does not exist`);
    }
    return campaign;
  }

  private requireAdministrator(requester: PublicKeyLike): PublicKeyLike {
    const administrator = this.store.getAdministrator();
    if (administrator === undefined || requester !== administrator) {
      throw new CampaignError("Unauthorized", "Only the administrator can perform this operation");
    }
    return administrator;
  }

  private currentFeeRecipient(): PublicKeyLike {
    const recipient = this.feeRecipient ?? this.store.getAdministrator();
    if (recipient === undefined) {
      throw new CampaignError("Unauthorized", "No fee recipient is configured");
    }
    return recipient;
  }

  private assertIdle(campaignId: number): void {
    if (this.sweeping || this.inFlight.has(campaignId)) {
      throw new CampaignError("CampaignBusy", `Campaign ${campaignId} has a transfer in flight`);
    }
  }

  private async guarded<T>(campaignId: number, work: () => Promise<T>): Promise<T> {
    this.assertIdle(campaignId);
    this.inFlight.add(campaignId);
    try {
      return await work();
    } finally {
      this.inFlight.delete(campaignId);
    }
  }

  private async settle(action: string, attempt: () => Promise<TransferResult>): Promise<string> {
    let result: TransferResult;
    try {
      result = await attempt();
    } catch (err) {
      throw new CampaignError("TransferFailed", `${action} failed: ${describeError(err)}`, { cause: err });
    }
    if (!result.ok) {
      throw new CampaignError("TransferFailed", `${action} failed: ${result.reason}`);
    }
    return result.reference;
  }

  private stamp(now: number = this.clock.now()): { id: string; timestamp: number } {
    return { id: uuidv4(), timestamp: now };
  }

  private publish(event: CampaignEvent): void {
    try {
      this.events.emit(event);
    } catch (err) {
      this.logger.warn({ err, eventType: event.type }, "event sink failed");
    }
  }
}
