import type { Logger } from "pino";
import type { PublicKeyLike } from "./types.js";

interface EventEnvelope {
  /** uuid v4 */
  id: string;
  /** Unix seconds at which the operation committed */
  timestamp: number;
}

export interface CampaignCreatedEvent extends EventEnvelope {
  type: "campaign_created";
  campaignId: number;
  creator: PublicKeyLike;
  title: string;
  goalAmount: number;
  deadline: number;
}

export interface ContributionReceivedEvent extends EventEnvelope {
  type: "contribution_received";
  campaignId: number;
  contributor: PublicKeyLike;
  amount: number;
  totalRaised: number;
}

export interface GoalReachedEvent extends EventEnvelope {
  type: "goal_reached";
  campaignId: number;
  totalRaised: number;
}

export interface FundsWithdrawnEvent extends EventEnvelope {
  type: "funds_withdrawn";
  campaignId: number;
  creator: PublicKeyLike;
  creatorAmount: number;
  feeAmount: number;
  feeRecipient: PublicKeyLike;
  feeBasisPoints: number;
}

export interface RefundIssuedEvent extends EventEnvelope {
  type: "refund_issued";
  campaignId: number;
  contributor: PublicKeyLike;
  amount: number;
}

export interface CampaignCancelledEvent extends EventEnvelope {
  type: "campaign_cancelled";
  campaignId: number;
  creator: PublicKeyLike;
}

export interface FeeUpdatedEvent extends EventEnvelope {
  type: "fee_updated";
  previousBasisPoints: number;
  feeBasisPoints: number;
}

export interface AdministrationTransferredEvent extends EventEnvelope {
  type: "administration_transferred";
  previousAdministrator: PublicKeyLike;
  administrator: PublicKeyLike;
}

export interface EmergencySweepEvent extends EventEnvelope {
  type: "emergency_sweep";
  administrator: PublicKeyLike;
  amount: number;
}

export type CampaignEvent =
  | CampaignCreatedEvent
  | ContributionReceivedEvent
  | GoalReachedEvent
  | FundsWithdrawnEvent
  | RefundIssuedEvent
  | CampaignCancelledEvent
  | FeeUpdatedEvent
  | AdministrationTransferredEvent
  | EmergencySweepEvent;

export type CampaignEventType = CampaignEvent["type"];

/** Delivery is best-effort; the ledger never depends on an event being seen. */
export interface EventSink {
  emit(event: CampaignEvent): void;
}

export class LoggingEventSink implements EventSink {
  constructor(private readonly logger: Logger) {}

  emit(event: CampaignEvent): void {
    this.logger.info({ event }, event.type);
  }
}

/**
 * Keeps every event in memory, for indexers and tests.
 */
export class RecordingEventSink implements EventSink {
  private readonly events: CampaignEvent[] = [];

  emit(event: CampaignEvent): void {
    this.events.push(event);
  }

  all(): CampaignEvent[] {
    return [...this.events];
  }

  ofType<T extends CampaignEventType>(type: T): Extract<CampaignEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<CampaignEvent, { type: T }> => event.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}

export class FanOutEventSink implements EventSink {
  private readonly sinks: EventSink[];

  constructor(...sinks: EventSink[]) {
    this.sinks = sinks;
  }

  emit(event: CampaignEvent): void {
    const failures: unknown[] = [];
    for (const sink of this.sinks) {
      try {
        sink.emit(event);
      } catch (err) {
        failures.push(err);
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} event sink(s) failed for ${event.type}`);
    }
  }
}
