export { CrowdfundingLedger } from "./ledger.js";
export type { LedgerDependencies } from "./ledger.js";
export { CampaignQueries } from "./queries.js";
export { InMemoryLedgerStore } from "./store.js";
export type { LedgerStore } from "./store.js";
export { CampaignError, isCampaignError } from "./errors.js";
export type { CampaignErrorCategory, CampaignErrorKind } from "./errors.js";
export { campaignPhase, computeFeeSplit, systemClock } from "./campaign.js";
export { FanOutEventSink, LoggingEventSink, RecordingEventSink } from "./events.js";
export type { CampaignEvent, CampaignEventType, EventSink } from "./events.js";
export type {
  CampaignDraft,
  CampaignPhase,
  CampaignRecord,
  CampaignSummary,
  Clock,
  ContributionRecord,
  FeeSplit,
  LedgerConfig,
  LedgerStats,
  PublicKeyLike
} from "./types.js";
