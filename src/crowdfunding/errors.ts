export type CampaignErrorKind =
  | "InvalidInput"
  | "DirectDepositRejected"
  | "NotFound"
  | "Unauthorized"
  | "InactiveCampaign"
  | "DeadlineExpired"
  | "SelfFundingForbidden"
  | "GoalNotReached"
  | "AlreadyWithdrawn"
  | "NothingToWithdraw"
  | "CampaignStillActive"
  | "CampaignSucceeded"
  | "NoContributionFound"
  | "AlreadyInactive"
  | "HasContributions"
  | "NothingToSweep"
  | "CampaignBusy"
  | "TransferFailed";

/**
 * validation: the arguments were wrong.
 * precondition: the ledger is in the wrong state for this call.
 * transfer: value could not be moved; nothing was committed and the call may be retried.
 */
export type CampaignErrorCategory = "validation" | "precondition" | "transfer";

function categorize(kind: CampaignErrorKind): CampaignErrorCategory {
  switch (kind) {
    case "InvalidInput":
    case "DirectDepositRejected":
      return "validation";
    case "TransferFailed":
      return "transfer";
    default:
      return "precondition";
  }
}

export class CampaignError extends Error {
  readonly kind: CampaignErrorKind;
  readonly category: CampaignErrorCategory;

  constructor(kind: CampaignErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CampaignError";
    this.kind = kind;
    this.category = categorize(kind);
  }
}

export function isCampaignError(err: unknown, kind?: CampaignErrorKind): err is CampaignError {
  return err instanceof CampaignError && (kind === undefined || err.kind === kind);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
