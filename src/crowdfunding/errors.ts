export type CampaignErrorKind =
  | "authorization"
  | "invalid_input"
  | "invalid_state"
  | "temporal_violation"
  | "conservation_violation";

export interface ErrorDetails {
  campaignId?: number;
  value?: string | number | bigint;
}

export class CampaignError extends Error {
  readonly kind: CampaignErrorKind;
  readonly details: ErrorDetails;

  constructor(message: string, kind: CampaignErrorKind = "invalid_state", details: ErrorDetails = {}) {
    super(message);
    this.name = "CampaignError";
    this.kind = kind;
    this.details = details;
  }
}

export class AuthorizationError extends CampaignError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, "authorization", details);
    this.name = "AuthorizationError";
  }
}

export class InvalidInputError extends CampaignError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, "invalid_input", details);
    this.name = "InvalidInputError";
  }
}

export class InvalidStateError extends CampaignError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, "invalid_state", details);
    this.name = "InvalidStateError";
  }
}

export class TemporalViolationError extends CampaignError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, "temporal_violation", details);
    this.name = "TemporalViolationError";
  }
}

/** Arithmetic overflow/underflow or a broken ledger identity. Never recoverable by retrying. */
export class ConservationViolationError extends CampaignError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, "conservation_violation", details);
    this.name = "ConservationViolationError";
  }
}
