export type CampaignErrorCode =
  | "VALIDATION"
  | "UNAUTHORIZED"
  | "INVALID_STATE"
  | "PROOF_REJECTED"
  | "INSUFFICIENT_RESOURCES";

/**
 * Base class for every rejection raised by the protocol. A thrown
 * CampaignError always means the operation left no state behind.
 */
export class CampaignError extends Error {
  constructor(
    message: string,
    public readonly code: CampaignErrorCode
  ) {
    super(message);
    this.name = "CampaignError";
  }
}

/** Bad metadata, amount, target, duration or identity. */
export class ValidationError extends CampaignError {
  constructor(message: string) {
    super(message, "VALIDATION");
    this.name = "ValidationError";
  }
}

/** Wrong caller for a creator-only or contributor-only action. */
export class AuthorizationError extends CampaignError {
  constructor(message: string) {
    super(message, "UNAUTHORIZED");
    this.name = "AuthorizationError";
  }
}

/** Operation not valid for the campaign's current status. */
export class StateError extends CampaignError {
  constructor(message: string) {
    super(message, "INVALID_STATE");
    this.name = "StateError";
  }
}

/** Forged, replayed or malformed oracle response. */
export class ProofVerificationError extends CampaignError {
  constructor(message: string) {
    super(message, "PROOF_REJECTED");
    this.name = "ProofVerificationError";
  }
}

/** Held balance (or another finite resource) cannot cover the request. */
export class ResourceError extends CampaignError {
  constructor(message: string) {
    super(message, "INSUFFICIENT_RESOURCES");
    this.name = "ResourceError";
  }
}
