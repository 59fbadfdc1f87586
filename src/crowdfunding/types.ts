import type { Ciphertext, RequestId, RevealContext } from "../fhe/types.js";

/** Base58 Ed25519 public key. */
export type PublicKeyLike = string;

export interface Clock {
  now(): number;
}

export type CampaignStatus =
  | "active"
  | "decryption_pending"
  | "successful"
  | "failed"
  | "decryption_failed"
  | "withdrawn";

/** Operation that triggered a status transition, recorded in the audit log. */
export type CampaignOperation =
  | "createCampaign"
  | "requestFinalization"
  | "onRevealResponse"
  | "onTimeoutCheck"
  | "withdraw"
  | "emergencyPause";

export interface CampaignMetadata {
  title: string;
  description: string;
  category: string;
  /** Off-platform content pointer, e.g. an IPFS CID. */
  contentRef: string;
}

export interface CampaignRecord {
  id: number;
  creator: PublicKeyLike;
  metadata: CampaignMetadata;
  target: Ciphertext;
  /** Homomorphic sum of all non-refunded contributions. */
  raised: Ciphertext;
  /** target * multiplier, fixed at creation. */
  obfuscatedTarget: Ciphertext;
  /** Kept for audit only. */
  multiplier: bigint;
  createdAt: number;
  deadline: number;
  status: CampaignStatus;
  withdrawn: boolean;
  requestId: RequestId | null;
  requestedAt: number | null;
  retryCount: number;
  /** Set once a settlement reveal has been verified. */
  revealedRaised: bigint | null;
  revealedTarget: bigint | null;
  backerCount: number;
  refundedCount: number;
}

/** Encrypted running totals, disclosed only to the creator and the operator. */
export interface CampaignAmounts {
  raised: Ciphertext;
  target: Ciphertext;
  obfuscatedTarget: Ciphertext;
}

export interface ContributionRecord {
  campaignId: number;
  contributor: PublicKeyLike;
  amount: Ciphertext;
  firstContributedAt: number;
  lastContributedAt: number;
  refundRequested: boolean;
  refundRequestedAt: number | null;
  /** Reveal request disclosing this contribution for a refund, if one was issued. */
  refundRequestId: RequestId | null;
  refunded: boolean;
  message?: string;
}

export interface RevealRequestRecord {
  requestId: RequestId;
  campaignId: number;
  requester: PublicKeyLike;
  issuedAt: number;
  context: RevealContext;
  completed: boolean;
  timedOut: boolean;
}

export interface PlatformStats {
  totalCampaigns: number;
  active: number;
  decryptionPending: number;
  successful: number;
  failed: number;
  decryptionFailed: number;
  withdrawn: number;
  /** Distinct (campaign, backer) pairs. */
  totalBackings: number;
}

export type TransferReason = "withdrawal" | "refund" | "emergency_refund";

/**
 * A settled movement of held funds out of a campaign.
 */
export interface TransferRecord {
  id: string;
  campaignId: number;
  to: PublicKeyLike;
  amount: bigint;
  reason: TransferReason;
  timestamp: number;
}
