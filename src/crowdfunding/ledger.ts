import { PublicKey } from "@solana/web3.js";
import type { Ciphertext, CiphertextAlgebra } from "../fhe/types.js";
import type { AuditLog } from "./audit.js";
import type { ProtocolConfig } from "./config.js";
import type { FundsCustody } from "./custody.js";
import { StateError, ValidationError } from "./errors.js";
import type { ObfuscationGenerator } from "./obfuscation.js";
import type {
  CampaignMetadata,
  CampaignOperation,
  CampaignRecord,
  CampaignStatus,
  Clock,
  ContributionRecord,
  PlatformStats,
  PublicKeyLike
} from "./types.js";

const MAX_TITLE_BYTES = 100;
const MAX_DESCRIPTION_BYTES = 2000;
const MAX_CATEGORY_BYTES = 50;
const MAX_CONTENT_REF_BYTES = 200;
const MAX_MESSAGE_BYTES = 280;

/**
 * Legal status transitions. decryption_pending -> itself is a reveal retry;
 * active -> failed is an operator pause.
 */
const TRANSITIONS: Record<CampaignStatus, readonly CampaignStatus[]> = {
  active: ["decryption_pending", "failed"],
  decryption_pending: ["decryption_pending", "successful", "failed", "decryption_failed"],
  successful: ["withdrawn"],
  failed: [],
  decryption_failed: [],
  withdrawn: []
};

const STAT_KEYS: Record<CampaignStatus, Exclude<keyof PlatformStats, "totalCampaigns" | "totalBackings">> = {
  active: "active",
  decryption_pending: "decryptionPending",
  successful: "successful",
  failed: "failed",
  decryption_failed: "decryptionFailed",
  withdrawn: "withdrawn"
};

export function assertIdentity(key: PublicKeyLike, label: string): void {
  try {
    new PublicKey(key);
  } catch {
    throw new ValidationError(`Invalid ${label} identity`);
  }
}

function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

function validateMetadata(metadata: CampaignMetadata): void {
  const title = byteLength(metadata.title.trim());
  if (title === 0) throw new ValidationError("Title required");
  if (byteLength(metadata.title) > MAX_TITLE_BYTES) throw new ValidationError("Title too long");
  if (byteLength(metadata.description.trim()) === 0) throw new ValidationError("Description required");
  if (byteLength(metadata.description) > MAX_DESCRIPTION_BYTES) {
    throw new ValidationError("Description too long");
  }
  if (byteLength(metadata.category.trim()) === 0) throw new ValidationError("Category required");
  if (byteLength(metadata.category) > MAX_CATEGORY_BYTES) throw new ValidationError("Category too long");
  if (byteLength(metadata.contentRef) > MAX_CONTENT_REF_BYTES) {
    throw new ValidationError("Content reference too long");
  }
}

function contributionKey(campaignId: number, contributor: PublicKeyLike): string {
  return `${campaignId}:${contributor}`;
}

function cloneCampaign(c: CampaignRecord): CampaignRecord {
  return { ...c, metadata: { ...c.metadata } };
}

/**
 * Owns campaign and contribution records. Every status change goes
 * through `transition`, which enforces the state machine, appends to the
 * audit log and keeps platform counters current.
 */
export class CampaignLedger {
  private readonly campaigns = new Map<number, CampaignRecord>();
  private readonly contributions = new Map<string, ContributionRecord>();
  private readonly creatorIndex = new Map<PublicKeyLike, number[]>();
  private readonly backerIndex = new Map<PublicKeyLike, number[]>();
  private readonly stats: PlatformStats = {
    totalCampaigns: 0,
    active: 0,
    decryptionPending: 0,
    successful: 0,
    failed: 0,
    decryptionFailed: 0,
    withdrawn: 0,
    totalBackings: 0
  };
  private nextId = 1;
  private sequence = 0;

  constructor(
    private readonly algebra: CiphertextAlgebra,
    private readonly obfuscation: ObfuscationGenerator,
    private readonly custody: FundsCustody,
    private readonly audit: AuditLog,
    private readonly config: ProtocolConfig,
    private readonly clock: Clock
  ) {}

  createCampaign(
    creator: PublicKeyLike,
    metadata: CampaignMetadata,
    target: bigint,
    fundingDuration: number
  ): number {
    assertIdentity(creator, "creator");
    validateMetadata(metadata);
    if (!Number.isSafeInteger(fundingDuration)) {
      throw new ValidationError("Funding period must be a whole number of seconds");
    }
    if (fundingDuration < this.config.minFundingDuration) {
      throw new ValidationError("Funding period too short");
    }
    if (fundingDuration > this.config.maxFundingDuration) {
      throw new ValidationError("Funding period too long");
    }
    if (target <= 0n) {
      throw new ValidationError("Target must be > 0");
    }
    if (target > this.config.maxTarget) {
      throw new ValidationError("Target exceeds maximum");
    }

    const now = this.clock.now();
    const id = this.nextId;
    const encryptedTarget = this.algebra.encrypt(target);
    const { multiplier, obfuscatedTarget } = this.obfuscation.derive({
      campaignId: id,
      creator,
      sequenceNumber: this.sequence,
      now,
      target: encryptedTarget
    });

    const campaign: CampaignRecord = {
      id,
      creator,
      metadata: { ...metadata },
      target: encryptedTarget,
      raised: this.algebra.encrypt(0n),
      obfuscatedTarget,
      multiplier,
      createdAt: now,
      deadline: now + fundingDuration,
      status: "active",
      withdrawn: false,
      requestId: null,
      requestedAt: null,
      retryCount: 0,
      revealedRaised: null,
      revealedTarget: null,
      backerCount: 0,
      refundedCount: 0
    };

    this.nextId++;
    this.sequence++;
    this.campaigns.set(id, campaign);
    this.appendIndex(this.creatorIndex, creator, id);
    this.stats.totalCampaigns++;
    this.stats.active++;
    this.audit.recordTransition(id, null, "active", "createCampaign", now);
    return id;
  }

  recordContribution(
    campaignId: number,
    contributor: PublicKeyLike,
    amount: bigint,
    message?: string
  ): void {
    const campaign = this.require(campaignId);
    const now = this.clock.now();
    if (campaign.status !== "active") {
      throw new StateError("Campaign is not accepting contributions");
    }
    if (now >= campaign.deadline) {
      throw new StateError("Campaign deadline has passed");
    }
    assertIdentity(contributor, "contributor");
    if (amount <= 0n) {
      throw new ValidationError("Contribution must be > 0");
    }
    if (amount > this.config.maxContribution) {
      throw new ValidationError("Contribution exceeds maximum");
    }
    if (message !== undefined && byteLength(message) > MAX_MESSAGE_BYTES) {
      throw new ValidationError("Message too long");
    }

    const encrypted = this.algebra.encrypt(amount);
    const existing = this.contributions.get(contributionKey(campaignId, contributor));
    const nextAmount = existing ? this.algebra.add(existing.amount, encrypted) : encrypted;
    const nextRaised = this.algebra.add(campaign.raised, encrypted);
    this.custody.deposit(campaignId, contributor, amount);

    campaign.raised = nextRaised;
    if (existing) {
      existing.amount = nextAmount;
      existing.lastContributedAt = now;
      if (message !== undefined) existing.message = message;
      this.audit.recordContribution(campaignId, contributor, "increased", now);
      return;
    }

    this.contributions.set(contributionKey(campaignId, contributor), {
      campaignId,
      contributor,
      amount: nextAmount,
      firstContributedAt: now,
      lastContributedAt: now,
      refundRequested: false,
      refundRequestedAt: null,
      refundRequestId: null,
      refunded: false,
      message
    });
    campaign.backerCount++;
    this.stats.totalBackings++;
    this.appendIndex(this.backerIndex, contributor, campaignId);
    this.audit.recordContribution(campaignId, contributor, "created", now);
  }

  /** Closes an active campaign early; backers recover funds through refunds. */
  pauseCampaign(campaignId: number): void {
    const campaign = this.require(campaignId);
    if (campaign.status !== "active") {
      throw new StateError("Only active campaigns can be paused");
    }
    this.transition(campaign, "failed", "emergencyPause", this.clock.now());
  }

  /** Mutable record for protocol components; throws if unknown. */
  require(campaignId: number): CampaignRecord {
    const campaign = this.campaigns.get(campaignId);
    if (!campaign) {
      throw new ValidationError("Campaign does not exist");
    }
    return campaign;
  }

  findContribution(campaignId: number, contributor: PublicKeyLike): ContributionRecord | undefined {
    return this.contributions.get(contributionKey(campaignId, contributor));
  }

  transition(
    campaign: CampaignRecord,
    to: CampaignStatus,
    operation: CampaignOperation,
    now: number
  ): void {
    const from = campaign.status;
    if (!TRANSITIONS[from].includes(to)) {
      throw new StateError(`Illegal transition ${from} -> ${to}`);
    }
    campaign.status = to;
    this.stats[STAT_KEYS[from]]--;
    this.stats[STAT_KEYS[to]]++;
    this.audit.recordTransition(campaign.id, from, to, operation, now);
  }

  /**
   * Undoes the last `transition` of an operation whose payout failed. The
   * caller rolls back the matching audit entry.
   */
  revertTransition(campaign: CampaignRecord, previous: CampaignStatus): void {
    this.stats[STAT_KEYS[campaign.status]]--;
    this.stats[STAT_KEYS[previous]]++;
    campaign.status = previous;
  }

  /**
   * Rebuilds `raised` from the contributions that have not been refunded,
   * since the algebra offers no subtraction.
   */
  recomputeRaised(campaign: CampaignRecord): void {
    let raised: Ciphertext = this.algebra.encrypt(0n);
    for (const contribution of this.contributions.values()) {
      if (contribution.campaignId === campaign.id && !contribution.refunded) {
        raised = this.algebra.add(raised, contribution.amount);
      }
    }
    campaign.raised = raised;
  }

  getCampaign(campaignId: number): CampaignRecord {
    return cloneCampaign(this.require(campaignId));
  }

  getContribution(campaignId: number, contributor: PublicKeyLike): ContributionRecord | undefined {
    const contribution = this.findContribution(campaignId, contributor);
    return contribution ? { ...contribution } : undefined;
  }

  getCreatorCampaigns(creator: PublicKeyLike): number[] {
    return [...(this.creatorIndex.get(creator) ?? [])];
  }

  getBackerCampaigns(backer: PublicKeyLike): number[] {
    return [...(this.backerIndex.get(backer) ?? [])];
  }

  getPlatformStats(): PlatformStats {
    return { ...this.stats };
  }

  private appendIndex(index: Map<PublicKeyLike, number[]>, key: PublicKeyLike, campaignId: number): void {
    const ids = index.get(key);
    if (ids) ids.push(campaignId);
    else index.set(key, [campaignId]);
  }
}
