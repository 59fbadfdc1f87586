import { decodeU64Values } from "../fhe/proof.js";
import type { RequestId, RevealResponse } from "../fhe/types.js";
import type { AuditLog } from "./audit.js";
import type { ProtocolConfig } from "./config.js";
import type { FundsCustody } from "./custody.js";
import { AuthorizationError, ResourceError, StateError } from "./errors.js";
import type { CampaignLedger } from "./ledger.js";
import type { RevealRequestManager } from "./reveal-manager.js";
import type {
  CampaignRecord,
  Clock,
  ContributionRecord,
  PublicKeyLike,
  RevealRequestRecord,
  TransferRecord
} from "./types.js";

/**
 * The only component that moves held funds. Every path marks state first
 * and transfers last, so a repeated call fails its state check. When the
 * transfer throws, the marks are undone and the error propagates.
 */
export class SettlementEngine {
  constructor(
    private readonly ledger: CampaignLedger,
    private readonly reveals: RevealRequestManager,
    private readonly custody: FundsCustody,
    private readonly audit: AuditLog,
    private readonly config: ProtocolConfig,
    private readonly clock: Clock
  ) {}

  withdraw(campaignId: number, caller: PublicKeyLike): TransferRecord {
    const campaign = this.ledger.require(campaignId);
    const now = this.clock.now();
    if (caller !== campaign.creator) {
      throw new AuthorizationError("Only the creator can withdraw");
    }
    if (campaign.status !== "successful") {
      throw new StateError("Campaign is not successful");
    }
    if (campaign.withdrawn) {
      throw new StateError("Funds already withdrawn");
    }
    const amount = campaign.revealedRaised;
    if (amount === null) {
      throw new StateError("No verified reveal for this campaign");
    }
    this.requireBalance(campaignId, amount);

    const mark = this.audit.mark();
    campaign.withdrawn = true;
    this.ledger.transition(campaign, "withdrawn", "withdraw", now);
    try {
      return this.custody.transfer(campaignId, campaign.creator, amount, "withdrawal", now);
    } catch (err) {
      campaign.withdrawn = false;
      this.ledger.revertTransition(campaign, "successful");
      this.audit.rollbackTo(mark);
      throw err;
    }
  }

  /**
   * From `failed` this issues a reveal of the caller's own contribution and
   * returns its request id. From `decryption_failed` the oracle is presumed
   * unavailable, so the request is only recorded and null is returned.
   *
   * A refund reveal left unanswered for `revealTimeout` may be requested
   * again; the old request is marked timed out and its response goes stale.
   */
  requestRefund(campaignId: number, caller: PublicKeyLike): RequestId | null {
    const campaign = this.ledger.require(campaignId);
    const now = this.clock.now();
    if (campaign.status !== "failed" && campaign.status !== "decryption_failed") {
      throw new StateError("Refunds are not available for this campaign");
    }
    const contribution = this.ledger.findContribution(campaignId, caller);
    if (!contribution) {
      throw new AuthorizationError("Caller has no contribution to this campaign");
    }
    if (contribution.refunded) {
      throw new StateError("Contribution already refunded");
    }
    const superseded = contribution.refundRequested
      ? this.reissuableRefund(contribution, now)
      : undefined;

    let requestId: RequestId | null = null;
    if (campaign.status === "failed") {
      requestId = this.reveals.issue(
        campaignId,
        [contribution.amount],
        { kind: "refund", campaignId, contributor: caller },
        caller,
        now
      ).requestId;
    }
    if (superseded) superseded.timedOut = true;
    contribution.refundRequested = true;
    contribution.refundRequestedAt = now;
    contribution.refundRequestId = requestId;
    this.audit.recordContribution(campaignId, caller, "refund_requested", now);
    return requestId;
  }

  onRefundReveal(response: RevealResponse): TransferRecord {
    const request = this.reveals.authenticate(response);
    const context = request.context;
    if (context.kind !== "refund") {
      throw new StateError("Response does not answer a refund reveal");
    }
    const campaign = this.ledger.require(request.campaignId);
    const contribution = this.ledger.findContribution(campaign.id, context.contributor);
    if (
      !contribution ||
      request.completed ||
      request.timedOut ||
      !contribution.refundRequested ||
      contribution.refunded ||
      contribution.refundRequestId !== request.requestId
    ) {
      throw new StateError("Stale refund reveal");
    }
    const [amount] = decodeU64Values(response.cleartexts, 1);
    this.requireBalance(campaign.id, amount);

    return this.refund(campaign, contribution, amount, "refund", this.clock.now(), request);
  }

  /**
   * Fallback when the oracle never answered: splits the held balance
   * evenly across backers that have not been refunded yet. The last
   * eligible backer receives whatever remains.
   */
  emergencyRefund(campaignId: number, caller: PublicKeyLike): TransferRecord {
    const campaign = this.ledger.require(campaignId);
    const now = this.clock.now();
    if (campaign.status !== "decryption_failed") {
      throw new StateError("Emergency refunds require a failed decryption");
    }
    if (campaign.requestedAt === null) {
      throw new StateError("Campaign has no failed reveal request");
    }
    if (now < campaign.requestedAt + 2 * this.config.revealTimeout) {
      throw new StateError("Emergency refund window has not opened");
    }
    const contribution = this.ledger.findContribution(campaignId, caller);
    if (!contribution) {
      throw new AuthorizationError("Caller has no contribution to this campaign");
    }
    if (contribution.refunded) {
      throw new StateError("Contribution already refunded");
    }

    const eligible = BigInt(campaign.backerCount - campaign.refundedCount);
    const share = this.custody.balanceOf(campaignId) / eligible;
    if (share <= 0n) {
      throw new ResourceError("No held balance left to refund");
    }

    return this.refund(campaign, contribution, share, "emergency_refund", now);
  }

  /** The pending refund request, provided it has gone unanswered past the reveal timeout. */
  private reissuableRefund(contribution: ContributionRecord, now: number): RevealRequestRecord {
    const pending =
      contribution.refundRequestId === null ? undefined : this.reveals.findRequest(contribution.refundRequestId);
    if (!pending || pending.completed || now < pending.issuedAt + this.config.revealTimeout) {
      throw new StateError("Refund already requested");
    }
    return pending;
  }

  private refund(
    campaign: CampaignRecord,
    contribution: ContributionRecord,
    amount: bigint,
    reason: "refund" | "emergency_refund",
    now: number,
    request?: RevealRequestRecord
  ): TransferRecord {
    const mark = this.audit.mark();
    const raised = campaign.raised;
    if (request) request.completed = true;
    contribution.refunded = true;
    campaign.refundedCount++;
    this.ledger.recomputeRaised(campaign);
    this.audit.recordContribution(campaign.id, contribution.contributor, "refunded", now);
    try {
      return this.custody.transfer(campaign.id, contribution.contributor, amount, reason, now);
    } catch (err) {
      if (request) request.completed = false;
      contribution.refunded = false;
      campaign.refundedCount--;
      campaign.raised = raised;
      this.audit.rollbackTo(mark);
      throw err;
    }
  }

  private requireBalance(campaignId: number, amount: bigint): void {
    const held = this.custody.balanceOf(campaignId);
    if (held < amount) {
      throw new ResourceError(`Insufficient held balance: ${held} < ${amount}`);
    }
  }
}
