import type { RequestId } from "../fhe/types.js";
import type { ProtocolConfig } from "./config.js";
import { StateError } from "./errors.js";
import type { CampaignLedger } from "./ledger.js";
import type { RevealRequestManager } from "./reveal-manager.js";
import type { Clock, PublicKeyLike } from "./types.js";

/**
 * Abandons stalled settlement reveals. Each accepted check counts one
 * timeout; the request is resubmitted until `maxRetries` checks have
 * elapsed, after which the campaign ends in decryption_failed.
 */
export class TimeoutRetryController {
  constructor(
    private readonly ledger: CampaignLedger,
    private readonly reveals: RevealRequestManager,
    private readonly config: ProtocolConfig,
    private readonly clock: Clock
  ) {}

  /** Returns the replacement request id, or null when the campaign was failed. */
  onTimeoutCheck(campaignId: number, caller: PublicKeyLike): RequestId | null {
    const campaign = this.ledger.require(campaignId);
    const now = this.clock.now();
    if (campaign.status !== "decryption_pending") {
      throw new StateError("No reveal is pending for this campaign");
    }
    const request = campaign.requestId === null ? undefined : this.reveals.findRequest(campaign.requestId);
    if (!request || campaign.requestedAt === null) {
      throw new StateError("Pending campaign has no active reveal request");
    }
    if (request.completed) {
      throw new StateError("Reveal request already completed");
    }
    if (now < campaign.requestedAt + this.config.revealTimeout) {
      throw new StateError("Reveal request has not timed out");
    }

    const timeouts = campaign.retryCount + 1;
    if (timeouts < this.config.maxRetries) {
      const replacement = this.reveals.submitSettlementReveal(campaign, caller, now);
      request.timedOut = true;
      campaign.retryCount = timeouts;
      campaign.requestId = replacement.requestId;
      campaign.requestedAt = now;
      this.ledger.transition(campaign, "decryption_pending", "onTimeoutCheck", now);
      return replacement.requestId;
    }

    request.timedOut = true;
    campaign.retryCount = timeouts;
    this.ledger.transition(campaign, "decryption_failed", "onTimeoutCheck", now);
    return null;
  }
}
