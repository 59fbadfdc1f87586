import { decodeU64Values, encodeRevealContext } from "../fhe/proof.js";
import type {
  Ciphertext,
  CiphertextAlgebra,
  RequestId,
  RevealContext,
  RevealResponse,
  RevealVerifier
} from "../fhe/types.js";
import type { ProtocolConfig } from "./config.js";
import { AuthorizationError, ProofVerificationError, StateError } from "./errors.js";
import type { CampaignLedger } from "./ledger.js";
import type { CampaignRecord, Clock, PublicKeyLike, RevealRequestRecord } from "./types.js";

/**
 * Issues reveal requests to the oracle, tracks them by id and applies
 * verified settlement reveals.
 */
export class RevealRequestManager {
  private readonly requests = new Map<RequestId, RevealRequestRecord>();

  constructor(
    private readonly ledger: CampaignLedger,
    private readonly algebra: CiphertextAlgebra,
    private readonly verifier: RevealVerifier,
    private readonly config: ProtocolConfig,
    private readonly clock: Clock
  ) {}

  requestFinalization(campaignId: number, caller: PublicKeyLike): RequestId {
    const campaign = this.ledger.require(campaignId);
    const now = this.clock.now();
    if (campaign.status !== "active") {
      throw new StateError("Campaign is not active");
    }
    if (now < campaign.deadline) {
      throw new StateError("Funding period has not ended");
    }
    if (caller !== campaign.creator && now < campaign.deadline + this.config.gracePeriod) {
      throw new AuthorizationError("Only the creator can finalize before the grace period ends");
    }

    const request = this.submitSettlementReveal(campaign, caller, now);
    campaign.requestId = request.requestId;
    campaign.requestedAt = now;
    this.ledger.transition(campaign, "decryption_pending", "requestFinalization", now);
    return request.requestId;
  }

  onRevealResponse(response: RevealResponse): void {
    const request = this.authenticate(response);
    if (request.context.kind !== "settlement") {
      throw new StateError("Response does not answer a settlement reveal");
    }
    const campaign = this.ledger.require(request.campaignId);
    if (
      request.completed ||
      request.timedOut ||
      campaign.status !== "decryption_pending" ||
      campaign.requestId !== request.requestId
    ) {
      throw new StateError("Stale reveal response");
    }
    const [revealedRaised, revealedTarget] = decodeU64Values(response.cleartexts, 2);

    const now = this.clock.now();
    request.completed = true;
    campaign.revealedRaised = revealedRaised;
    campaign.revealedTarget = revealedTarget;
    this.ledger.transition(
      campaign,
      revealedRaised >= revealedTarget ? "successful" : "failed",
      "onRevealResponse",
      now
    );
  }

  /** Sends the campaign's [raised, target] pair to the oracle. */
  submitSettlementReveal(campaign: CampaignRecord, requester: PublicKeyLike, now: number): RevealRequestRecord {
    return this.issue(
      campaign.id,
      [campaign.raised, campaign.target],
      { kind: "settlement", campaignId: campaign.id },
      requester,
      now
    );
  }

  issue(
    campaignId: number,
    ciphertexts: readonly Ciphertext[],
    context: RevealContext,
    requester: PublicKeyLike,
    now: number
  ): RevealRequestRecord {
    const requestId = this.algebra.requestReveal(ciphertexts, context);
    if (this.requests.has(requestId)) {
      throw new StateError(`Reveal request id ${requestId} was already used`);
    }
    const request: RevealRequestRecord = {
      requestId,
      campaignId,
      requester,
      issuedAt: now,
      context,
      completed: false,
      timedOut: false
    };
    this.requests.set(requestId, request);
    return request;
  }

  /**
   * Verifies the oracle's proof, then resolves the request it answers.
   * Nothing is decoded or mutated before the proof checks out.
   */
  authenticate(response: RevealResponse): RevealRequestRecord {
    const ok = this.verifier.verify(response.requestId, response.context, response.cleartexts, response.proof);
    if (!ok) {
      throw new ProofVerificationError("Reveal proof rejected");
    }
    const request = this.requests.get(response.requestId);
    if (!request) {
      throw new ProofVerificationError(`Unknown reveal request ${response.requestId}`);
    }
    if (encodeRevealContext(request.context) !== encodeRevealContext(response.context)) {
      throw new ProofVerificationError("Reveal context does not match the request");
    }
    return request;
  }

  /** Mutable record for protocol components. */
  findRequest(requestId: RequestId): RevealRequestRecord | undefined {
    return this.requests.get(requestId);
  }

  getRequest(requestId: RequestId): RevealRequestRecord | undefined {
    const request = this.requests.get(requestId);
    return request ? { ...request } : undefined;
  }
}
