import type { CiphertextAlgebra, RequestId, RevealResponse, RevealVerifier } from "../fhe/types.js";
import { AuditLog } from "./audit.js";
import type { ContributionEntry, StatusTransitionEntry } from "./audit.js";
import { DEFAULT_PROTOCOL_CONFIG, validateProtocolConfig } from "./config.js";
import type { ProtocolConfig } from "./config.js";
import { InMemoryCustody } from "./custody.js";
import type { FundsCustody } from "./custody.js";
import { AuthorizationError, ProofVerificationError } from "./errors.js";
import { CampaignLedger, assertIdentity } from "./ledger.js";
import { CryptoRandomnessBeacon, ObfuscationGenerator } from "./obfuscation.js";
import type { RandomnessBeacon } from "./obfuscation.js";
import { RevealRequestManager } from "./reveal-manager.js";
import { SettlementEngine } from "./settlement.js";
import { TimeoutRetryController } from "./timeout-controller.js";
import type {
  CampaignAmounts,
  CampaignMetadata,
  CampaignRecord,
  CampaignStatus,
  Clock,
  ContributionRecord,
  PlatformStats,
  PublicKeyLike,
  RevealRequestRecord,
  TransferRecord
} from "./types.js";

export interface PlatformOptions {
  /** Identity allowed to pause campaigns and read any campaign's encrypted amounts. */
  operator: PublicKeyLike;
  algebra: CiphertextAlgebra;
  verifier: RevealVerifier;
  clock: Clock;
  config?: ProtocolConfig;
  custody?: FundsCustody;
  beacon?: RandomnessBeacon;
}

export type RevealOutcome =
  | { kind: "settlement"; campaignId: number; status: CampaignStatus }
  | { kind: "refund"; campaignId: number; transfer: TransferRecord };

/**
 * Entry point for hosts. Every method is synchronous and runs to
 * completion before the next call starts, which is the single-writer
 * execution the protocol relies on.
 */
export class CrowdfundingPlatform {
  readonly operator: PublicKeyLike;
  readonly config: ProtocolConfig;
  readonly custody: FundsCustody;
  private readonly audit = new AuditLog();
  private readonly ledger: CampaignLedger;
  private readonly reveals: RevealRequestManager;
  private readonly timeouts: TimeoutRetryController;
  private readonly settlement: SettlementEngine;

  constructor(options: PlatformOptions) {
    const { algebra, verifier, clock } = options;
    assertIdentity(options.operator, "operator");
    this.operator = options.operator;
    this.config = validateProtocolConfig({ ...(options.config ?? DEFAULT_PROTOCOL_CONFIG) });
    this.custody = options.custody ?? new InMemoryCustody();
    const obfuscation = new ObfuscationGenerator(
      algebra,
      options.beacon ?? new CryptoRandomnessBeacon(),
      this.config.multiplierMin,
      this.config.multiplierMax
    );
    this.ledger = new CampaignLedger(algebra, obfuscation, this.custody, this.audit, this.config, clock);
    this.reveals = new RevealRequestManager(this.ledger, algebra, verifier, this.config, clock);
    this.timeouts = new TimeoutRetryController(this.ledger, this.reveals, this.config, clock);
    this.settlement = new SettlementEngine(this.ledger, this.reveals, this.custody, this.audit, this.config, clock);
  }

  createCampaign(
    creator: PublicKeyLike,
    metadata: CampaignMetadata,
    target: bigint,
    fundingDuration: number
  ): number {
    return this.ledger.createCampaign(creator, metadata, target, fundingDuration);
  }

  contribute(campaignId: number, contributor: PublicKeyLike, amount: bigint, message?: string): void {
    this.ledger.recordContribution(campaignId, contributor, amount, message);
  }

  requestFinalization(campaignId: number, caller: PublicKeyLike): RequestId {
    return this.reveals.requestFinalization(campaignId, caller);
  }

  onRevealResponse(response: RevealResponse): void {
    this.reveals.onRevealResponse(response);
  }

  onTimeoutCheck(campaignId: number, caller: PublicKeyLike): RequestId | null {
    return this.timeouts.onTimeoutCheck(campaignId, caller);
  }

  withdraw(campaignId: number, caller: PublicKeyLike): TransferRecord {
    return this.settlement.withdraw(campaignId, caller);
  }

  requestRefund(campaignId: number, caller: PublicKeyLike): RequestId | null {
    return this.settlement.requestRefund(campaignId, caller);
  }

  onRefundReveal(response: RevealResponse): TransferRecord {
    return this.settlement.onRefundReveal(response);
  }

  emergencyRefund(campaignId: number, caller: PublicKeyLike): TransferRecord {
    return this.settlement.emergencyRefund(campaignId, caller);
  }

  emergencyPause(campaignId: number, caller: PublicKeyLike): void {
    if (caller !== this.operator) {
      throw new AuthorizationError("Only the operator can pause a campaign");
    }
    this.ledger.pauseCampaign(campaignId);
  }

  /**
   * Oracle callback. Routes by the kind of request that was recorded when
   * it was issued; the handler then verifies the proof.
   */
  deliverReveal(response: RevealResponse): RevealOutcome {
    const request = this.reveals.findRequest(response.requestId);
    if (!request) {
      throw new ProofVerificationError(`Unknown reveal request ${response.requestId}`);
    }
    if (request.context.kind === "refund") {
      const transfer = this.settlement.onRefundReveal(response);
      return { kind: "refund", campaignId: request.campaignId, transfer };
    }
    this.reveals.onRevealResponse(response);
    return {
      kind: "settlement",
      campaignId: request.campaignId,
      status: this.ledger.require(request.campaignId).status
    };
  }

  getCampaign(campaignId: number): CampaignRecord {
    return this.ledger.getCampaign(campaignId);
  }

  getCampaignAmounts(campaignId: number, caller: PublicKeyLike): CampaignAmounts {
    const campaign = this.ledger.require(campaignId);
    if (caller !== campaign.creator && caller !== this.operator) {
      throw new AuthorizationError("Only the creator or the operator can read campaign amounts");
    }
    return {
      raised: { ...campaign.raised },
      target: { ...campaign.target },
      obfuscatedTarget: { ...campaign.obfuscatedTarget }
    };
  }

  getContribution(campaignId: number, contributor: PublicKeyLike): ContributionRecord | undefined {
    return this.ledger.getContribution(campaignId, contributor);
  }

  getRevealRequest(requestId: RequestId): RevealRequestRecord | undefined {
    return this.reveals.getRequest(requestId);
  }

  getCreatorCampaigns(creator: PublicKeyLike): number[] {
    return this.ledger.getCreatorCampaigns(creator);
  }

  getBackerCampaigns(backer: PublicKeyLike): number[] {
    return this.ledger.getBackerCampaigns(backer);
  }

  getPlatformStats(): PlatformStats {
    return this.ledger.getPlatformStats();
  }

  getStatusHistory(campaignId: number): StatusTransitionEntry[] {
    return this.audit.getTransitions(campaignId);
  }

  getContributionHistory(campaignId: number, contributor?: PublicKeyLike): ContributionEntry[] {
    return this.audit.getContributionEvents(campaignId, contributor);
  }
}
