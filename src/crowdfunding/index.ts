export { CrowdfundingPlatform } from "./platform.js";
export type { PlatformOptions, RevealOutcome } from "./platform.js";
export { CampaignLedger, assertIdentity } from "./ledger.js";
export { ObfuscationGenerator, CryptoRandomnessBeacon } from "./obfuscation.js";
export type { RandomnessBeacon, ObfuscationInput, DerivedObfuscation } from "./obfuscation.js";
export { RevealRequestManager } from "./reveal-manager.js";
export { TimeoutRetryController } from "./timeout-controller.js";
export { SettlementEngine } from "./settlement.js";
export { InMemoryCustody } from "./custody.js";
export type { FundsCustody } from "./custody.js";
export { AuditLog } from "./audit.js";
export type { StatusTransitionEntry, ContributionEntry, ContributionEvent } from "./audit.js";
export { DEFAULT_PROTOCOL_CONFIG, validateProtocolConfig } from "./config.js";
export type { ProtocolConfig } from "./config.js";
export { buildPayoutTransaction, buildPayoutBatch } from "./payouts.js";
export {
  CampaignError,
  ValidationError,
  AuthorizationError,
  StateError,
  ProofVerificationError,
  ResourceError,
  type CampaignErrorCode
} from "./errors.js";
export type {
  CampaignAmounts,
  PublicKeyLike,
  Clock,
  CampaignStatus,
  CampaignOperation,
  CampaignMetadata,
  CampaignRecord,
  ContributionRecord,
  RevealRequestRecord,
  PlatformStats,
  TransferReason,
  TransferRecord
} from "./types.js";
export * from "../fhe/index.js";
