import { U64_MAX } from "../fhe/types.js";
import { ValidationError } from "./errors.js";

const DAY = 24 * 60 * 60;

/** Tunable protocol parameters. Durations are in seconds. */
export interface ProtocolConfig {
  minFundingDuration: number;
  maxFundingDuration: number;
  /** Ceiling on targets so that target * (multiplierMax - 1) fits in u64. */
  maxTarget: bigint;
  maxContribution: bigint;
  /** After deadline + gracePeriod anyone may request finalization. */
  gracePeriod: number;
  revealTimeout: number;
  /** Number of unanswered timeout checks that end in decryption_failed. */
  maxRetries: number;
  /** Obfuscation multipliers are drawn from [multiplierMin, multiplierMax). */
  multiplierMin: bigint;
  multiplierMax: bigint;
}

export const DEFAULT_PROTOCOL_CONFIG: Readonly<ProtocolConfig> = {
  minFundingDuration: 7 * DAY,
  maxFundingDuration: 90 * DAY,
  maxTarget: 1_000_000_000_000_000n,
  maxContribution: 1_000_000_000_000_000n,
  gracePeriod: 3 * DAY,
  revealTimeout: 60 * 60,
  maxRetries: 3,
  multiplierMin: 1000n,
  multiplierMax: 11_000n
};

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer`);
  }
}

export function validateProtocolConfig(config: ProtocolConfig): ProtocolConfig {
  requirePositiveInteger("minFundingDuration", config.minFundingDuration);
  requirePositiveInteger("maxFundingDuration", config.maxFundingDuration);
  requirePositiveInteger("gracePeriod", config.gracePeriod);
  requirePositiveInteger("revealTimeout", config.revealTimeout);
  requirePositiveInteger("maxRetries", config.maxRetries);
  if (config.minFundingDuration > config.maxFundingDuration) {
    throw new ValidationError("minFundingDuration must not exceed maxFundingDuration");
  }
  if (config.multiplierMin < 1n || config.multiplierMax <= config.multiplierMin) {
    throw new ValidationError("Multiplier range must be non-empty and start at 1 or above");
  }
  if (config.maxTarget <= 0n || config.maxTarget * (config.multiplierMax - 1n) > U64_MAX) {
    throw new ValidationError("maxTarget leaves no headroom for the obfuscation multiplier");
  }
  if (config.maxContribution <= 0n || config.maxContribution > U64_MAX) {
    throw new ValidationError("maxContribution must be within (0, 2^64)");
  }
  return config;
}
