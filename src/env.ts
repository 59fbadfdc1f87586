import dotenv from "dotenv";
import { DEFAULT_PROTOCOL_CONFIG, validateProtocolConfig } from "./crowdfunding/config.js";
import type { ProtocolConfig } from "./crowdfunding/config.js";
import { ValidationError } from "./crowdfunding/errors.js";

dotenv.config();

export const RPC_URL =
  process.env.SOLANA_RPC_URL?.trim() || "https://api.testnet.solana.com";

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return Number(raw);
}

function readBigInt(env: Env, name: string, fallback: bigint): bigint {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return BigInt(raw);
}

/**
 * Builds the protocol configuration from environment variables, falling
 * back to the defaults for anything unset.
 */
export function loadProtocolConfig(env: Env = process.env): ProtocolConfig {
  const d = DEFAULT_PROTOCOL_CONFIG;
  return validateProtocolConfig({
    minFundingDuration: readInteger(env, "MIN_FUNDING_DURATION", d.minFundingDuration),
    maxFundingDuration: readInteger(env, "MAX_FUNDING_DURATION", d.maxFundingDuration),
    maxTarget: readBigInt(env, "MAX_TARGET", d.maxTarget),
    maxContribution: readBigInt(env, "MAX_CONTRIBUTION", d.maxContribution),
    gracePeriod: readInteger(env, "GRACE_PERIOD", d.gracePeriod),
    revealTimeout: readInteger(env, "REVEAL_TIMEOUT", d.revealTimeout),
    maxRetries: readInteger(env, "MAX_RETRIES", d.maxRetries),
    multiplierMin: readBigInt(env, "MULTIPLIER_MIN", d.multiplierMin),
    multiplierMax: readBigInt(env, "MULTIPLIER_MAX", d.multiplierMax)
  });
}
