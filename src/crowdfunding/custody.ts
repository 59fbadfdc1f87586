import { v4 as uuidv4 } from "uuid";
import { ResourceError, ValidationError } from "./errors.js";
import type { PublicKeyLike, TransferReason, TransferRecord } from "./types.js";

/**
 * Holds campaign funds. Only the settlement engine calls `transfer`.
 */
export interface FundsCustody {
  deposit(campaignId: number, from: PublicKeyLike, amount: bigint): void;
  balanceOf(campaignId: number): bigint;
  transfer(
    campaignId: number,
    to: PublicKeyLike,
    amount: bigint,
    reason: TransferReason,
    timestamp: number
  ): TransferRecord;
}

export class InMemoryCustody implements FundsCustody {
  private readonly balances = new Map<number, bigint>();
  private readonly transfers: TransferRecord[] = [];

  deposit(campaignId: number, _from: PublicKeyLike, amount: bigint): void {
    if (amount <= 0n) {
      throw new ValidationError("Deposit must be > 0");
    }
    this.balances.set(campaignId, this.balanceOf(campaignId) + amount);
  }

  balanceOf(campaignId: number): bigint {
    return this.balances.get(campaignId) ?? 0n;
  }

  transfer(
    campaignId: number,
    to: PublicKeyLike,
    amount: bigint,
    reason: TransferReason,
    timestamp: number
  ): TransferRecord {
    if (amount <= 0n) {
      throw new ValidationError("Transfer amount must be > 0");
    }
    const held = this.balanceOf(campaignId);
    if (held < amount) {
      throw new ResourceError(`Insufficient held balance: ${held} < ${amount}`);
    }
    this.balances.set(campaignId, held - amount);
    const record: TransferRecord = { id: uuidv4(), campaignId, to, amount, reason, timestamp };
    this.transfers.push(record);
    return { ...record };
  }

  getTransfers(campaignId?: number): TransferRecord[] {
    return this.transfers
      .filter((t) => campaignId === undefined || t.campaignId === campaignId)
      .map((t) => ({ ...t }));
  }
}
