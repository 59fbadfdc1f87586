import { PublicKey, SystemProgram, Transaction } from "@solana/web3.js";
import { ValidationError } from "./errors.js";
import type { TransferRecord } from "./types.js";

/**
 * Turns a settled transfer into an unsigned SOL transfer from the platform
 * treasury. Signing and submission belong to the host.
 */
export function buildPayoutTransaction(
  transfer: TransferRecord,
  treasury: PublicKey,
  recentBlockhash: string
): Transaction {
  if (transfer.amount > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new ValidationError("Payout amount exceeds the safe lamport range");
  }
  return new Transaction({
    feePayer: treasury,
    recentBlockhash
  }).add(
    SystemProgram.transfer({
      fromPubkey: treasury,
      toPubkey: new PublicKey(transfer.to),
      lamports: Number(transfer.amount)
    })
  );
}

/** One transaction per transfer, in settlement order. */
export function buildPayoutBatch(
  transfers: readonly TransferRecord[],
  treasury: PublicKey,
  recentBlockhash: string
): Transaction[] {
  return transfers.map((t) => buildPayoutTransaction(t, treasury, recentBlockhash));
}
