import { createHash, randomBytes } from "node:crypto";
import { PublicKey } from "@solana/web3.js";
import type { Ciphertext, CiphertextAlgebra } from "../fhe/types.js";
import { ResourceError } from "./errors.js";
import type { PublicKeyLike } from "./types.js";

/** External source of unpredictable bytes (a VRF or beacon round in production). */
export interface RandomnessBeacon {
  read(): Uint8Array;
}

export class CryptoRandomnessBeacon implements RandomnessBeacon {
  read(): Uint8Array {
    return randomBytes(32);
  }
}

export interface ObfuscationInput {
  campaignId: number;
  creator: PublicKeyLike;
  sequenceNumber: number;
  now: number;
  target: Ciphertext;
}

export interface DerivedObfuscation {
  multiplier: bigint;
  obfuscatedTarget: Ciphertext;
}

function u64Bytes(value: number | bigint): Buffer {
  const buf = Buffer.alloc(8);
  buf.writeBigUInt64BE(BigInt(value), 0);
  return buf;
}

/**
 * Draws a per-campaign multiplier and applies it to the encrypted target
 * before any comparison can be made against it. Every issued multiplier is
 * unique for the lifetime of the generator.
 */
export class ObfuscationGenerator {
  private readonly issued = new Set<bigint>();

  constructor(
    private readonly algebra: CiphertextAlgebra,
    private readonly beacon: RandomnessBeacon,
    private readonly min: bigint,
    private readonly max: bigint
  ) {}

  derive(input: ObfuscationInput): DerivedObfuscation {
    const span = this.max - this.min;
    if (BigInt(this.issued.size) >= span) {
      throw new ResourceError("Obfuscation multiplier range exhausted");
    }

    const digest = createHash("sha256")
      .update(u64Bytes(input.now))
      .update(this.beacon.read())
      .update(new PublicKey(input.creator).toBytes())
      .update(u64Bytes(input.sequenceNumber))
      .update(u64Bytes(input.campaignId))
      .digest("hex");
    const start = BigInt(`0x${digest}`) % span;

    // Walk forward from the hashed offset to the first value not yet issued.
    for (let i = 0n; i < span; i++) {
      const multiplier = this.min + ((start + i) % span);
      if (this.issued.has(multiplier)) continue;
      const obfuscatedTarget = this.algebra.mul(input.target, multiplier);
      this.issued.add(multiplier);
      return { multiplier, obfuscatedTarget };
    }
    throw new ResourceError("Obfuscation multiplier range exhausted");
  }
}
