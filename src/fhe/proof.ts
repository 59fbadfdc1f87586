import { ed25519 } from "@noble/curves/ed25519";
import { PublicKey } from "@solana/web3.js";
import type { Keypair } from "@solana/web3.js";
import { ProofVerificationError, ValidationError } from "../crowdfunding/errors.js";
import type { PublicKeyLike } from "../crowdfunding/types.js";
import { U64_MAX } from "./types.js";
import type { RequestId, RevealContext, RevealVerifier } from "./types.js";

/** Domain separator prefixed to every signed reveal message ("CFRV"). */
export const REVEAL_DOMAIN = new Uint8Array([0x43, 0x46, 0x52, 0x56]);

const U64_BYTES = 8;
const ED25519_SIGNATURE_BYTES = 64;

export function encodeU64Values(values: readonly bigint[]): Uint8Array {
  const out = new Uint8Array(values.length * U64_BYTES);
  const view = new DataView(out.buffer);
  values.forEach((value, i) => {
    if (value < 0n || value > U64_MAX) {
      throw new ValidationError(`Value out of u64 range: ${value}`);
    }
    view.setBigUint64(i * U64_BYTES, value, false);
  });
  return out;
}

/**
 * Decodes exactly `expected` u64 values. Any other payload length is
 * rejected so that a response shaped for another request never applies.
 */
export function decodeU64Values(bytes: Uint8Array, expected: number): bigint[] {
  if (bytes.length !== expected * U64_BYTES) {
    throw new ProofVerificationError(
      `Malformed reveal payload: expected ${expected} values, got ${bytes.length} bytes`
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const values: bigint[] = [];
  for (let i = 0; i < expected; i++) {
    values.push(view.getBigUint64(i * U64_BYTES, false));
  }
  return values;
}

export function encodeRevealContext(context: RevealContext): string {
  return context.kind === "settlement"
    ? `settlement:${context.campaignId}`
    : `refund:${context.campaignId}:${context.contributor}`;
}

function lengthPrefixed(text: string): Buffer {
  const body = Buffer.from(text, "utf8");
  const len = Buffer.alloc(4);
  len.writeUInt32BE(body.length, 0);
  return Buffer.concat([len, body]);
}

/** domain || len(requestId) requestId || len(context) context || cleartexts */
export function encodeRevealMessage(
  requestId: RequestId,
  context: RevealContext,
  cleartexts: Uint8Array
): Uint8Array {
  return Buffer.concat([
    REVEAL_DOMAIN,
    lengthPrefixed(requestId),
    lengthPrefixed(encodeRevealContext(context)),
    cleartexts
  ]);
}

/** Signs a reveal message with a Solana keypair (seed is the first 32 secret-key bytes). */
export function signReveal(
  signer: Keypair,
  requestId: RequestId,
  context: RevealContext,
  cleartexts: Uint8Array
): Uint8Array {
  return ed25519.sign(encodeRevealMessage(requestId, context, cleartexts), signer.secretKey.slice(0, 32));
}

/**
 * Checks that a reveal response was signed by the configured oracle key
 * over the exact request id, context and payload.
 */
export class Ed25519RevealVerifier implements RevealVerifier {
  private readonly oracleKey: Uint8Array;

  constructor(oraclePublicKey: PublicKeyLike) {
    this.oracleKey = new PublicKey(oraclePublicKey).toBytes();
  }

  verify(requestId: RequestId, context: RevealContext, cleartexts: Uint8Array, proof: Uint8Array): boolean {
    if (proof.length !== ED25519_SIGNATURE_BYTES) return false;
    return ed25519.verify(proof, encodeRevealMessage(requestId, context, cleartexts), this.oracleKey);
  }
}
