import type { PublicKeyLike } from "../crowdfunding/types.js";

/** Largest value an encrypted 64-bit unsigned integer can hold. */
export const U64_MAX = (1n << 64n) - 1n;

/**
 * Opaque encrypted u64. Only the backend that issued the handle can
 * operate on it; the protocol never sees the plaintext.
 */
export interface Ciphertext {
  readonly type: "euint64";
  readonly handle: string;
}

export type RequestId = string;

/**
 * Caller context attached to a reveal request. The oracle echoes it back
 * unchanged and it is covered by the oracle's proof, so a response can be
 * routed without guessing which request it answers.
 */
export type RevealContext =
  | { readonly kind: "settlement"; readonly campaignId: number }
  | { readonly kind: "refund"; readonly campaignId: number; readonly contributor: PublicKeyLike };

/** Inbound oracle callback payload. */
export interface RevealResponse {
  requestId: RequestId;
  context: RevealContext;
  /** Concatenated 8-byte big-endian u64 values, in request order. */
  cleartexts: Uint8Array;
  proof: Uint8Array;
}

/**
 * Homomorphic capability consumed by the protocol. Arithmetic wraps
 * modulo 2^64 like the native encrypted type.
 */
export interface CiphertextAlgebra {
  encrypt(value: bigint): Ciphertext;
  add(a: Ciphertext, b: Ciphertext): Ciphertext;
  mul(a: Ciphertext, scalar: bigint): Ciphertext;
  /** Fire-and-forget: the answer arrives later as a RevealResponse. */
  requestReveal(ciphertexts: readonly Ciphertext[], context: RevealContext): RequestId;
}

export interface RevealVerifier {
  verify(
    requestId: RequestId,
    context: RevealContext,
    cleartexts: Uint8Array,
    proof: Uint8Array
  ): boolean;
}
