import type { Keypair } from "@solana/web3.js";
import { v4 as uuidv4 } from "uuid";
import { ValidationError } from "../crowdfunding/errors.js";
import type { PublicKeyLike } from "../crowdfunding/types.js";
import { encodeU64Values, signReveal } from "./proof.js";
import { U64_MAX } from "./types.js";
import type { Ciphertext, CiphertextAlgebra, RequestId, RevealContext, RevealResponse } from "./types.js";

export interface PendingReveal {
  requestId: RequestId;
  context: RevealContext;
  ciphertexts: Ciphertext[];
}

/**
 * In-process stand-in for an FHE coprocessor. Plaintexts sit behind
 * random handles; nothing outside this class (and the paired oracle) can
 * read them. Used by tests and the simulation script.
 */
export class SimulatedFheBackend implements CiphertextAlgebra {
  private readonly plaintexts = new Map<string, bigint>();
  private readonly pending = new Map<RequestId, PendingReveal>();
  private requestCounter = 0;

  encrypt(value: bigint): Ciphertext {
    if (value < 0n || value > U64_MAX) {
      throw new ValidationError(`Value out of u64 range: ${value}`);
    }
    return this.store(value);
  }

  add(a: Ciphertext, b: Ciphertext): Ciphertext {
    return this.store((this.read(a) + this.read(b)) & U64_MAX);
  }

  mul(a: Ciphertext, scalar: bigint): Ciphertext {
    if (scalar < 0n || scalar > U64_MAX) {
      throw new ValidationError(`Scalar out of u64 range: ${scalar}`);
    }
    return this.store((this.read(a) * scalar) & U64_MAX);
  }

  requestReveal(ciphertexts: readonly Ciphertext[], context: RevealContext): RequestId {
    for (const ct of ciphertexts) this.read(ct);
    this.requestCounter++;
    const requestId = `reveal-${this.requestCounter}`;
    this.pending.set(requestId, { requestId, context, ciphertexts: [...ciphertexts] });
    return requestId;
  }

  /** Harness-only decryption. */
  decrypt(ct: Ciphertext): bigint {
    return this.read(ct);
  }

  getPendingRequests(): PendingReveal[] {
    return Array.from(this.pending.values());
  }

  takePendingRequest(requestId: RequestId): PendingReveal | undefined {
    const request = this.pending.get(requestId);
    this.pending.delete(requestId);
    return request;
  }

  private store(value: bigint): Ciphertext {
    const handle = uuidv4();
    this.plaintexts.set(handle, value);
    return { type: "euint64", handle };
  }

  private read(ct: Ciphertext): bigint {
    const value = this.plaintexts.get(ct.handle);
    if (value === undefined) {
      throw new ValidationError(`Unknown ciphertext handle: ${ct.handle}`);
    }
    return value;
  }
}

/**
 * Decryption oracle paired with a SimulatedFheBackend. It answers queued
 * requests with the decrypted values and an Ed25519 signature.
 */
export class SimulatedRevealOracle {
  constructor(
    private readonly backend: SimulatedFheBackend,
    private readonly signer: Keypair
  ) {}

  get publicKey(): PublicKeyLike {
    return this.signer.publicKey.toBase58();
  }

  respond(requestId: RequestId): RevealResponse {
    const request = this.backend.takePendingRequest(requestId);
    if (!request) {
      throw new Error(`No pending reveal request ${requestId}`);
    }
    const cleartexts = encodeU64Values(request.ciphertexts.map((ct) => this.backend.decrypt(ct)));
    return {
      requestId,
      context: request.context,
      cleartexts,
      proof: signReveal(this.signer, requestId, request.context, cleartexts)
    };
  }
}
