export { U64_MAX } from "./types.js";
export type {
  Ciphertext,
  CiphertextAlgebra,
  RequestId,
  RevealContext,
  RevealResponse,
  RevealVerifier
} from "./types.js";
export {
  REVEAL_DOMAIN,
  Ed25519RevealVerifier,
  decodeU64Values,
  encodeRevealContext,
  encodeRevealMessage,
  encodeU64Values,
  signReveal
} from "./proof.js";
export { SimulatedFheBackend, SimulatedRevealOracle } from "./simulated.js";
export type { PendingReveal } from "./simulated.js";
