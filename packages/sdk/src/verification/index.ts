/**
 * Verification module - Pluggable challenge verifiers
 */

export type { Verifier, VerifierScheme } from "./types.js";

export { challengeDigest } from "./digest.js";
export { SchnorrVerifier } from "./schnorr-verifier.js";
export { EcdsaVerifier } from "./ecdsa-verifier.js";
export {
	VERIFIER_SCHEMES,
	isVerifierScheme,
	createVerifier,
} from "./factory.js";
