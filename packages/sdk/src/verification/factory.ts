import { EcdsaVerifier } from "./ecdsa-verifier.js";
import { SchnorrVerifier } from "./schnorr-verifier.js";
import { Verifier, VerifierScheme } from "./types.js";

export const VERIFIER_SCHEMES: readonly VerifierScheme[] = ["schnorr", "ecdsa"];

export function isVerifierScheme(value: string): value is VerifierScheme {
	return (VERIFIER_SCHEMES as readonly string[]).includes(value);
}

/**
 * Create a verifier by scheme name.
 */
export function createVerifier(scheme: VerifierScheme): Verifier {
	switch (scheme) {
		case "schnorr":
			return new SchnorrVerifier();
		case "ecdsa":
			return new EcdsaVerifier();
		default: {
			const unknown: never = scheme;
			throw new Error(`Unknown verifier scheme: ${String(unknown)}`);
		}
	}
}
