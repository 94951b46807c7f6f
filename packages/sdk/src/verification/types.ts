/**
 * Verification Types
 *
 * The verifier is the only seam for changing what a seller has to prove.
 * Swap it for another signature scheme or a succinct-proof verifier without
 * touching the reservation lifecycle.
 */

/**
 * A predicate over `(publicKey, signature, message)`.
 *
 * Implementations must be deterministic and side-effect free, and must
 * answer `false` for malformed input rather than throw.
 */
export interface Verifier {
	/** Short scheme name, e.g. "schnorr" */
	readonly scheme: string;

	verify(
		publicKey: Uint8Array,
		signature: Uint8Array,
		message: Uint8Array,
	): boolean | Promise<boolean>;
}

export type VerifierScheme = "schnorr" | "ecdsa";
