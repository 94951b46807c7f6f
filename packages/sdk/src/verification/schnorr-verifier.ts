/**
 * BIP-340 Schnorr verifier over secp256k1.
 */

import { schnorr } from "@noble/secp256k1";
import { challengeDigest } from "./digest.js";
import { Verifier } from "./types.js";

/**
 * Verifies a 64-byte BIP-340 signature over `sha256(message)` against a
 * 32-byte x-only public key.
 *
 * @example
 * ```typescript
 * const verifier = new SchnorrVerifier();
 * const signature = await schnorr.sign(challengeDigest(challenge), secretKey);
 * await verifier.verify(schnorr.getPublicKey(secretKey), signature, challenge); // true
 * ```
 */
export class SchnorrVerifier implements Verifier {
	readonly scheme = "schnorr";

	async verify(
		publicKey: Uint8Array,
		signature: Uint8Array,
		message: Uint8Array,
	): Promise<boolean> {
		if (publicKey.length !== 32 || signature.length !== 64) return false;
		try {
			return await schnorr.verify(
				signature,
				challengeDigest(message),
				publicKey,
			);
		} catch {
			return false;
		}
	}
}
