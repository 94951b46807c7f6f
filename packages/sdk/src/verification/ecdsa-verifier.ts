/**
 * ECDSA verifier over secp256k1.
 */

import * as secp from "@noble/secp256k1";
import { challengeDigest } from "./digest.js";
import { Verifier } from "./types.js";

/**
 * Verifies a compact (64-byte) or DER ECDSA signature over
 * `sha256(message)` against a compressed or uncompressed public key.
 */
export class EcdsaVerifier implements Verifier {
	readonly scheme = "ecdsa";

	verify(
		publicKey: Uint8Array,
		signature: Uint8Array,
		message: Uint8Array,
	): boolean {
		if (publicKey.length !== 33 && publicKey.length !== 65) return false;
		try {
			return secp.verify(signature, challengeDigest(message), publicKey);
		} catch {
			return false;
		}
	}
}
