import { sha256 } from "@noble/hashes/sha256";

/**
 * Digest a seller signs to answer a challenge: sha256 over the raw
 * challenge bytes.
 */
export function challengeDigest(challenge: Uint8Array): Uint8Array {
	return sha256(challenge);
}
