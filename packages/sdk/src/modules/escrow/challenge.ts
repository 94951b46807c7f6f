import { randomBytes } from "@noble/hashes/utils";

/**
 * Generate a fresh random challenge for a purchase.
 *
 * Buyers should never reuse a challenge; the escrow rejects one that was
 * already spent on the same item.
 */
export function createChallenge(length = 32): Uint8Array {
	return randomBytes(length);
}
