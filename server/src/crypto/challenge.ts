import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import { nanoid } from "nanoid";

export type ChallengePayload = {
	scope: "signup";
	origin: string;
	nonce: string;
	issuedAt: string; // ISO timestamp
};

/**
 * Hash a signup payload with sorted keys, so the signed bytes do not
 * depend on how the payload was serialized when stored.
 */
export function hashSignupPayload(payload: ChallengePayload): string {
	const canonical = JSON.stringify({
		issuedAt: payload.issuedAt,
		nonce: payload.nonce,
		origin: payload.origin,
		scope: payload.scope,
	});
	return bytesToHex(sha256(utf8ToBytes(canonical)));
}

export function createSignupChallenge(origin: string) {
	const payload: ChallengePayload = {
		scope: "signup",
		origin,
		nonce: nanoid(32),
		issuedAt: new Date().toISOString(),
	};
	return {
		id: nanoid(16),
		payload,
		hashHex: hashSignupPayload(payload),
	};
}
