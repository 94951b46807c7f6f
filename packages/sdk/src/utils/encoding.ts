/**
 * Encoding utilities for the SDK
 */

import { hex } from "@scure/base";

/**
 * Convert bytes to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
	return hex.encode(bytes);
}

/**
 * Convert hex string to bytes
 */
export function hexToBytes(hexString: string): Uint8Array {
	return hex.decode(hexString);
}

/**
 * Check if a string is non-empty, even-length hex
 */
export function isHex(value: string): boolean {
	return value.length > 0 && value.length % 2 === 0 && /^[0-9a-fA-F]+$/.test(value);
}

/**
 * Check if two byte arrays are equal
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) return false;
	}
	return true;
}
