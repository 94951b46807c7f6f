/**
 * Utility functions for the SDK
 */

export { bytesToHex, hexToBytes, isHex, bytesEqual } from "./encoding.js";

export { KeyedMutex } from "./keyed-mutex.js";
