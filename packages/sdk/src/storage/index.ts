/**
 * Storage module - Pluggable escrow slot stores
 *
 * This module defines the slot store interface and provides a reference
 * implementation. Developers bring their own persistence layer by
 * implementing SlotStore.
 */

// Types
export type { StoredSlot, SlotStore } from "./types.js";

// Reference implementations
export { MemorySlotStore } from "./memory-adapter.js";
