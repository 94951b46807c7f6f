/**
 * Memory module - Reference collaborators
 *
 * In-process implementations of the ledger, payment and event interfaces,
 * for tests and for hosts that keep protocol state in memory.
 */

export { MemoryListingLedger } from "./memory-listing-ledger.js";
export { MemoryPaymentTransfer } from "./memory-payment-transfer.js";
export { MemoryEventLog } from "./memory-event-log.js";
