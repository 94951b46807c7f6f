/**
 * Protocol module - Collaborator interfaces
 */

export type {
	ItemId,
	Address,
	TransferableItem,
	Payment,
	HeldFunds,
	PurchaseCapability,
	TransferReceipt,
	PurchaseOutcome,
	ListingLedger,
	PaymentTransfer,
	EventNotifier,
	ExclusiveLock,
} from "./types.js";
