export type ItemId = string;

export const CHALLENGE_ISSUED_ID = "escrow.challenge.issued";
export type ChallengeIssuedEvent = {
	eventId: string;
	itemId: ItemId;
	buyerAddress: string;
	challengeHex: string;
	issuedAt: string; // ISO timestamp
};

export const CHALLENGE_WITHDRAWN_ID = "escrow.challenge.withdrawn";
export type ChallengeWithdrawnEvent = {
	eventId: string;
	itemId: ItemId;
	buyerAddress: string;
	withdrawnAt: string; // ISO timestamp
};

export const RESERVATION_RESOLVED_ID = "escrow.reservation.resolved";
export type ReservationResolvedEvent = {
	eventId: string;
	itemId: ItemId;
	outcome: "settled" | "refunded";
	buyerAddress: string;
	amount: number;
	resolvedAt: string; // ISO timestamp
};
