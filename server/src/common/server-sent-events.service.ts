import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Subject } from "rxjs";
import {
	CHALLENGE_ISSUED_ID,
	CHALLENGE_WITHDRAWN_ID,
	RESERVATION_RESOLVED_ID,
	type ChallengeIssuedEvent,
	type ChallengeWithdrawnEvent,
	type ReservationResolvedEvent,
} from "./escrow.event";

export type EscrowSse =
	| { type: "challenge_issued"; itemId: string; challengeHex: string }
	| { type: "challenge_withdrawn"; itemId: string }
	| {
			type: "reservation_resolved";
			itemId: string;
			outcome: "settled" | "refunded";
	  };

export type SseEvent<T = EscrowSse> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<EscrowSse>();

	itemEvents(itemId?: string) {
		if (itemId) {
			return this.events$.pipe(filter((e) => e.itemId === itemId));
		}
		return this.events$.asObservable();
	}

	@OnEvent(CHALLENGE_ISSUED_ID)
	onChallengeIssued(evt: ChallengeIssuedEvent) {
		this.events$.next({
			type: "challenge_issued",
			itemId: evt.itemId,
			challengeHex: evt.challengeHex,
		});
	}

	@OnEvent(CHALLENGE_WITHDRAWN_ID)
	onChallengeWithdrawn(evt: ChallengeWithdrawnEvent) {
		this.events$.next({ type: "challenge_withdrawn", itemId: evt.itemId });
	}

	@OnEvent(RESERVATION_RESOLVED_ID)
	onReservationResolved(evt: ReservationResolvedEvent) {
		this.events$.next({
			type: "reservation_resolved",
			itemId: evt.itemId,
			outcome: evt.outcome,
		});
	}
}
