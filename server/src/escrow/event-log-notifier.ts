import { randomUUID } from "node:crypto";
import type { EntityManager, Repository } from "typeorm";
import {
	bytesToHex,
	CHALLENGE_ISSUED,
	EscrowEvent,
	EventNotifier,
} from "@challenge-escrow/sdk";
import { EscrowEventRecord } from "./escrow-event.entity";

/**
 * Appends protocol events to escrow_events inside the current transaction
 * and remembers them, so they can be broadcast once it commits.
 */
export class EventLogNotifier implements EventNotifier {
	private readonly records: Repository<EscrowEventRecord>;
	private readonly pending: EscrowEventRecord[] = [];

	constructor(manager: EntityManager) {
		this.records = manager.getRepository(EscrowEventRecord);
	}

	async publish(event: EscrowEvent): Promise<void> {
		const record = await this.records.save(
			this.records.create({
				eventId: randomUUID(),
				type: event.type,
				itemExternalId: event.itemId,
				buyerAddress: event.buyerAddress,
				challengeHex:
					event.type === CHALLENGE_ISSUED ? bytesToHex(event.challenge) : null,
			}),
		);
		this.pending.push(record);
	}

	published(): EscrowEventRecord[] {
		return [...this.pending];
	}
}
