import { Injectable } from "@nestjs/common";
import { KeyedMutex } from "@challenge-escrow/sdk";
import { DataSource, type EntityManager } from "typeorm";

// SQLite has a single writer; every write transaction queues on this key
const WRITER = "sqlite-writer";

/**
 * Runs work in one database transaction, one at a time.
 */
@Injectable()
export class UnitOfWork {
	private readonly mutex = new KeyedMutex();

	constructor(private readonly dataSource: DataSource) {}

	run<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
		return this.mutex.runExclusive(WRITER, () =>
			this.dataSource.transaction(work),
		);
	}
}
