/**
 * TypeORM Payment Transfer
 *
 * Implements the SDK's PaymentTransfer interface on account balances and
 * funds rows, inside the caller's transaction.
 */

import type { EntityManager, Repository } from "typeorm";
import {
	Address,
	EscrowError,
	HeldFunds,
	Payment,
	PaymentTransfer,
} from "@challenge-escrow/sdk";
import { nanoid } from "nanoid";
import { Account } from "./account.entity";
import { Funds, FundsStatus } from "./funds.entity";

/**
 * @example
 * ```typescript
 * await dataSource.transaction(async (manager) => {
 *   const payments = new TypeOrmPaymentTransfer(manager);
 *   const payment = await payments.draw(buyer, 100);
 *   const held = await payments.escrow(payment);
 * });
 * ```
 */
export class TypeOrmPaymentTransfer implements PaymentTransfer {
	private readonly accounts: Repository<Account>;
	private readonly funds: Repository<Funds>;

	constructor(manager: EntityManager) {
		this.accounts = manager.getRepository(Account);
		this.funds = manager.getRepository(Funds);
	}

	async balanceOf(address: Address): Promise<number> {
		const account = await this.accounts.findOne({ where: { address } });
		return account?.balance ?? 0;
	}

	async credit(address: Address, amount: number): Promise<number> {
		const account =
			(await this.accounts.findOne({ where: { address } })) ??
			this.accounts.create({ address, balance: 0 });
		account.balance += amount;
		await this.accounts.save(account);
		return account.balance;
	}

	/**
	 * Debit `amount` from `payer` into a spendable payment.
	 */
	async draw(payer: Address, amount: number): Promise<Payment> {
		if (!Number.isSafeInteger(amount) || amount <= 0) {
			throw new EscrowError(
				`Amount must be a positive integer, got ${amount}`,
				"INVALID_PAYMENT",
				{ amount },
			);
		}
		const balance = await this.balanceOf(payer);
		if (balance < amount) {
			throw new EscrowError(
				`Account ${payer} has ${balance}, needs ${amount}`,
				"INSUFFICIENT_FUNDS",
				{ payer, balance, amount },
			);
		}
		await this.credit(payer, -amount);
		const funds = await this.funds.save(
			this.funds.create({ id: nanoid(), owner: payer, amount, status: "drawn" }),
		);
		return { id: funds.id, payer, amount };
	}

	async escrow(payment: Payment): Promise<HeldFunds> {
		const funds = await this.spendable(payment);
		funds.status = "held";
		await this.funds.save(funds);
		return { id: funds.id, depositor: funds.owner, amount: funds.amount };
	}

	async release(held: HeldFunds, recipient: Address): Promise<void> {
		const funds = await this.held(held);
		funds.status = "spent";
		await this.funds.save(funds);
		await this.credit(recipient, funds.amount);
	}

	async forward(held: HeldFunds): Promise<Payment> {
		const funds = await this.held(held);
		funds.status = "drawn";
		await this.funds.save(funds);
		return { id: funds.id, payer: funds.owner, amount: funds.amount };
	}

	async deposit(payment: Payment, recipient: Address): Promise<void> {
		const funds = await this.spendable(payment);
		funds.status = "spent";
		await this.funds.save(funds);
		await this.credit(recipient, funds.amount);
	}

	private async spendable(payment: Payment): Promise<Funds> {
		const funds = await this.find(payment.id, "drawn");
		if (
			!funds ||
			funds.owner !== payment.payer ||
			funds.amount !== payment.amount
		) {
			throw new EscrowError(
				`Payment ${payment.id} is unknown or already spent`,
				"INVALID_PAYMENT",
				{ paymentId: payment.id },
			);
		}
		return funds;
	}

	private async held(held: HeldFunds): Promise<Funds> {
		const funds = await this.find(held.id, "held");
		if (!funds) {
			throw new EscrowError(
				`Held funds ${held.id} are unknown or already paid out`,
				"UNKNOWN_FUNDS",
				{ fundsId: held.id },
			);
		}
		return funds;
	}

	private find(id: string, status: FundsStatus): Promise<Funds | null> {
		return this.funds.findOne({ where: { id, status } });
	}
}
