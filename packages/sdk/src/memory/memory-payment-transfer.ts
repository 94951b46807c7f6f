/**
 * In-Memory Payment Transfer
 *
 * Account balances plus single-use payments drawn from them. Data is lost
 * when the process exits.
 */

import { nanoid } from "nanoid";
import { EscrowError } from "../contracts/types.js";
import {
	Address,
	HeldFunds,
	Payment,
	PaymentTransfer,
} from "../protocol/types.js";

/**
 * In-memory payment transfer.
 *
 * Funds live in one of three places: an account balance, a drawn payment
 * not yet spent, or held by the escrow. `supply()` sums all three and only
 * changes through `mint`.
 *
 * @example
 * ```typescript
 * const payments = new MemoryPaymentTransfer();
 * payments.mint(buyer, 1_000);
 *
 * const payment = payments.draw(buyer, 100);
 * const held = await payments.escrow(payment);
 * await payments.release(held, buyer);
 * ```
 */
export class MemoryPaymentTransfer implements PaymentTransfer {
	private balances: Map<Address, number> = new Map();
	private outstanding: Map<string, Payment> = new Map();
	private held: Map<string, HeldFunds> = new Map();

	/**
	 * Create funds out of thin air. For tests and faucets.
	 */
	mint(account: Address, amount: number): void {
		assertAmount(amount);
		this.credit(account, amount);
	}

	/**
	 * Debit `amount` from `payer` into a spendable payment.
	 *
	 * @throws EscrowError INSUFFICIENT_FUNDS
	 */
	draw(payer: Address, amount: number): Payment {
		assertAmount(amount);
		const balance = this.balanceOf(payer);
		if (balance < amount) {
			throw new EscrowError(
				`Account ${payer} has ${balance}, needs ${amount}`,
				"INSUFFICIENT_FUNDS",
				{ payer, balance, amount },
			);
		}
		this.balances.set(payer, balance - amount);
		return this.issue(payer, amount);
	}

	async escrow(payment: Payment): Promise<HeldFunds> {
		this.spend(payment);
		const funds: HeldFunds = {
			id: nanoid(),
			depositor: payment.payer,
			amount: payment.amount,
		};
		this.held.set(funds.id, funds);
		return { ...funds };
	}

	async release(held: HeldFunds, recipient: Address): Promise<void> {
		const funds = this.unhold(held);
		this.credit(recipient, funds.amount);
	}

	async forward(held: HeldFunds): Promise<Payment> {
		const funds = this.unhold(held);
		return this.issue(funds.depositor, funds.amount);
	}

	async deposit(payment: Payment, recipient: Address): Promise<void> {
		this.spend(payment);
		this.credit(recipient, payment.amount);
	}

	balanceOf(account: Address): number {
		return this.balances.get(account) ?? 0;
	}

	totalHeld(): number {
		return sum(this.held.values());
	}

	/**
	 * Balances, unspent payments and held funds together.
	 */
	supply(): number {
		return (
			sum(this.balances.values()) +
			sum(this.outstanding.values()) +
			this.totalHeld()
		);
	}

	private issue(payer: Address, amount: number): Payment {
		const payment: Payment = { id: nanoid(), payer, amount };
		this.outstanding.set(payment.id, payment);
		return { ...payment };
	}

	private spend(payment: Payment): void {
		const stored = this.outstanding.get(payment.id);
		if (
			!stored ||
			stored.payer !== payment.payer ||
			stored.amount !== payment.amount
		) {
			throw new EscrowError(
				`Payment ${payment.id} is unknown or already spent`,
				"INVALID_PAYMENT",
				{ paymentId: payment.id },
			);
		}
		this.outstanding.delete(payment.id);
	}

	private unhold(held: HeldFunds): HeldFunds {
		const funds = this.held.get(held.id);
		if (!funds) {
			throw new EscrowError(
				`Held funds ${held.id} are unknown or already paid out`,
				"UNKNOWN_FUNDS",
				{ fundsId: held.id },
			);
		}
		this.held.delete(held.id);
		return funds;
	}

	private credit(account: Address, amount: number): void {
		this.balances.set(account, this.balanceOf(account) + amount);
	}
}

function sum(values: Iterable<number | { amount: number }>): number {
	let total = 0;
	for (const value of values) {
		total += typeof value === "number" ? value : value.amount;
	}
	return total;
}

function assertAmount(amount: number): void {
	if (!Number.isSafeInteger(amount) || amount <= 0) {
		throw new EscrowError(
			`Amount must be a positive integer, got ${amount}`,
			"INVALID_PAYMENT",
			{ amount },
		);
	}
}
