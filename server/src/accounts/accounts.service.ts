import { ForbiddenException, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { InjectRepository } from "@nestjs/typeorm";
import type { Repository } from "typeorm";
import { UnitOfWork } from "../common/unit-of-work";
import { Account } from "./account.entity";
import { GetAccountDto } from "./dto/account.dto";
import { TypeOrmPaymentTransfer } from "./typeorm-payment-transfer";

@Injectable()
export class AccountsService {
	private readonly logger = new Logger(AccountsService.name);

	constructor(
		@InjectRepository(Account) private readonly accounts: Repository<Account>,
		private readonly uow: UnitOfWork,
		private readonly config: ConfigService,
	) {}

	async get(address: string): Promise<GetAccountDto> {
		const account = await this.accounts.findOne({ where: { address } });
		return { address, balance: account?.balance ?? 0 };
	}

	/**
	 * Credit test funds. Only available when FAUCET_ENABLED is set.
	 */
	async faucet(address: string, amount: number): Promise<GetAccountDto> {
		if (!this.config.get<boolean>("FAUCET_ENABLED")) {
			throw new ForbiddenException("Faucet is disabled");
		}
		const balance = await this.uow.run((manager) =>
			new TypeOrmPaymentTransfer(manager).credit(address, amount),
		);
		this.logger.log(`Faucet credited ${amount} to ${address}`);
		return { address, balance };
	}
}
