import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { AuthModule } from "../auth/auth.module";
import { Account } from "./account.entity";
import { AccountsController } from "./accounts.controller";
import { AccountsService } from "./accounts.service";
import { Funds } from "./funds.entity";

@Module({
	imports: [TypeOrmModule.forFeature([Account, Funds]), AuthModule],
	providers: [AccountsService],
	controllers: [AccountsController],
	exports: [AccountsService],
})
export class AccountsModule {}
