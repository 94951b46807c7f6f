import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import { createVerifier, isVerifierScheme } from "@challenge-escrow/sdk";
import { AuthModule } from "../auth/auth.module";
import { EscrowController } from "./escrow.controller";
import { EscrowEventRecord } from "./escrow-event.entity";
import { EscrowSlot } from "./escrow-slot.entity";
import { ESCROW_VERIFIER, EscrowService } from "./escrow.service";
import { Item } from "./item.entity";
import { PurchaseRight } from "./purchase-right.entity";

@Module({
	imports: [
		TypeOrmModule.forFeature([Item, PurchaseRight, EscrowSlot, EscrowEventRecord]),
		AuthModule,
	],
	providers: [
		EscrowService,
		{
			provide: ESCROW_VERIFIER,
			inject: [ConfigService],
			useFactory: (config: ConfigService) => {
				const scheme = config.get<string>("ESCROW_VERIFIER") ?? "schnorr";
				if (!isVerifierScheme(scheme)) {
					throw new Error(`Unsupported ESCROW_VERIFIER: ${scheme}`);
				}
				return createVerifier(scheme);
			},
		},
	],
	controllers: [EscrowController],
	exports: [EscrowService],
})
export class EscrowModule {}
