import { Global, Module } from "@nestjs/common";
import { ServerSentEventsService } from "./server-sent-events.service";
import { UnitOfWork } from "./unit-of-work";

@Global()
@Module({
	providers: [UnitOfWork, ServerSentEventsService],
	exports: [UnitOfWork, ServerSentEventsService],
})
export class CommonModule {}
