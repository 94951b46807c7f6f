import {
	createParamDecorator,
	ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { AuthenticatedRequest } from "./auth.guard";
import type { User } from "../users/user.entity";

/**
 * The user resolved by AuthGuard.
 */
export const UserFromJwt = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): User => {
		const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
		if (!req.user) {
			throw new UnauthorizedException("Not authenticated");
		}
		return req.user;
	},
);
