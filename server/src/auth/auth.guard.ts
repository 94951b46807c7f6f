import {
	CanActivate,
	ExecutionContext,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import type { Request } from "express";
import { AuthService } from "./auth.service";
import type { User } from "../users/user.entity";

export type AuthenticatedRequest = Request & { user?: User };

@Injectable()
export class AuthGuard implements CanActivate {
	constructor(private readonly auth: AuthService) {}

	async canActivate(context: ExecutionContext): Promise<boolean> {
		const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
		const [scheme, token] = (req.headers.authorization ?? "").split(" ");
		if (scheme !== "Bearer" || !token) {
			throw new UnauthorizedException("Missing bearer token");
		}
		req.user = await this.auth.getSession(token);
		return true;
	}
}
