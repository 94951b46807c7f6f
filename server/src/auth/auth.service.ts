import {
	BadRequestException,
	Injectable,
	InternalServerErrorException,
	Logger,
	UnauthorizedException,
} from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import { InjectRepository } from "@nestjs/typeorm";
import { hexToBytes } from "@challenge-escrow/sdk";
import { schnorr } from "@noble/secp256k1";
import type { Repository } from "typeorm";
import {
	ChallengePayload,
	createSignupChallenge,
	hashSignupPayload,
} from "../crypto/challenge";
import { UnitOfWork } from "../common/unit-of-work";
import { User } from "../users/user.entity";

const CHALLENGE_TTL_MS = 5 * 60 * 1000; // 5 minutes

type JwtClaims = { sub: string; exp?: number };

@Injectable()
export class AuthService {
	private readonly logger = new Logger(AuthService.name);

	constructor(
		@InjectRepository(User) private readonly users: Repository<User>,
		private readonly jwt: JwtService,
		private readonly uow: UnitOfWork,
	) {}

	async createSignupChallenge(publicKey: string, origin: string) {
		const now = new Date();
		const { id, payload, hashHex } = createSignupChallenge(origin);
		const expiresAt = new Date(now.getTime() + CHALLENGE_TTL_MS);

		await this.save(async (users) => {
			const user =
				(await users.findOne({ where: { publicKey } })) ??
				users.create({ publicKey });
			user.pendingChallenge = JSON.stringify(payload);
			user.challengeId = id;
			user.challengeExpiresAt = expiresAt;
			return users.save(user);
		});

		return {
			challenge: payload,
			challengeId: id,
			hashToSignHex: hashHex,
			expiresAt: expiresAt.toISOString(),
		};
	}

	async verifySignup(
		publicKey: string,
		signatureHex: string,
		challengeId: string,
		origin: string,
	) {
		const user = await this.users.findOne({ where: { publicKey } });
		if (!user || !user.pendingChallenge || !user.challengeId) {
			throw new UnauthorizedException("No pending challenge");
		}
		if (user.challengeId !== challengeId) {
			throw new UnauthorizedException("Challenge mismatch");
		}
		if (!user.challengeExpiresAt || user.challengeExpiresAt < new Date()) {
			throw new UnauthorizedException("Challenge expired");
		}

		let payload: ChallengePayload | undefined;
		try {
			payload = JSON.parse(user.pendingChallenge);
		} catch (cause) {
			throw new InternalServerErrorException("Corrupted challenge", { cause });
		}
		if (payload?.origin !== origin || payload?.scope !== "signup") {
			throw new UnauthorizedException("Invalid challenge scope or origin");
		}

		const hashHex = hashSignupPayload(payload);
		let ok = false;
		try {
			ok = await schnorr.verify(
				hexToBytes(signatureHex),
				hexToBytes(hashHex),
				hexToBytes(publicKey),
			);
		} catch (cause) {
			throw new BadRequestException("Invalid signature input", { cause });
		}
		if (!ok) {
			throw new UnauthorizedException("Invalid signature");
		}

		const saved = await this.save(async (users) => {
			user.pendingChallenge = null;
			user.challengeId = null;
			user.challengeExpiresAt = null;
			user.lastLoginAt = new Date();
			return users.save(user);
		});
		this.logger.debug("User logged in", { publicKey });

		const accessToken = await this.jwt.signAsync({ sub: saved.id });
		const { exp } = this.jwt.decode<JwtClaims>(accessToken);
		return {
			accessToken,
			expiresAt: exp ? exp * 1000 : 0,
			userId: saved.id,
			publicKey: saved.publicKey,
		};
	}

	/**
	 * Resolve the user behind a bearer token.
	 */
	async getSession(token: string): Promise<User> {
		let claims: JwtClaims;
		try {
			claims = await this.jwt.verifyAsync<JwtClaims>(token);
		} catch (e) {
			this.logger.debug("Invalid token", e);
			throw new UnauthorizedException("Invalid token");
		}
		const user = await this.users.findOne({ where: { id: claims.sub } });
		if (!user) {
			throw new UnauthorizedException("Session not found");
		}
		return user;
	}

	private async save(
		work: (users: Repository<User>) => Promise<User>,
	): Promise<User> {
		try {
			return await this.uow.run((manager) => work(manager.getRepository(User)));
		} catch (e) {
			this.logger.error("Failed to save user", e);
			throw new InternalServerErrorException("Failed to save user");
		}
	}
}
