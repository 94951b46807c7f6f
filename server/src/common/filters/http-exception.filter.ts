import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import { isEscrowError } from "@challenge-escrow/sdk";
import type { Request, Response } from "express";
import { ESCROW_ERROR_STATUS, toError } from "../errors";

export type ErrorBody = {
	statusCode: number;
	error: string;
	message: string | string[];
	path: string;
	timestamp: string;
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const ctx = host.switchToHttp();
		const req = ctx.getRequest<Request>();
		const res = ctx.getResponse<Response>();

		const { statusCode, error, message } = this.describe(exception);
		if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
			const err = toError(exception);
			this.logger.error(`${req.method} ${req.originalUrl}`, err.stack);
		}

		const body: ErrorBody = {
			statusCode,
			error,
			message,
			path: req.originalUrl,
			timestamp: new Date().toISOString(),
		};
		res.status(statusCode).json(body);
	}

	private describe(
		exception: unknown,
	): Pick<ErrorBody, "statusCode" | "error" | "message"> {
		if (isEscrowError(exception)) {
			return {
				statusCode: ESCROW_ERROR_STATUS[exception.code],
				error: exception.code,
				message: exception.message,
			};
		}
		if (exception instanceof HttpException) {
			const response = exception.getResponse();
			const message =
				typeof response === "object" && "message" in response
					? messageOf(response.message)
					: exception.message;
			return {
				statusCode: exception.getStatus(),
				error: exception.name,
				message,
			};
		}
		return {
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			error: "InternalServerError",
			message: "Internal server error",
		};
	}
}

function messageOf(value: unknown): string | string[] {
	if (typeof value === "string") return value;
	if (Array.isArray(value)) return value.map(String);
	return String(value);
}
