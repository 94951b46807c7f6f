import { ApiProperty, getSchemaPath } from "@nestjs/swagger";
import type { Type } from "@nestjs/common";

export type ApiEnvelope<T> = {
	data: T;
};

export class ApiEnvelopeShellDto<T = unknown> {
	@ApiProperty({ description: "Response payload" })
	data!: T;
}

export function envelope<T>(data: T): ApiEnvelope<T> {
	return { data };
}

export function getSchemaPathForDto(dto: Type<unknown>) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				properties: {
					data: { $ref: getSchemaPath(dto) },
				},
			},
		],
	};
}

export function getSchemaPathForListDto(dto: Type<unknown>) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				properties: {
					data: { type: "array", items: { $ref: getSchemaPath(dto) } },
				},
			},
		],
	};
}
