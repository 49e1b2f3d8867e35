import { ApiProperty, getSchemaPath } from "@nestjs/swagger";

export type ApiEnvelope<T> = {
	data: T;
};

export const envelope = <T>(data: T): ApiEnvelope<T> => ({
	data,
});

/** Placeholder “envelope” shell; `data` is overridden per-endpoint in controller schemas. */
export class ApiEnvelopeShellDto<T> {
	@ApiProperty({
		description: "Payload for this endpoint (shape varies by route)",
	})
	data!: T;
}

export function getSchemaPathForDto(dto: Parameters<typeof getSchemaPath>[0]) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				type: "object",
				properties: {
					data: { $ref: getSchemaPath(dto) },
				},
				required: ["data"],
			},
		],
	};
}

export function getSchemaPathForEmptyResponse() {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				type: "object",
				properties: {
					data: { type: "object" },
				},
				required: ["data"],
			},
		],
	};
}
