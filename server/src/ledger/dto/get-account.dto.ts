import { ApiProperty } from "@nestjs/swagger";

export class GetAccountDto {
	@ApiProperty({ example: "alice" })
	accountId!: string;

	@ApiProperty({
		example: "100",
		description: "Balance as a decimal string",
	})
	balance!: string;
}
