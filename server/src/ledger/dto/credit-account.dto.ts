import { ApiProperty } from "@nestjs/swagger";
import { IsNumberString } from "class-validator";

export class CreditAccountInDto {
	@ApiProperty({
		example: "100",
		description: "Amount to mint, as a non-negative decimal string",
	})
	@IsNumberString({ no_symbols: true })
	amount!: string;
}
