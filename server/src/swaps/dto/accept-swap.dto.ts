import { ApiProperty } from "@nestjs/swagger";
import { IsNumberString } from "class-validator";

export class AcceptSwapInDto {
	@ApiProperty({
		example: "50",
		description:
			"Amount attached by the caller, must equal the swap's counterpartyAsset",
	})
	@IsNumberString({ no_symbols: true })
	deposit!: string;
}
