import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsNumberString, IsString } from "class-validator";

export class InitiateSwapInDto {
	@ApiProperty({
		example: "bob",
		description: "Account allowed to accept the swap",
	})
	@IsString()
	@IsNotEmpty()
	counterparty!: string;

	@ApiProperty({
		example: "50",
		description: "Amount the counterparty must attach, as a decimal string",
	})
	@IsNumberString({ no_symbols: true })
	counterpartyAsset!: string;

	@ApiProperty({
		example: "100",
		description: "Amount escrowed from the caller, as a decimal string",
	})
	@IsNumberString({ no_symbols: true })
	deposit!: string;
}

export class InitiateSwapOutDto {
	@ApiProperty({ example: 0 })
	swapId!: number;
}
