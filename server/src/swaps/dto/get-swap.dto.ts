import { ApiProperty } from "@nestjs/swagger";

export class GetSwapDto {
	@ApiProperty({ example: 0 })
	swapId!: number;

	@ApiProperty({ example: "alice" })
	initiator!: string;

	@ApiProperty({ example: "bob" })
	counterparty!: string;

	@ApiProperty({ example: "100", description: "Escrowed deposit" })
	initiatorAsset!: string;

	@ApiProperty({ example: "50", description: "Amount requested in return" })
	counterpartyAsset!: string;
}
