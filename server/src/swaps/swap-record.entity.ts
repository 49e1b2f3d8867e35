import { Column, CreateDateColumn, Entity, Index, PrimaryColumn } from "typeorm";
import { balanceTransformer } from "../common/balance";

@Entity("swaps")
export class SwapRecord {
	@PrimaryColumn({ type: "integer" })
	id!: number;

	@Index()
	@Column({ type: "text" })
	initiator!: string;

	@Index()
	@Column({ type: "text" })
	counterparty!: string;

	@Column({ type: "text", transformer: balanceTransformer })
	initiatorAsset!: bigint;

	@Column({ type: "text", transformer: balanceTransformer })
	counterpartyAsset!: bigint;

	@CreateDateColumn()
	createdAt!: Date;
}
