import {
	Column,
	CreateDateColumn,
	Entity,
	PrimaryColumn,
	UpdateDateColumn,
} from "typeorm";
import { balanceTransformer } from "../common/balance";

@Entity("accounts")
export class Account {
	@PrimaryColumn({ type: "text" })
	id!: string;

	@Column({ type: "text", transformer: balanceTransformer })
	balance!: bigint;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
