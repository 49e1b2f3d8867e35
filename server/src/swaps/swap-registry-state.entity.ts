import { Column, Entity, PrimaryColumn } from "typeorm";

export const SWAP_REGISTRY_STATE_ID = 1;

/**
 * Single-row table holding the id counter, so ids of deleted swaps are
 * never handed out again.
 */
@Entity("swap_registry")
export class SwapRegistryState {
	@PrimaryColumn({ type: "integer" })
	id!: number;

	@Column({ type: "integer" })
	nextId!: number;
}
