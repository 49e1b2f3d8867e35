/**
 * Ledger module - Balance transfer adapters
 */

// Types
export type {
	Transfer,
	Ledger,
	TransactionalLedger,
	TransferHook,
	LedgerErrorCode,
} from "./types.js";

export { LedgerError, isTransactionalLedger } from "./types.js";

// Reference implementations
export { MemoryLedger } from "./memory-ledger.js";
