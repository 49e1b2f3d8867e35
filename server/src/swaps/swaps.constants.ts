export const SWAP_REGISTRY = "SWAP_REGISTRY";
export const SWAP_LEDGER = "SWAP_LEDGER";
