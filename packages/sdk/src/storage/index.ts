/**
 * Storage module - Pluggable swap registries
 *
 * This module defines the registry interface and provides a reference
 * implementation. Hosts bring their own persistence layer by implementing
 * SwapRegistry.
 */

// Types
export type {
	SwapRegistry,
	SettlingSwapRegistry,
	RegistryErrorCode,
} from "./types.js";

export { RegistryError, isSettlingRegistry } from "./types.js";

// Reference implementations
export {
	MemorySwapRegistry,
	type MemorySwapRegistryOptions,
} from "./memory-registry.js";
