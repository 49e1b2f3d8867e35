/**
 * Guard module - Reentrancy protection
 */

export { ReentrancyGuard, ReentrancyError } from "./reentrancy-guard.js";
