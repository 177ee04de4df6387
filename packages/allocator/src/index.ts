/**
 * @ballast/allocator — Cross-strategy capital allocator.
 *
 * Lends crate capital to registered strategies under per-strategy debt
 * ceilings, recalls it with slippage floors or unconditionally on panic,
 * and reports every debt change as an allocator boundary event.
 *
 * @packageDocumentation
 */

export { Allocator, ALLOCATOR_STREAM } from "./allocator.js";

export type {
  StrategyEntryPoint,
  Strategy,
  StrategyMapEntry,
  AllocatorOptions,
  LiquidationResult,
  AllocatorErrorCode,
} from "./types.js";
export { AllocatorError } from "./types.js";
