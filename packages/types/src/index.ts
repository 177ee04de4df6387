/**
 * @ballast/types — Shared domain types for the Ballast packages.
 *
 * - Addresses (viem) and address helpers
 * - Domain event architecture
 * - Runtime guards for values crossing a storage or process boundary
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No state, no I/O
 */

export type { Address } from "./address.js";
export {
  ZERO_ADDRESS,
  isNonZeroAddress,
  normalizeAddress,
  sameAddress,
} from "./address.js";

export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

export {
  isRecord,
  isDecimalString,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";

export { ReentrancyGuard } from "./reentrancy.js";
