/**
 * @ballast/allocation — Weighted capital allocation across protocol inputs.
 *
 * - AllocationEngine: previews, invest, liquidate, harvest
 * - Slot arena of eight inputs, single-token or paired AMM mode
 * - Collaborator contracts: ProtocolAdapter, Swapper, PriceOracle
 */

export { AllocationEngine } from "./allocation-engine.js";
export { SlotArena, validateInputs } from "./slots.js";
export type { ActiveSlot, Position, SinglePosition, PairedPosition } from "./slots.js";

export type {
  PriceOracle,
  RewardCapability,
  RewardClaim,
  ProtocolAdapter,
  PairedProtocolAdapter,
  AnyProtocolAdapter,
  Pair,
  SwapParams,
  SwapResult,
  Swapper,
  InputConfig,
  ActiveInput,
  Slot,
  AllocationMode,
  SlippagePolicy,
  AllocationEngineOptions,
  AllocationContext,
  SlotMovement,
  InvestResult,
  LiquidateResult,
  HarvestResult,
  AllocationSnapshot,
  AllocationErrorCode,
} from "./types.js";
export {
  AllocationError,
  MAX_INPUTS,
  DEFAULT_DUST_THRESHOLD,
  DEFAULT_MAX_SLIPPAGE_BPS,
} from "./types.js";
