/**
 * @ballast/event-store — Vault and Allocator boundary events.
 *
 * Naming convention: `<source>.<entity>.<action>`
 * Examples:
 * - vault.shares.deposited
 * - vault.request.redeem-requested
 * - allocator.strategy.panic-set
 *
 * Amounts are base-10 strings, addresses are hex strings.
 */

import { z } from "zod";
import { isDecimalString, isNonZeroAddress } from "@ballast/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Event Type Constants
// =============================================================================

export const BALLAST_EVENTS = {
  // Vault: shares
  DEPOSIT: "vault.shares.deposited",
  WITHDRAW: "vault.shares.withdrawn",
  SHARE_PRICE_UPDATED: "vault.share-price.updated",

  // Vault: requests
  DEPOSIT_REQUEST: "vault.request.deposit-requested",
  REDEEM_REQUEST: "vault.request.redeem-requested",
  DEPOSIT_REQUEST_CANCELED: "vault.request.deposit-canceled",
  REDEEM_REQUEST_CANCELED: "vault.request.redeem-canceled",
  REQUESTS_SETTLED: "vault.request.settled",
  REQUEST_CLAIMED: "vault.request.claimed",

  // Vault: fees and limits
  FEES_COLLECTED: "vault.fees.collected",
  FEES_UPDATED: "vault.fees.updated",
  MAX_TOTAL_ASSETS_SET: "vault.limits.max-total-assets-set",
  MIN_LIQUIDITY_SET: "vault.limits.min-liquidity-set",

  // Vault: allocation
  INPUTS_UPDATED: "vault.allocation.inputs-updated",
  INVEST: "vault.allocation.invested",
  LIQUIDATE: "vault.allocation.liquidated",
  HARVEST: "vault.allocation.harvested",
  ASSET_UPDATED: "vault.asset.updated",

  // Vault: rescue
  RESCUE_REQUESTED: "vault.rescue.requested",
  RESCUED: "vault.rescue.executed",

  // Allocator
  STRATEGY_ADDED: "allocator.strategy.added",
  MAX_DEPOSIT_UPDATED: "allocator.strategy.max-deposit-updated",
  PANIC_SET: "allocator.strategy.panic-set",
  DEPOSIT_IN_STRATEGY: "allocator.strategy.deposited",
  STRATEGY_WITHDRAW: "allocator.strategy.withdrawn",
  STRAT_POSITION_UPDATED: "allocator.strategy.position-updated",
  STRATEGY_UPDATE: "allocator.strategy.debt-reported",
  LOSSES: "allocator.strategy.losses",
  PANIC_LIQUIDATE: "allocator.strategy.panic-liquidated",
  STRATEGY_RETIRED: "allocator.strategy.retired",
  CHAIN_DEBT_UPDATE: "allocator.debt.updated",
  CRATE_FUNDED: "allocator.crate.funded",
} as const;

export type BallastEventType = (typeof BALLAST_EVENTS)[keyof typeof BALLAST_EVENTS];

// =============================================================================
// Payload Schemas
// =============================================================================

const amount = z.string().refine(isDecimalString, { message: "Expected a base-10 amount" });
const address = z.string().refine(isNonZeroAddress, { message: "Expected a non-zero address" });
const bps = z.number().int().min(0).max(10_000);

const shareMovement = z.object({
  caller: address,
  receiver: address,
  owner: address,
  assets: amount,
  shares: amount,
  fee: amount,
  sharePrice: amount,
});

const requestOpened = z.object({
  requestId: z.string().min(1),
  operator: address,
  owner: address,
  receiver: address,
  amount,
  sharePrice: amount,
});

const requestCanceled = z.object({
  requestId: z.string().min(1),
  operator: address,
  amount,
});

export const PAYLOAD_SCHEMAS = {
  [BALLAST_EVENTS.DEPOSIT]: shareMovement,
  [BALLAST_EVENTS.WITHDRAW]: shareMovement,
  [BALLAST_EVENTS.SHARE_PRICE_UPDATED]: z.object({
    sharePrice: amount,
    totalSupply: amount,
    totalAssets: amount,
  }),
  [BALLAST_EVENTS.DEPOSIT_REQUEST]: requestOpened,
  [BALLAST_EVENTS.REDEEM_REQUEST]: requestOpened,
  [BALLAST_EVENTS.DEPOSIT_REQUEST_CANCELED]: requestCanceled,
  [BALLAST_EVENTS.REDEEM_REQUEST_CANCELED]: requestCanceled,
  [BALLAST_EVENTS.REQUESTS_SETTLED]: z.object({
    deposits: z.number().int().nonnegative(),
    redemptions: z.number().int().nonnegative(),
    mintedShares: amount,
    burnedShares: amount,
    lockedAssets: amount,
  }),
  [BALLAST_EVENTS.REQUEST_CLAIMED]: z.object({
    requestId: z.string().min(1),
    kind: z.enum(["deposit", "redeem"]),
    operator: address,
    receiver: address,
    amount,
  }),
  [BALLAST_EVENTS.FEES_COLLECTED]: z.object({
    feeCollector: address,
    perfFees: amount,
    mgmtFees: amount,
    sharesMinted: amount,
    assetFeesClaimed: amount,
    sharePrice: amount,
  }),
  [BALLAST_EVENTS.FEES_UPDATED]: z.object({ perf: bps, mgmt: bps, entry: bps, exit: bps }),
  [BALLAST_EVENTS.MAX_TOTAL_ASSETS_SET]: z.object({ maxTotalAssets: amount }),
  [BALLAST_EVENTS.MIN_LIQUIDITY_SET]: z.object({ minLiquidity: amount }),
  [BALLAST_EVENTS.INPUTS_UPDATED]: z.object({
    tokens: z.array(address).max(8),
    weights: z.array(bps).max(8),
  }),
  [BALLAST_EVENTS.INVEST]: z.object({
    amounts: z.array(amount).max(8),
    totalInvested: amount,
  }),
  [BALLAST_EVENTS.LIQUIDATE]: z.object({
    amounts: z.array(amount).max(8),
    totalRecovered: amount,
    panic: z.boolean(),
  }),
  [BALLAST_EVENTS.HARVEST]: z.object({
    rewardTokens: z.array(address),
    assetsReceived: amount,
  }),
  [BALLAST_EVENTS.ASSET_UPDATED]: z.object({
    previousAsset: address,
    asset: address,
    sharePrice: amount,
  }),
  [BALLAST_EVENTS.RESCUE_REQUESTED]: z.object({
    token: address,
    unlocksAt: z.number().int().nonnegative(),
    expiresAt: z.number().int().nonnegative(),
  }),
  [BALLAST_EVENTS.RESCUED]: z.object({ token: address, receiver: address, amount }),

  [BALLAST_EVENTS.STRATEGY_ADDED]: z.object({
    strategy: address,
    name: z.string().min(1),
    maxDeposit: amount,
  }),
  [BALLAST_EVENTS.MAX_DEPOSIT_UPDATED]: z.object({
    strategy: address,
    previousMaxDeposit: amount,
    maxDeposit: amount,
  }),
  [BALLAST_EVENTS.PANIC_SET]: z.object({ strategy: address, panicked: z.boolean() }),
  [BALLAST_EVENTS.DEPOSIT_IN_STRATEGY]: z.object({
    strategy: address,
    amount,
    debtBefore: amount,
    debtAfter: amount,
  }),
  [BALLAST_EVENTS.STRATEGY_WITHDRAW]: z.object({
    strategy: address,
    amount,
    recovered: amount,
  }),
  [BALLAST_EVENTS.STRAT_POSITION_UPDATED]: z.object({
    strategy: address,
    debtBefore: amount,
    debtAfter: amount,
  }),
  [BALLAST_EVENTS.STRATEGY_UPDATE]: z.object({
    strategy: address,
    debtBefore: amount,
    debtAfter: amount,
  }),
  [BALLAST_EVENTS.LOSSES]: z.object({ strategy: address, loss: amount }),
  [BALLAST_EVENTS.PANIC_LIQUIDATE]: z.object({
    strategy: address,
    debt: amount,
    recovered: amount,
  }),
  [BALLAST_EVENTS.STRATEGY_RETIRED]: z.object({ strategy: address }),
  [BALLAST_EVENTS.CHAIN_DEBT_UPDATE]: z.object({
    totalChainDebtBefore: amount,
    totalChainDebt: amount,
  }),
  [BALLAST_EVENTS.CRATE_FUNDED]: z.object({ amount, idle: amount }),
} satisfies Record<BallastEventType, z.ZodType>;

export type BallastPayload<T extends BallastEventType> = z.infer<(typeof PAYLOAD_SCHEMAS)[T]>;

const DESCRIPTIONS: Record<BallastEventType, string> = {
  [BALLAST_EVENTS.DEPOSIT]: "Assets entered the vault for newly minted shares",
  [BALLAST_EVENTS.WITHDRAW]: "Shares were burned for assets leaving the vault",
  [BALLAST_EVENTS.SHARE_PRICE_UPDATED]: "The share price after an accounting change",
  [BALLAST_EVENTS.DEPOSIT_REQUEST]: "An asynchronous deposit was requested",
  [BALLAST_EVENTS.REDEEM_REQUEST]: "An asynchronous redemption was requested",
  [BALLAST_EVENTS.DEPOSIT_REQUEST_CANCELED]: "A pending deposit request was canceled and refunded",
  [BALLAST_EVENTS.REDEEM_REQUEST_CANCELED]: "A pending redeem request was canceled and its shares returned",
  [BALLAST_EVENTS.REQUESTS_SETTLED]: "Pending requests became claimable",
  [BALLAST_EVENTS.REQUEST_CLAIMED]: "A claimable request was paid out",
  [BALLAST_EVENTS.FEES_COLLECTED]: "Accrued fees were paid to the fee collector",
  [BALLAST_EVENTS.FEES_UPDATED]: "The fee schedule changed",
  [BALLAST_EVENTS.MAX_TOTAL_ASSETS_SET]: "The deposit cap changed",
  [BALLAST_EVENTS.MIN_LIQUIDITY_SET]: "The seed liquidity floor changed",
  [BALLAST_EVENTS.INPUTS_UPDATED]: "The weighted input set was replaced",
  [BALLAST_EVENTS.INVEST]: "Idle assets were invested into inputs",
  [BALLAST_EVENTS.LIQUIDATE]: "Inputs were liquidated back into the asset",
  [BALLAST_EVENTS.HARVEST]: "Protocol rewards were claimed and converted",
  [BALLAST_EVENTS.ASSET_UPDATED]: "The vault's underlying asset was replaced",
  [BALLAST_EVENTS.RESCUE_REQUESTED]: "The manager asked to recover a stray token",
  [BALLAST_EVENTS.RESCUED]: "A stray token balance was sent to the manager",
  [BALLAST_EVENTS.STRATEGY_ADDED]: "A strategy was registered with the allocator",
  [BALLAST_EVENTS.MAX_DEPOSIT_UPDATED]: "A strategy's debt ceiling changed",
  [BALLAST_EVENTS.PANIC_SET]: "A strategy's panic flag changed",
  [BALLAST_EVENTS.DEPOSIT_IN_STRATEGY]: "Crate capital was dispatched to a strategy",
  [BALLAST_EVENTS.STRATEGY_WITHDRAW]: "Capital was recalled from a strategy",
  [BALLAST_EVENTS.STRAT_POSITION_UPDATED]: "A strategy's debt changed after a recall",
  [BALLAST_EVENTS.STRATEGY_UPDATE]: "A strategy reported its own debt",
  [BALLAST_EVENTS.LOSSES]: "A recall returned less than the amount requested",
  [BALLAST_EVENTS.PANIC_LIQUIDATE]: "A strategy was unconditionally liquidated",
  [BALLAST_EVENTS.STRATEGY_RETIRED]: "A strategy with no debt left the active set",
  [BALLAST_EVENTS.CHAIN_DEBT_UPDATE]: "Total debt across strategies changed",
  [BALLAST_EVENTS.CRATE_FUNDED]: "Idle capital was added to the crate",
};

function sourceOf(type: BallastEventType): EventSchema["source"] {
  return type.startsWith("allocator.") ? "allocator" : "vault";
}

/**
 * Catalog with every vault and allocator boundary event registered.
 */
export function createBallastCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const type of Object.values(BALLAST_EVENTS)) {
    catalog.register({
      type,
      version: 1,
      description: DESCRIPTIONS[type],
      source: sourceOf(type),
      payload: PAYLOAD_SCHEMAS[type],
    });
  }
  return catalog;
}
