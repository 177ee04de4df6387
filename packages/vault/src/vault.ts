/**
 * Vault — Top-level coordinator of a yield vault.
 *
 * Composes:
 * - ShareLedger + FeeAccrualEngine (share accounting, fees)
 * - RequestQueue (asynchronous deposit / redeem requests)
 * - AllocationEngine (weighted investment across protocol inputs)
 *
 * Every state-changing operation is one transaction: it runs under a
 * reentrancy guard, buffers the events it raises and appends them to the
 * "vault" stream on commit. A failure restores all four subsystems and
 * custody to their state before the call and publishes nothing.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Address } from "@ballast/types";
import { ReentrancyGuard, ZERO_ADDRESS, sameAddress } from "@ballast/types";
import {
  FeeAccrualEngine,
  InMemoryCustody,
  ShareLedger,
  applyBps,
  sumBigInt,
} from "@ballast/ledger";
import type {
  Custody,
  FeeCollection,
  FeePreview,
  FeeSchedule,
  ShareMovement,
  Valuation,
  VaultState,
} from "@ballast/ledger";
import { RequestQueue } from "@ballast/requests";
import type { AdmissionContext, Erc7540Request, RequestKind, SettlementResult } from "@ballast/requests";
import { AllocationEngine } from "@ballast/allocation";
import type {
  AllocationContext,
  HarvestResult,
  InputConfig,
  InvestResult,
  LiquidateResult,
  PriceOracle,
  SlippagePolicy,
  Slot,
  SwapParams,
  Swapper,
} from "@ballast/allocation";
import { BALLAST_EVENTS, EventBuffer } from "@ballast/event-store";
import type { EventStore } from "@ballast/event-store";
import type { VaultConfig } from "./config.js";
import type {
  CompoundResult,
  EmptyStrategyResult,
  RescueRequest,
  VaultDependencies,
  VaultSnapshot,
} from "./types.js";
import { VaultError } from "./types.js";

export const VAULT_STREAM = "vault";

const NO_SWAP: SwapParams = "0x";

// =============================================================================
// Vault
// =============================================================================

export class Vault {
  readonly config: VaultConfig;
  private readonly ledger: ShareLedger;
  private readonly fees: FeeAccrualEngine;
  private readonly queue: RequestQueue;
  private readonly allocation: AllocationEngine;
  private readonly custody: Custody;
  private readonly oracle: PriceOracle;
  private readonly swapper: Swapper;
  private readonly store: EventStore | undefined;
  private readonly log: Logger;
  private readonly clock: () => number;
  /** Pending rescues keyed by lowercased token, valued by request time */
  private readonly rescues = new Map<string, number>();
  private readonly guard = new ReentrancyGuard(
    () => new VaultError("REENTRANCY", "Vault is already executing an operation"),
  );

  constructor(config: VaultConfig, deps: VaultDependencies) {
    this.config = config;
    this.oracle = deps.oracle;
    this.swapper = deps.swapper;
    this.custody = deps.custody ?? new InMemoryCustody();
    this.store = deps.store;
    this.log = (deps.logger ?? pino({ level: "silent" })).child({ component: "vault" });
    this.clock = deps.clock ?? (() => Math.floor(Date.now() / 1000));

    this.ledger = new ShareLedger(
      {
        vault: config.vault,
        asset: config.asset,
        assetDecimals: config.assetDecimals,
        shareDecimals: config.shareDecimals,
        feeCollector: config.feeCollector,
        fees: config.fees,
        maxTotalAssets: config.maxTotalAssets,
        minLiquidity: config.minLiquidity,
        profitCooldown: config.profitCooldown,
        exempt: config.exempt,
        now: this.clock(),
      },
      this.custody,
    );
    this.fees = new FeeAccrualEngine(this.ledger);
    this.queue = new RequestQueue();
    this.allocation = new AllocationEngine(this.custody, {
      asset: config.asset,
      oracle: this.oracle,
      swapper: this.swapper,
      mode: config.mode,
      maxSlippageBps: config.maxSlippageBps,
      slippagePolicy: config.slippagePolicy,
      dustThreshold: config.dustThreshold,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Views
  // ───────────────────────────────────────────────────────────────────────

  get asset(): Address {
    return this.ledger.state.asset;
  }

  get state(): Readonly<VaultState> {
    return this.ledger.state;
  }

  get totalSupply(): bigint {
    return this.ledger.totalSupply;
  }

  balanceOf(owner: Address): bigint {
    return this.ledger.balanceOf(owner);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.ledger.allowance(owner, spender);
  }

  /**
   * Asset balance free for withdrawals and investment: custody minus
   * unclaimed entry/exit fees and everything the request queue holds.
   */
  available(): bigint {
    const free =
      this.custody.balanceOf(this.asset) -
      this.ledger.claimableAssetFees -
      this.queue.reservedAssets(this.asset);
    return free > 0n ? free : 0n;
  }

  async valuation(): Promise<Valuation> {
    const available = this.available();
    return { totalAssets: available + (await this.allocation.totalInvested()), available };
  }

  async totalAssets(): Promise<bigint> {
    return (await this.valuation()).totalAssets;
  }

  async sharePrice(): Promise<bigint> {
    return this.ledger.sharePrice(await this.valuation());
  }

  /** Supply excluding shares escrowed by the vault for requests. */
  totalAccountedSupply(): bigint {
    return this.ledger.totalSupply - this.ledger.balanceOf(this.config.vault);
  }

  /** Total assets plus the assets the request queue holds. */
  async totalAccountedAssets(): Promise<bigint> {
    return (await this.totalAssets()) + this.queue.reservedAssets(this.asset);
  }

  async investedInputs(): Promise<bigint[]> {
    return this.allocation.investedInputs();
  }

  slots(): readonly Slot[] {
    return this.allocation.slots();
  }

  request(operator: Address): Erc7540Request | undefined {
    return this.queue.get(operator);
  }

  pendingRedeemRequest(operator: Address): bigint {
    return this.queue.pendingRedeemRequest(operator);
  }

  claimableRedeemRequest(operator: Address): bigint {
    return this.queue.claimableRedeemRequest(operator);
  }

  /** Asset value of the operator's pending redemption at the current price. */
  async pendingAssetRequest(operator: Address): Promise<bigint> {
    return this.ledger.convertToAssets(this.queue.pendingRedeemRequest(operator), await this.valuation());
  }

  pendingDepositRequest(operator: Address): bigint {
    return this.queue.pendingDepositRequest(operator);
  }

  claimableDepositRequest(operator: Address): bigint {
    return this.queue.claimableDepositRequest(operator);
  }

  // ─── Previews ──────────────────────────────────────────────────────

  async previewDeposit(assets: bigint, caller?: Address): Promise<bigint> {
    return this.ledger.previewDeposit(assets, await this.valuation(), caller);
  }

  async previewMint(shares: bigint, caller?: Address): Promise<bigint> {
    return this.ledger.previewMint(shares, await this.valuation(), caller);
  }

  async previewWithdraw(assets: bigint, caller?: Address): Promise<bigint> {
    return this.ledger.previewWithdraw(assets, await this.valuation(), caller);
  }

  async previewRedeem(shares: bigint, caller?: Address): Promise<bigint> {
    return this.ledger.previewRedeem(shares, await this.valuation(), caller);
  }

  async maxDeposit(caller: Address): Promise<bigint> {
    return this.ledger.maxDeposit(caller, await this.valuation());
  }

  async maxWithdraw(owner: Address): Promise<bigint> {
    return this.ledger.maxWithdraw(owner, await this.valuation());
  }

  maxRedeem(owner: Address): bigint {
    return this.ledger.maxRedeem(owner);
  }

  async previewFees(): Promise<FeePreview> {
    return this.fees.preview(await this.valuation(), this.clock());
  }

  /** Per-slot asset amounts that bring positions back to their weights. */
  async previewInvest(amount: bigint): Promise<bigint[]> {
    return this.allocation.previewInvest(amount, await this.allocationContext());
  }

  /** Per-slot input amounts that free `amount` plus redemption demand. */
  async previewLiquidate(amount: bigint): Promise<bigint[]> {
    return this.allocation.previewLiquidate(amount, await this.allocationContext());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Synchronous Deposits & Withdrawals
  // ───────────────────────────────────────────────────────────────────────

  async deposit(caller: Address, assets: bigint, receiver: Address): Promise<ShareMovement> {
    return this.transact("deposit", caller, async (events) => {
      const movement = this.ledger.deposit(caller, assets, receiver, await this.valuation());
      await this.recordMovement(events, BALLAST_EVENTS.DEPOSIT, caller, receiver, receiver, movement);
      return movement;
    });
  }

  async safeDeposit(
    caller: Address,
    assets: bigint,
    receiver: Address,
    minSharesOut: bigint,
    deadline: number,
  ): Promise<ShareMovement> {
    return this.transact("safeDeposit", caller, async (events) => {
      const movement = this.ledger.safeDeposit(caller, assets, receiver, await this.valuation(), {
        minSharesOut,
        deadline,
        now: this.clock(),
      });
      await this.recordMovement(events, BALLAST_EVENTS.DEPOSIT, caller, receiver, receiver, movement);
      return movement;
    });
  }

  async mint(caller: Address, shares: bigint, receiver: Address): Promise<ShareMovement> {
    return this.transact("mint", caller, async (events) => {
      const movement = this.ledger.mint(caller, shares, receiver, await this.valuation());
      await this.recordMovement(events, BALLAST_EVENTS.DEPOSIT, caller, receiver, receiver, movement);
      return movement;
    });
  }

  async safeMint(
    caller: Address,
    shares: bigint,
    receiver: Address,
    maxAssetsIn: bigint,
    deadline: number,
  ): Promise<ShareMovement> {
    return this.transact("safeMint", caller, async (events) => {
      const movement = this.ledger.safeMint(caller, shares, receiver, await this.valuation(), {
        maxAssetsIn,
        deadline,
        now: this.clock(),
      });
      await this.recordMovement(events, BALLAST_EVENTS.DEPOSIT, caller, receiver, receiver, movement);
      return movement;
    });
  }

  async withdraw(
    caller: Address,
    assets: bigint,
    receiver: Address,
    owner: Address,
  ): Promise<ShareMovement> {
    return this.transact("withdraw", caller, async (events) => {
      const movement = this.ledger.withdraw(caller, assets, receiver, owner, await this.valuation());
      await this.recordMovement(events, BALLAST_EVENTS.WITHDRAW, caller, receiver, owner, movement);
      return movement;
    });
  }

  async safeWithdraw(
    caller: Address,
    assets: bigint,
    receiver: Address,
    owner: Address,
    maxSharesIn: bigint,
    deadline: number,
  ): Promise<ShareMovement> {
    return this.transact("safeWithdraw", caller, async (events) => {
      const movement = this.ledger.safeWithdraw(caller, assets, receiver, owner, await this.valuation(), {
        maxSharesIn,
        deadline,
        now: this.clock(),
      });
      await this.recordMovement(events, BALLAST_EVENTS.WITHDRAW, caller, receiver, owner, movement);
      return movement;
    });
  }

  async redeem(
    caller: Address,
    shares: bigint,
    receiver: Address,
    owner: Address,
  ): Promise<ShareMovement> {
    return this.transact("redeem", caller, async (events) => {
      const movement = this.ledger.redeem(caller, shares, receiver, owner, await this.valuation());
      await this.recordMovement(events, BALLAST_EVENTS.WITHDRAW, caller, receiver, owner, movement);
      return movement;
    });
  }

  async safeRedeem(
    caller: Address,
    shares: bigint,
    receiver: Address,
    owner: Address,
    minAssetsOut: bigint,
    deadline: number,
  ): Promise<ShareMovement> {
    return this.transact("safeRedeem", caller, async (events) => {
      const movement = this.ledger.safeRedeem(caller, shares, receiver, owner, await this.valuation(), {
        minAssetsOut,
        deadline,
        now: this.clock(),
      });
      await this.recordMovement(events, BALLAST_EVENTS.WITHDRAW, caller, receiver, owner, movement);
      return movement;
    });
  }

  /**
   * Deposit a token other than the asset. It is swapped into the asset
   * first; the swap must return at least the oracle value less the
   * slippage tolerance, and the deposit at least `minShareAmount` shares.
   */
  async swapSafeDeposit(
    caller: Address,
    inToken: Address,
    amount: bigint,
    receiver: Address,
    minShareAmount: bigint,
    params: SwapParams = NO_SWAP,
  ): Promise<ShareMovement> {
    return this.transact("swapSafeDeposit", caller, async (events) => {
      if (amount <= 0n) {
        throw new VaultError("AMOUNT_TOO_LOW", "Deposit amount must be greater than zero");
      }
      const valuation = await this.valuation();
      let assets = amount;

      if (!sameAddress(inToken, this.asset)) {
        if (!(await this.oracle.hasFeed(inToken))) {
          throw new VaultError("MISSING_ORACLE", `No price feed for ${inToken}`);
        }
        const expected = await this.oracle.convert(inToken, amount, this.asset);
        this.custody.credit(inToken, amount);
        const swap = await this.swapper.decodeAndSwap(this.custody, inToken, this.asset, amount, params);
        this.requireSlippage(swap.received, expected, `Swap of ${inToken}`);
        // The ledger credits the deposit itself
        this.custody.debit(this.asset, swap.received);
        assets = swap.received;
      }

      const movement = this.ledger.deposit(caller, assets, receiver, valuation);
      if (movement.shares < minShareAmount) {
        throw new VaultError(
          "AMOUNT_TOO_LOW",
          `Deposit yields ${movement.shares} shares, below the ${minShareAmount} minimum`,
        );
      }
      await this.recordMovement(events, BALLAST_EVENTS.DEPOSIT, caller, receiver, receiver, movement);
      return movement;
    });
  }

  // ─── Share Allowances ──────────────────────────────────────────────

  async approve(owner: Address, spender: Address, shares: bigint): Promise<void> {
    await this.guard.runAsync(async () => {
      this.ledger.approve(owner, spender, shares);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Asynchronous Requests
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Escrow `assets` for a deposit settled at a later share price.
   */
  async requestDeposit(caller: Address, assets: bigint, receiver: Address): Promise<Erc7540Request> {
    return this.transact("requestDeposit", caller, async (events) => {
      const request = this.queue.requestDeposit(caller, caller, receiver, assets, await this.admission());
      this.custody.credit(this.asset, assets);
      recordRequest(events, BALLAST_EVENTS.DEPOSIT_REQUEST, request);
      return request;
    });
  }

  /**
   * Escrow `shares` of `owner` for a redemption settled at a later share
   * price. A caller other than the owner spends the owner's allowance.
   */
  async requestRedeem(
    caller: Address,
    shares: bigint,
    receiver: Address,
    owner: Address,
  ): Promise<Erc7540Request> {
    return this.transact("requestRedeem", caller, (events) =>
      this.openRedeem(events, caller, shares, receiver, owner),
    );
  }

  /**
   * Redeem request sized in assets: escrows the shares `assets` is worth
   * now, rounded up. The payout is still fixed at settlement.
   */
  async requestWithdraw(
    caller: Address,
    assets: bigint,
    receiver: Address,
    owner: Address,
  ): Promise<Erc7540Request> {
    return this.transact("requestWithdraw", caller, async (events) => {
      const shares = this.ledger.convertToShares(assets, await this.valuation(), "up");
      return this.openRedeem(events, caller, shares, receiver, owner);
    });
  }

  async cancelDepositRequest(caller: Address): Promise<Erc7540Request> {
    return this.transact("cancelDepositRequest", caller, async (events) => {
      const request = this.queue.cancelDepositRequest(caller);
      this.custody.debit(request.asset, request.assetsOrShares);
      events.record(BALLAST_EVENTS.DEPOSIT_REQUEST_CANCELED, {
        requestId: request.id,
        operator: request.operator,
        amount: request.assetsOrShares.toString(),
      });
      return request;
    });
  }

  async cancelRedeemRequest(caller: Address): Promise<Erc7540Request> {
    return this.transact("cancelRedeemRequest", caller, async (events) => {
      const request = this.queue.cancelRedeemRequest(caller);
      this.ledger.transfer(this.config.vault, request.owner, request.assetsOrShares);
      events.record(BALLAST_EVENTS.REDEEM_REQUEST_CANCELED, {
        requestId: request.id,
        operator: request.operator,
        amount: request.assetsOrShares.toString(),
      });
      return request;
    });
  }

  async settleRequests(caller: Address): Promise<SettlementResult> {
    return this.transactAsManager("settleRequests", caller, (events) => this.settle(events));
  }

  /** Receive the shares of a settled deposit request. */
  async claimDeposit(caller: Address, deadline: number): Promise<Erc7540Request> {
    return this.transact("claimDeposit", caller, async (events) => {
      const request = this.claim("deposit", caller, deadline);
      this.ledger.transfer(this.config.vault, request.receiver, request.claimable);
      recordClaim(events, request);
      return request;
    });
  }

  /** Receive the assets locked for a settled redeem request. */
  async claimRedeem(caller: Address, deadline: number): Promise<Erc7540Request> {
    return this.transact("claimRedeem", caller, async (events) => {
      const request = this.claim("redeem", caller, deadline);
      this.custody.debit(request.asset, request.claimable);
      recordClaim(events, request);
      return request;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Fees
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Collect performance, management and retained entry/exit fees.
   * Returns null while the profit cooldown is running.
   */
  async collectFees(caller: Address): Promise<FeeCollection | null> {
    return this.transactAsManager("collectFees", caller, (events) => this.collect(events));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Allocation
  // ───────────────────────────────────────────────────────────────────────

  async invest(
    caller: Address,
    amounts: readonly bigint[],
    params: readonly SwapParams[] = [],
  ): Promise<InvestResult> {
    return this.transactAsManager("invest", caller, (events) => this.investAmounts(events, amounts, params));
  }

  /**
   * Convert positions back into the asset, then settle any redemptions
   * the freed liquidity now covers. Outside a panic the recovered total
   * must reach `minLiquidity`.
   *
   * A panic exit only unwinds positions. Requests stay pending for a
   * later `settleRequests`, so nothing but the unwind itself can fail it.
   */
  async liquidate(
    caller: Address,
    amounts: readonly bigint[],
    minLiquidity = 0n,
    panic = false,
    params: readonly SwapParams[] = [],
  ): Promise<LiquidateResult> {
    return this.transactAsManager("liquidate", caller, (events) =>
      this.liquidateAmounts(events, amounts, minLiquidity, panic, params),
    );
  }

  async harvest(caller: Address, params: readonly SwapParams[] = []): Promise<HarvestResult> {
    return this.transactAsManager("harvest", caller, (events) => this.harvestRewards(events, params));
  }

  /** Harvest, then invest whatever the weights call for. */
  async compound(
    caller: Address,
    harvestParams: readonly SwapParams[] = [],
    investParams: readonly SwapParams[] = [],
  ): Promise<CompoundResult> {
    return this.transactAsManager("compound", caller, async (events) => {
      const harvest = await this.harvestRewards(events, harvestParams);
      const amounts = await this.allocation.previewInvest(0n, await this.allocationContext());
      const invest = await this.investAmounts(events, amounts, investParams);
      return { harvest, invest };
    });
  }

  /**
   * Wind the vault down: close deposits, drop the liquidity floor,
   * liquidate every position, settle requests and collect fees.
   */
  async emptyStrategy(caller: Address, params: readonly SwapParams[] = []): Promise<EmptyStrategyResult> {
    return this.transactAsManager("emptyStrategy", caller, async (events) => {
      this.ledger.setMaxTotalAssets(0n);
      events.record(BALLAST_EVENTS.MAX_TOTAL_ASSETS_SET, { maxTotalAssets: "0" });
      this.ledger.setMinLiquidity(0n);
      events.record(BALLAST_EVENTS.MIN_LIQUIDITY_SET, { minLiquidity: "0" });

      const amounts = await this.allocation.investedInputs();
      const { totalRecovered } = await this.liquidateAmounts(events, amounts, 0n, false, params);
      const fees = await this.collect(events);
      return { totalRecovered, fees };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Replace the input set. A slot that still holds a position keeps its
   * token and position handle.
   */
  async setInputs(caller: Address, inputs: readonly InputConfig[]): Promise<readonly Slot[]> {
    return this.transactAsManager("setInputs", caller, async (events) => {
      const held = await this.allocation.investedInputs();
      for (const [index, amount] of held.entries()) {
        if (amount === 0n) continue;
        const slot = this.allocation.slot(index);
        const next = inputs[index];
        if (
          slot.kind === "active" &&
          (next === undefined ||
            !sameAddress(next.token, slot.input.token) ||
            !sameAddress(next.positionHandle, slot.input.positionHandle))
        ) {
          throw new VaultError(
            "WRONG_TOKEN",
            `Slot ${String(index)} still holds ${amount} of ${slot.input.token}, liquidate it first`,
          );
        }
      }

      const slots = await this.allocation.setInputs(inputs);
      events.record(BALLAST_EVENTS.INPUTS_UPDATED, {
        tokens: inputs.map((input) => input.token),
        weights: inputs.map((input) => input.weight),
      });
      return slots;
    });
  }

  /**
   * Switch the vault to a new base asset. The free balance of the old
   * asset is swapped, retained fees are released first and the fee
   * high-water mark is re-expressed in the new asset. Refused while any
   * request is claimable or a deposit request still escrows the old asset.
   */
  async updateAsset(
    caller: Address,
    asset: Address,
    assetDecimals: number,
    params: SwapParams = NO_SWAP,
  ): Promise<void> {
    await this.transactAsManager("updateAsset", caller, async (events) => {
      if (this.queue.hasClaimable()) {
        throw new VaultError("WRONG_REQUEST", "Claimable requests must be paid out before the asset changes");
      }
      const previous = this.asset;
      const escrowed = this.queue.totalDepositRequest(previous);
      if (escrowed > 0n) {
        throw new VaultError(
          "WRONG_REQUEST",
          `Deposit requests still hold ${escrowed} of ${previous} in escrow`,
        );
      }
      if (sameAddress(previous, asset)) {
        throw new VaultError("WRONG_TOKEN", `${asset} is already the vault asset`);
      }
      for (const token of [previous, asset]) {
        if (!(await this.oracle.hasFeed(token))) {
          throw new VaultError("MISSING_ORACLE", `No price feed for ${token}`);
        }
      }

      const released = this.ledger.releaseAssetFees();
      if (released > 0n) {
        this.log.info({ released: released.toString(), asset: previous }, "asset fees released");
      }

      const free = this.custody.balanceOf(previous);
      if (free > 0n) {
        const expected = await this.oracle.convert(previous, free, asset);
        const swap = await this.swapper.decodeAndSwap(this.custody, previous, asset, free, params);
        this.requireSlippage(swap.received, expected, `Swap of ${previous}`);
      }

      const lastSharePrice = await this.oracle.convert(previous, this.ledger.state.lastSharePrice, asset);
      await this.allocation.setAsset(asset);
      this.ledger.setAsset(asset, assetDecimals, lastSharePrice);

      events.record(BALLAST_EVENTS.ASSET_UPDATED, {
        previousAsset: previous,
        asset,
        sharePrice: (await this.sharePrice()).toString(),
      });
    });
  }

  async setFees(caller: Address, fees: FeeSchedule): Promise<void> {
    await this.transactAsManager("setFees", caller, async (events) => {
      this.ledger.setFees(fees);
      events.record(BALLAST_EVENTS.FEES_UPDATED, { ...this.ledger.state.fees });
    });
  }

  async setMaxTotalAssets(caller: Address, maxTotalAssets: bigint): Promise<void> {
    await this.transactAsManager("setMaxTotalAssets", caller, async (events) => {
      this.ledger.setMaxTotalAssets(maxTotalAssets);
      events.record(BALLAST_EVENTS.MAX_TOTAL_ASSETS_SET, { maxTotalAssets: maxTotalAssets.toString() });
    });
  }

  async setMinLiquidity(caller: Address, minLiquidity: bigint): Promise<void> {
    await this.transactAsManager("setMinLiquidity", caller, async (events) => {
      this.ledger.setMinLiquidity(minLiquidity);
      events.record(BALLAST_EVENTS.MIN_LIQUIDITY_SET, { minLiquidity: minLiquidity.toString() });
    });
  }

  /**
   * First deposit of a vault with a liquidity floor. Also sets the cap.
   */
  async seedLiquidity(caller: Address, assets: bigint, maxTotalAssets: bigint): Promise<ShareMovement> {
    return this.transactAsManager("seedLiquidity", caller, async (events) => {
      const movement = this.ledger.seedLiquidity(caller, assets, maxTotalAssets, await this.valuation());
      await this.recordMovement(events, BALLAST_EVENTS.DEPOSIT, caller, caller, caller, movement);
      events.record(BALLAST_EVENTS.MAX_TOTAL_ASSETS_SET, { maxTotalAssets: maxTotalAssets.toString() });
      return movement;
    });
  }

  async setSlippage(caller: Address, maxSlippageBps: number, policy?: SlippagePolicy): Promise<void> {
    await this.transactAsManager("setSlippage", caller, async () => {
      this.allocation.setSlippage(maxSlippageBps, policy);
    });
  }

  async setFeeCollector(caller: Address, feeCollector: Address): Promise<void> {
    await this.transactAsManager("setFeeCollector", caller, async () => {
      this.ledger.setFeeCollector(feeCollector);
    });
  }

  async setExempt(caller: Address, account: Address, exempt: boolean): Promise<void> {
    await this.transactAsManager("setExempt", caller, async () => {
      this.ledger.setExempt(account, exempt);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Rescue
  // ───────────────────────────────────────────────────────────────────────

  rescueRequest(token: Address): RescueRequest | undefined {
    const requestedAt = this.rescues.get(token.toLowerCase());
    if (requestedAt === undefined) return undefined;
    return this.describeRescue(token, requestedAt);
  }

  /**
   * Start the timelock for recovering a token the vault does not use.
   * A new request for the same token restarts the clock.
   */
  async requestRescue(caller: Address, token: Address): Promise<RescueRequest> {
    return this.transactAsManager("requestRescue", caller, async (events) => {
      this.requireRescuable(token);
      const now = this.clock();
      this.rescues.set(token.toLowerCase(), now);
      const request = this.describeRescue(token, now);
      events.record(BALLAST_EVENTS.RESCUE_REQUESTED, {
        token,
        unlocksAt: request.unlocksAt,
        expiresAt: request.expiresAt,
      });
      return request;
    });
  }

  /**
   * Send the whole custody balance of a rescued token to the manager,
   * once the timelock has run and before the request expires.
   */
  async rescue(caller: Address, token: Address): Promise<bigint> {
    return this.transactAsManager("rescue", caller, async (events) => {
      const request = this.rescueRequest(token);
      if (request === undefined) {
        throw new VaultError("WRONG_REQUEST", `No rescue requested for ${token}`);
      }
      const now = this.clock();
      if (now < request.unlocksAt) {
        throw new VaultError("WRONG_REQUEST", `Rescue of ${token} unlocks at ${String(request.unlocksAt)}`);
      }
      if (now > request.expiresAt) {
        throw new VaultError("WRONG_REQUEST", `Rescue of ${token} expired at ${String(request.expiresAt)}`);
      }
      this.requireRescuable(token);

      const amount = this.custody.balanceOf(token);
      if (amount === 0n) {
        throw new VaultError("AMOUNT_TOO_LOW", `Vault holds no ${token}`);
      }
      this.custody.debit(token, amount);
      this.rescues.delete(token.toLowerCase());
      events.record(BALLAST_EVENTS.RESCUED, { token, receiver: caller, amount: amount.toString() });
      return amount;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot / Restore
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): VaultSnapshot {
    return {
      ledger: this.ledger.snapshot(),
      queue: this.queue.snapshot(),
      allocation: this.allocation.snapshot(),
      custody: this.custody.snapshot(),
      rescues: [...this.rescues.entries()],
    };
  }

  restore(snapshot: VaultSnapshot): void {
    this.ledger.restore(snapshot.ledger);
    this.queue.restore(snapshot.queue);
    this.allocation.restore(snapshot.allocation);
    this.custody.restore(snapshot.custody);
    this.rescues.clear();
    for (const [token, requestedAt] of snapshot.rescues) {
      this.rescues.set(token, requestedAt);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private async allocationContext(): Promise<AllocationContext> {
    const valuation = await this.valuation();
    return {
      totalAssets: valuation.totalAssets,
      available: valuation.available,
      redemptionDemand: this.ledger.convertToAssets(this.queue.totalRedemptionRequest(), valuation),
    };
  }

  private async admission(): Promise<AdmissionContext> {
    return {
      now: this.clock(),
      sharePrice: await this.sharePrice(),
      asset: this.asset,
      oracleReady: await this.oracleReady(),
    };
  }

  /** Every active input priced in another token has a live feed. */
  private async oracleReady(): Promise<boolean> {
    let assetFeedChecked = false;
    for (const slot of this.allocation.slots()) {
      if (slot.kind !== "active" || sameAddress(slot.input.token, this.asset)) continue;
      if (!(await this.oracle.hasFeed(slot.input.token))) return false;
      if (!assetFeedChecked) {
        if (!(await this.oracle.hasFeed(this.asset))) return false;
        assetFeedChecked = true;
      }
    }
    return true;
  }

  private async openRedeem(
    events: EventBuffer,
    caller: Address,
    shares: bigint,
    receiver: Address,
    owner: Address,
  ): Promise<Erc7540Request> {
    const request = this.queue.requestRedeem(caller, owner, receiver, shares, await this.admission());
    this.ledger.spendAllowance(owner, caller, shares);
    this.ledger.transfer(owner, this.config.vault, shares);
    recordRequest(events, BALLAST_EVENTS.REDEEM_REQUEST, request);
    return request;
  }

  /** The asset and every active input and receipt token stay put. */
  private requireRescuable(token: Address): void {
    const inUse = [this.asset];
    for (const slot of this.allocation.slots()) {
      if (slot.kind === "active") inUse.push(slot.input.token, slot.input.positionHandle);
    }
    if (inUse.some((held) => sameAddress(held, token))) {
      throw new VaultError("WRONG_TOKEN", `${token} is in use by the vault and cannot be rescued`);
    }
  }

  private describeRescue(token: Address, requestedAt: number): RescueRequest {
    const unlocksAt = requestedAt + this.config.rescueTimelock;
    return { token, requestedAt, unlocksAt, expiresAt: unlocksAt + this.config.rescueValidity };
  }

  private claim(kind: RequestKind, caller: Address, deadline: number): Erc7540Request {
    return this.queue.claim(kind, caller, { now: this.clock(), deadline, asset: this.asset });
  }

  private async settle(events: EventBuffer): Promise<SettlementResult> {
    const valuation = await this.valuation();
    const result = this.queue.settle({
      now: this.clock(),
      asset: this.asset,
      sharePrice: this.ledger.sharePrice(valuation),
      weiPerShare: this.ledger.state.weiPerShare,
      liquidity: valuation.available,
    });
    if (result.mintedShares > 0n) this.ledger.mintShares(this.config.vault, result.mintedShares);
    if (result.burnedShares > 0n) this.ledger.burnShares(this.config.vault, result.burnedShares);

    if (result.deposits.length + result.redemptions.length > 0) {
      events.record(BALLAST_EVENTS.REQUESTS_SETTLED, {
        deposits: result.deposits.length,
        redemptions: result.redemptions.length,
        mintedShares: result.mintedShares.toString(),
        burnedShares: result.burnedShares.toString(),
        lockedAssets: result.lockedAssets.toString(),
      });
    }
    return result;
  }

  private async collect(events: EventBuffer): Promise<FeeCollection | null> {
    const result = this.fees.collect(await this.valuation(), this.clock());
    if (result === null) {
      this.log.debug({ remaining: this.fees.cooldownRemaining(this.clock()) }, "fee cooldown running");
      return null;
    }
    events.record(BALLAST_EVENTS.FEES_COLLECTED, {
      feeCollector: this.ledger.state.feeCollector,
      perfFees: result.perfFees.toString(),
      mgmtFees: result.mgmtFees.toString(),
      sharesMinted: result.sharesMinted.toString(),
      assetFeesClaimed: result.assetFeesClaimed.toString(),
      sharePrice: result.sharePrice.toString(),
    });
    await this.recordSharePrice(events);
    return result;
  }

  private async investAmounts(
    events: EventBuffer,
    amounts: readonly bigint[],
    params: readonly SwapParams[],
  ): Promise<InvestResult> {
    const total = sumBigInt(amounts.filter((amount) => amount > 0n));
    const available = this.available();
    if (total > available) {
      throw new VaultError(
        "INSUFFICIENT_FUNDS",
        `Investing ${total} needs more than the ${available} available assets`,
      );
    }
    const result = await this.allocation.invest(amounts, params);
    events.record(BALLAST_EVENTS.INVEST, {
      amounts: amounts.map(String),
      totalInvested: result.totalInvested.toString(),
    });
    return result;
  }

  private async liquidateAmounts(
    events: EventBuffer,
    amounts: readonly bigint[],
    minLiquidity: bigint,
    panic: boolean,
    params: readonly SwapParams[],
  ): Promise<LiquidateResult> {
    const result = await this.allocation.liquidate(amounts, panic, params);
    if (!panic && result.totalRecovered < minLiquidity) {
      throw new VaultError(
        "AMOUNT_TOO_LOW",
        `Liquidation recovered ${result.totalRecovered}, below the ${minLiquidity} minimum`,
      );
    }
    events.record(BALLAST_EVENTS.LIQUIDATE, {
      amounts: amounts.map(String),
      totalRecovered: result.totalRecovered.toString(),
      panic,
    });
    if (panic) {
      this.log.info({ requests: this.queue.size }, "panic liquidation leaves requests pending");
    } else {
      await this.settle(events);
    }
    return result;
  }

  private async harvestRewards(events: EventBuffer, params: readonly SwapParams[]): Promise<HarvestResult> {
    const result = await this.allocation.harvest(params);
    const tokens: Address[] = [];
    for (const claim of result.claims) {
      if (!tokens.some((token) => sameAddress(token, claim.token))) tokens.push(claim.token);
    }
    events.record(BALLAST_EVENTS.HARVEST, {
      rewardTokens: tokens,
      assetsReceived: result.assetsReceived.toString(),
    });
    await this.recordSharePrice(events);
    return result;
  }

  private requireSlippage(received: bigint, expected: bigint, label: string): void {
    const floor = applyBps(expected, this.allocation.maxSlippageBps);
    if (received < floor) {
      throw new VaultError(
        "AMOUNT_TOO_LOW",
        `${label} returned ${received}, below the ${floor} slippage floor`,
      );
    }
  }

  private async recordMovement(
    events: EventBuffer,
    type: typeof BALLAST_EVENTS.DEPOSIT | typeof BALLAST_EVENTS.WITHDRAW,
    caller: Address,
    receiver: Address,
    owner: Address,
    movement: ShareMovement,
  ): Promise<void> {
    events.record(type, {
      caller,
      receiver,
      owner,
      assets: movement.assets.toString(),
      shares: movement.shares.toString(),
      fee: movement.fee.toString(),
      sharePrice: (await this.sharePrice()).toString(),
    });
  }

  private async recordSharePrice(events: EventBuffer): Promise<void> {
    const valuation = await this.valuation();
    events.record(BALLAST_EVENTS.SHARE_PRICE_UPDATED, {
      sharePrice: this.ledger.sharePrice(valuation).toString(),
      totalSupply: this.ledger.totalSupply.toString(),
      totalAssets: valuation.totalAssets.toString(),
    });
  }

  private requireManager(caller: Address): void {
    if (!sameAddress(caller, this.config.manager) || sameAddress(caller, ZERO_ADDRESS)) {
      throw new VaultError("UNAUTHORIZED", `${caller} is not the vault manager`);
    }
  }

  private async transactAsManager<T>(
    operation: string,
    caller: Address,
    fn: (events: EventBuffer) => Promise<T>,
  ): Promise<T> {
    return this.transact(operation, caller, async (events) => {
      this.requireManager(caller);
      return fn(events);
    });
  }

  private async transact<T>(
    operation: string,
    caller: Address,
    fn: (events: EventBuffer) => Promise<T>,
  ): Promise<T> {
    return this.guard.runAsync(async () => {
      const snapshot = this.snapshot();
      const events = new EventBuffer({
        source: "vault",
        actor: caller,
        timestamp: new Date(this.clock() * 1000).toISOString(),
      });
      try {
        const result = await fn(events);
        if (this.store !== undefined && events.size > 0) {
          this.store.append(VAULT_STREAM, events.events);
        }
        this.log.info({ operation, caller, events: events.size }, `${operation} committed`);
        return result;
      } catch (error) {
        this.restore(snapshot);
        this.log.warn({ operation, caller, code: errorCode(error) }, `${operation} rolled back`);
        throw error;
      }
    });
  }
}

// =============================================================================
// Event helpers
// =============================================================================

function recordRequest(
  events: EventBuffer,
  type: typeof BALLAST_EVENTS.DEPOSIT_REQUEST | typeof BALLAST_EVENTS.REDEEM_REQUEST,
  request: Erc7540Request,
): void {
  events.record(type, {
    requestId: request.id,
    operator: request.operator,
    owner: request.owner,
    receiver: request.receiver,
    amount: request.assetsOrShares.toString(),
    sharePrice: request.sharePriceAtRequest.toString(),
  });
}

function recordClaim(events: EventBuffer, request: Erc7540Request): void {
  events.record(BALLAST_EVENTS.REQUEST_CLAIMED, {
    requestId: request.id,
    kind: request.kind,
    operator: request.operator,
    receiver: request.receiver,
    amount: request.claimable.toString(),
  });
}

function errorCode(error: unknown): string {
  return typeof error === "object" && error !== null && "code" in error ? String(error.code) : "UNKNOWN";
}
