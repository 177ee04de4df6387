/**
 * @ballast/allocation — AllocationEngine.
 *
 * Routes idle vault assets into up to eight weighted inputs and back.
 * Every figure the engine reports is derived from live custody balances
 * and adapter reads; nothing is cached between calls.
 *
 * Rules:
 * - Input weights never sum above 10000 bps
 * - Every non-asset input needs a price feed, and so does the asset
 * - Amounts below the dust threshold are skipped, never reverted
 * - Slippage floors bind on invest and liquidate, except in panic
 * - Paired mode moves an even/odd slot pair as one AMM position
 */

import type { Address } from "@ballast/types";
import { sameAddress } from "@ballast/types";
import type { Custody } from "@ballast/ledger";
import { applyBps, assertBps, maxBigInt, minBigInt, mulDiv } from "@ballast/ledger";
import type { ActiveSlot, PairedPosition, SinglePosition } from "./slots.js";
import { SlotArena, validateInputs } from "./slots.js";
import type {
  ActiveInput,
  AllocationContext,
  AllocationEngineOptions,
  AllocationMode,
  AllocationSnapshot,
  AnyProtocolAdapter,
  HarvestResult,
  InputConfig,
  InvestResult,
  LiquidateResult,
  Pair,
  PriceOracle,
  RewardCapability,
  RewardClaim,
  Slot,
  SlippagePolicy,
  SlotMovement,
  SwapParams,
  Swapper,
} from "./types.js";
import {
  AllocationError,
  DEFAULT_DUST_THRESHOLD,
  DEFAULT_MAX_SLIPPAGE_BPS,
  MAX_INPUTS,
} from "./types.js";

const EMPTY_PARAMS: SwapParams = "0x";

function zeros(): bigint[] {
  return Array.from({ length: MAX_INPUTS }, () => 0n);
}

export class AllocationEngine {
  private readonly _custody: Custody;
  private readonly _oracle: PriceOracle;
  private readonly _swapper: Swapper;
  private readonly _mode: AllocationMode;
  private readonly _slots = new SlotArena();
  private _asset: Address;
  private _maxSlippageBps: number;
  private _slippagePolicy: SlippagePolicy;
  private _dustThreshold: bigint;

  constructor(custody: Custody, options: AllocationEngineOptions) {
    this._custody = custody;
    this._oracle = options.oracle;
    this._swapper = options.swapper;
    this._mode = options.mode ?? "single";
    this._asset = options.asset;
    this._maxSlippageBps = options.maxSlippageBps ?? DEFAULT_MAX_SLIPPAGE_BPS;
    this._slippagePolicy = options.slippagePolicy ?? "compound";
    this._dustThreshold = options.dustThreshold ?? DEFAULT_DUST_THRESHOLD;
    assertBps(this._maxSlippageBps);
  }

  get asset(): Address {
    return this._asset;
  }

  get mode(): AllocationMode {
    return this._mode;
  }

  get maxSlippageBps(): number {
    return this._maxSlippageBps;
  }

  get slippagePolicy(): SlippagePolicy {
    return this._slippagePolicy;
  }

  get dustThreshold(): bigint {
    return this._dustThreshold;
  }

  slot(index: number): Slot {
    return this._slots.get(index);
  }

  slots(): readonly Slot[] {
    return this._slots.all();
  }

  totalWeight(): number {
    return this._slots.totalWeight();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Configuration
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Replace the whole input set. Reward capability is detected here, once
   * per adapter, and cached on the slot.
   */
  async setInputs(inputs: readonly InputConfig[]): Promise<readonly Slot[]> {
    validateInputs(inputs, this._mode, this._asset);
    await this._requireFeeds(
      inputs.map((input) => input.token),
      this._asset,
    );

    const detected = new Map<AnyProtocolAdapter, RewardCapability>();
    const active: ActiveInput[] = [];
    for (const input of inputs) {
      let rewards = detected.get(input.adapter);
      if (rewards === undefined) {
        rewards = await input.adapter.detectRewards();
        detected.set(input.adapter, rewards);
      }
      active.push({ ...input, rewards });
    }

    this._slots.replace(active);
    return this._slots.all();
  }

  /**
   * Switch the vault's underlying asset. Inputs are kept and must be
   * priceable against the new asset.
   */
  async setAsset(asset: Address): Promise<void> {
    const inputs = this._slots.active().map(({ input }) => input);
    validateInputs(inputs, this._mode, asset);
    await this._requireFeeds(
      inputs.map((input) => input.token),
      asset,
    );
    this._asset = asset;
  }

  setSlippage(maxSlippageBps: number, policy: SlippagePolicy = this._slippagePolicy): void {
    assertBps(maxSlippageBps);
    this._maxSlippageBps = maxSlippageBps;
    this._slippagePolicy = policy;
  }

  setDustThreshold(threshold: bigint): void {
    if (threshold < 0n) {
      throw new AllocationError("INVALID_DATA", "Dust threshold cannot be negative");
    }
    this._dustThreshold = threshold;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Valuation
  // ───────────────────────────────────────────────────────────────────────

  /** Asset value of a token amount. */
  async toAsset(token: Address, amount: bigint): Promise<bigint> {
    if (amount === 0n || sameAddress(token, this._asset)) return amount;
    return this._oracle.convert(token, amount, this._asset);
  }

  /** Token amount worth `amount` of the asset. */
  async fromAsset(token: Address, amount: bigint): Promise<bigint> {
    if (amount === 0n || sameAddress(token, this._asset)) return amount;
    return this._oracle.convert(this._asset, amount, token);
  }

  /**
   * Per-slot holdings in input units: the position plus any idle input
   * token left in custody by earlier swaps.
   */
  async investedInputs(): Promise<bigint[]> {
    const result = zeros();
    for (const position of this._slots.positions()) {
      if (position.kind === "single") {
        const staked = await position.adapter.investedValue(this._custody);
        result[position.slot.index] = staked + this._idle(position.slot.input.token);
        continue;
      }
      const [leg0, leg1] = await position.adapter.investedValue(this._custody);
      result[position.even.index] = leg0 + this._idle(position.even.input.token);
      result[position.odd.index] = leg1 + this._idle(position.odd.input.token);
    }
    return result;
  }

  /** Per-slot holdings valued in the asset. */
  async investedAll(): Promise<bigint[]> {
    const inputs = await this.investedInputs();
    const result = zeros();
    for (const { index, input } of this._slots.active()) {
      result[index] = await this.toAsset(input.token, inputs[index] ?? 0n);
    }
    return result;
  }

  async invested(index: number): Promise<bigint> {
    const all = await this.investedAll();
    return all[index] ?? 0n;
  }

  async totalInvested(): Promise<bigint> {
    let total = 0n;
    for (const value of await this.investedAll()) {
      total += value;
    }
    return total;
  }

  /**
   * Signed per-slot distance from the slot's share of `totalTarget`.
   * Positive values are held above target, negative ones still need
   * investing.
   */
  async excessLiquidity(totalTarget: bigint): Promise<bigint[]> {
    const result = zeros();
    const totalWeight = this._slots.totalWeight();
    if (totalWeight === 0) return result;

    const invested = await this.investedAll();
    for (const { index, input } of this._slots.active()) {
      const target = mulDiv(totalTarget, BigInt(input.weight), BigInt(totalWeight));
      result[index] = (invested[index] ?? 0n) - target;
    }
    return result;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Previews
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Per-slot asset amounts that move investments toward target weights.
   * With `amount` 0 the engine invests whatever `available` holds above the
   * cash buffer and pending redemption demand.
   */
  async previewInvest(amount: bigint, context: AllocationContext): Promise<bigint[]> {
    const result = zeros();
    const totalWeight = this._slots.totalWeight();
    if (totalWeight === 0) return result;

    const invested = await this.investedAll();
    let currentTotal = 0n;
    for (const value of invested) currentTotal += value;

    const toInvest =
      amount > 0n
        ? minBigInt(amount, context.available)
        : maxBigInt(
            0n,
            context.available - this._cashBuffer(context.totalAssets, totalWeight) - context.redemptionDemand,
          );
    if (toInvest === 0n) return result;

    const targetTotal = currentTotal + toInvest;
    let remaining = toInvest;
    for (const { index, input } of this._slots.active()) {
      if (remaining === 0n) break;
      const target = mulDiv(targetTotal, BigInt(input.weight), BigInt(totalWeight));
      const deficit = target - (invested[index] ?? 0n);
      if (deficit <= 0n) continue;
      const take = minBigInt(deficit, remaining);
      result[index] = take;
      remaining -= take;
    }
    return result;
  }

  /**
   * Per-slot input-unit amounts to unwind. With `amount` 0 the engine frees
   * what pending redemptions and the cash buffer need beyond `available`.
   * In paired mode the pair's amount sits on the even slot, in token0.
   */
  async previewLiquidate(amount: bigint, context: AllocationContext): Promise<bigint[]> {
    const result = zeros();
    const totalWeight = this._slots.totalWeight();
    const inputs = await this.investedInputs();
    const invested = await this.investedAll();
    let currentTotal = 0n;
    for (const value of invested) currentTotal += value;
    if (currentTotal === 0n) return result;

    const requested =
      amount > 0n
        ? amount
        : maxBigInt(
            0n,
            context.redemptionDemand + this._cashBuffer(context.totalAssets, totalWeight) - context.available,
          );
    const need = minBigInt(requested, currentTotal);
    if (need === 0n) return result;

    const active = this._slots.active();
    const takes = zeros();
    const newTotal = currentTotal - need;
    let remaining = need;

    // First pass: trim slots above their target after the withdrawal.
    for (const { index, input } of active) {
      if (remaining === 0n) break;
      const target = totalWeight > 0 ? mulDiv(newTotal, BigInt(input.weight), BigInt(totalWeight)) : 0n;
      const excess = (invested[index] ?? 0n) - target;
      if (excess <= 0n) continue;
      const take = minBigInt(excess, remaining);
      takes[index] = take;
      remaining -= take;
    }
    // Second pass: rounding leftovers from whatever is still held.
    for (const { index } of active) {
      if (remaining === 0n) break;
      const spare = (invested[index] ?? 0n) - (takes[index] ?? 0n);
      if (spare <= 0n) continue;
      const take = minBigInt(spare, remaining);
      takes[index] = (takes[index] ?? 0n) + take;
      remaining -= take;
    }

    for (const position of this._slots.positions()) {
      if (position.kind === "single") {
        const { index } = position.slot;
        const value = invested[index] ?? 0n;
        if (value > 0n) {
          result[index] = mulDiv(inputs[index] ?? 0n, takes[index] ?? 0n, value);
        }
        continue;
      }
      const even = position.even.index;
      const odd = position.odd.index;
      const pairValue = (invested[even] ?? 0n) + (invested[odd] ?? 0n);
      const pairTake = (takes[even] ?? 0n) + (takes[odd] ?? 0n);
      if (pairValue > 0n) {
        result[even] = mulDiv(inputs[even] ?? 0n, pairTake, pairValue);
      }
    }
    return result;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Execution
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Invest per-slot asset amounts. Swaps asset into each input token when
   * they differ, stakes the realized balance and checks the slippage floor.
   */
  async invest(amounts: readonly bigint[], params: readonly SwapParams[] = []): Promise<InvestResult> {
    this._requireArrays(amounts, params);
    this._requireOnlyActive(amounts);
    const movements: SlotMovement[] = [];

    for (const position of this._slots.positions()) {
      if (position.kind === "single") {
        const { index } = position.slot;
        const amount = amounts[index] ?? 0n;
        if (amount < this._dustThreshold) continue;
        movements.push(await this._investSingle(position, amount, params[index] ?? EMPTY_PARAMS));
        continue;
      }
      const amount0 = amounts[position.even.index] ?? 0n;
      const amount1 = amounts[position.odd.index] ?? 0n;
      if (amount0 < this._dustThreshold && amount1 < this._dustThreshold) continue;
      movements.push(
        ...(await this._investPair(
          position,
          [amount0, amount1],
          [params[position.even.index] ?? EMPTY_PARAMS, params[position.odd.index] ?? EMPTY_PARAMS],
        )),
      );
    }

    let totalInvested = 0n;
    for (const movement of movements) totalInvested += movement.value;
    return { movements, totalInvested };
  }

  /**
   * Unwind per-slot input amounts back to the asset. `panic` skips every
   * slippage floor so positions can always be exited.
   */
  async liquidate(
    amounts: readonly bigint[],
    panic = false,
    params: readonly SwapParams[] = [],
  ): Promise<LiquidateResult> {
    this._requireArrays(amounts, params);
    this._requireOnlyActive(amounts);
    const movements: SlotMovement[] = [];

    for (const position of this._slots.positions()) {
      if (position.kind === "single") {
        const { index } = position.slot;
        const amount = amounts[index] ?? 0n;
        if (amount < this._dustThreshold) continue;
        const movement = await this._liquidateSingle(position, amount, panic, params[index] ?? EMPTY_PARAMS);
        if (movement !== null) movements.push(movement);
        continue;
      }
      const amount0 = amounts[position.even.index] ?? 0n;
      if (amount0 < this._dustThreshold) continue;
      movements.push(
        ...(await this._liquidatePair(
          position,
          amount0,
          panic,
          [params[position.even.index] ?? EMPTY_PARAMS, params[position.odd.index] ?? EMPTY_PARAMS],
        )),
      );
    }

    let totalRecovered = 0n;
    for (const movement of movements) totalRecovered += movement.value;
    return { movements, totalRecovered };
  }

  /**
   * Claim rewards from every adapter that offers them and swap reward
   * tokens above the dust threshold into the asset. `params` are consumed
   * in order, one per distinct non-asset reward token.
   */
  async harvest(params: readonly SwapParams[] = []): Promise<HarvestResult> {
    const claims: RewardClaim[] = [];
    const claimed = new Set<AnyProtocolAdapter>();
    for (const { input } of this._slots.active()) {
      if (input.rewards.kind === "none" || claimed.has(input.adapter)) continue;
      claimed.add(input.adapter);
      claims.push(...(await input.adapter.claimRewards(this._custody, input.rewards)));
    }

    let assetsReceived = 0n;
    const tokens: Address[] = [];
    for (const claim of claims) {
      if (sameAddress(claim.token, this._asset)) {
        assetsReceived += claim.amount;
      } else if (!tokens.some((token) => sameAddress(token, claim.token))) {
        tokens.push(claim.token);
      }
    }

    for (const [position, token] of tokens.entries()) {
      const balance = this._custody.balanceOf(token);
      if (balance < this._dustThreshold) continue;
      const swap = await this._swapper.decodeAndSwap(
        this._custody,
        token,
        this._asset,
        balance,
        params[position] ?? EMPTY_PARAMS,
      );
      assetsReceived += swap.received;
    }

    return { claims, assetsReceived };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshots
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): AllocationSnapshot {
    return {
      asset: this._asset,
      slots: this._slots.all(),
      maxSlippageBps: this._maxSlippageBps,
      slippagePolicy: this._slippagePolicy,
      dustThreshold: this._dustThreshold,
    };
  }

  restore(snapshot: AllocationSnapshot): void {
    this._asset = snapshot.asset;
    this._slots.restore(snapshot.slots);
    this._maxSlippageBps = snapshot.maxSlippageBps;
    this._slippagePolicy = snapshot.slippagePolicy;
    this._dustThreshold = snapshot.dustThreshold;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal: single-token positions
  // ───────────────────────────────────────────────────────────────────────

  private async _investSingle(
    position: SinglePosition,
    amount: bigint,
    params: SwapParams,
  ): Promise<SlotMovement> {
    const { index, input } = position.slot;
    const before = await position.adapter.investedValue(this._custody);

    let expected = amount;
    let stakeAmount = amount;
    if (!sameAddress(input.token, this._asset)) {
      expected = await this.fromAsset(input.token, amount);
      const swap = await this._swapper.decodeAndSwap(this._custody, this._asset, input.token, amount, params);
      if (this._slippagePolicy === "per-leg") {
        this._requireFloor(swap.received, expected, this._maxSlippageBps, `swap into slot ${String(index)}`);
      }
      // Stake the realized balance so swap dust from earlier runs is absorbed.
      stakeAmount = this._custody.balanceOf(input.token);
    }

    await position.adapter.stake(this._custody, stakeAmount);
    const positionDelta = (await position.adapter.investedValue(this._custody)) - before;

    if (this._slippagePolicy === "per-leg") {
      this._requireFloor(positionDelta, stakeAmount, this._maxSlippageBps, `stake into slot ${String(index)}`);
    } else {
      this._requireFloor(positionDelta, expected, this._compoundBps(), `invest into slot ${String(index)}`);
    }

    return { index, token: input.token, amount, positionDelta, value: amount };
  }

  private async _liquidateSingle(
    position: SinglePosition,
    requested: bigint,
    panic: boolean,
    params: SwapParams,
  ): Promise<SlotMovement | null> {
    const { index, input } = position.slot;
    const staked = await position.adapter.investedValue(this._custody);
    const amount = minBigInt(requested, staked);
    if (amount < this._dustThreshold) return null;

    const expected = await this.toAsset(input.token, amount);
    const tokenBefore = this._custody.balanceOf(input.token);
    await position.adapter.unstake(this._custody, amount);
    const unstaked = this._custody.balanceOf(input.token) - tokenBefore;
    const positionDelta = staked - (await position.adapter.investedValue(this._custody));

    if (!panic && this._slippagePolicy === "per-leg") {
      this._requireFloor(unstaked, amount, this._maxSlippageBps, `unstake from slot ${String(index)}`);
    }

    const received = sameAddress(input.token, this._asset)
      ? unstaked
      : await this._swapToAsset(input.token, panic, params, `swap out of slot ${String(index)}`);

    if (!panic && this._slippagePolicy === "compound") {
      this._requireFloor(received, expected, this._compoundBps(), `liquidate slot ${String(index)}`);
    }

    return { index, token: input.token, amount, positionDelta, value: received };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal: paired positions
  // ───────────────────────────────────────────────────────────────────────

  private async _investPair(
    position: PairedPosition,
    amounts: Pair<bigint>,
    params: Pair<SwapParams>,
  ): Promise<SlotMovement[]> {
    const { adapter, even, odd } = position;
    const legs: Pair<ActiveSlot> = [even, odd];
    const [before0, before1] = await adapter.investedValue(this._custody);
    const valueBefore = await this._pairValue(position);

    const staged: bigint[] = [0n, 0n];
    const spent: bigint[] = [0n, 0n];
    for (const [leg, slot] of legs.entries()) {
      const amount = amounts[leg] ?? 0n;
      if (amount < this._dustThreshold) {
        staged[leg] = this._idle(slot.input.token);
        continue;
      }
      if (sameAddress(slot.input.token, this._asset)) {
        staged[leg] = amount;
        continue;
      }
      const expected = await this.fromAsset(slot.input.token, amount);
      const swap = await this._swapper.decodeAndSwap(
        this._custody,
        this._asset,
        slot.input.token,
        amount,
        params[leg] ?? EMPTY_PARAMS,
      );
      if (this._slippagePolicy === "per-leg") {
        this._requireFloor(swap.received, expected, this._maxSlippageBps, `swap into slot ${String(slot.index)}`);
      }
      staged[leg] = this._custody.balanceOf(slot.input.token);
      spent[leg] = amount;
    }

    const [ref0, ref1] = await adapter.ratio(this._custody);
    if (ref0 <= 0n || ref1 <= 0n) {
      throw new AllocationError("INVALID_DATA", `Pair at slot ${String(even.index)} reports an empty ratio`);
    }
    const balance0 = staged[0] ?? 0n;
    const balance1 = staged[1] ?? 0n;
    let use0 = balance0;
    let use1 = mulDiv(balance0, ref1, ref0);
    if (use1 > balance1) {
      use1 = balance1;
      use0 = mulDiv(balance1, ref0, ref1);
    }
    await adapter.stake(this._custody, [use0, use1]);

    // Asset left unstaked stays with the vault and is not counted as spent.
    if (sameAddress(even.input.token, this._asset)) spent[0] = use0;
    if (sameAddress(odd.input.token, this._asset)) spent[1] = use1;
    const spent0 = spent[0] ?? 0n;
    const spent1 = spent[1] ?? 0n;

    const [after0, after1] = await adapter.investedValue(this._custody);
    const delta0 = after0 - before0;
    const delta1 = after1 - before1;

    if (this._slippagePolicy === "per-leg") {
      this._requireFloor(delta0, use0, this._maxSlippageBps, `stake into slot ${String(even.index)}`);
      this._requireFloor(delta1, use1, this._maxSlippageBps, `stake into slot ${String(odd.index)}`);
    } else {
      const gained = (await this._pairValue(position)) - valueBefore;
      this._requireFloor(gained, spent0 + spent1, this._compoundBps(), `invest into pair ${String(even.index)}`);
    }

    return [
      { index: even.index, token: even.input.token, amount: spent0, positionDelta: delta0, value: spent0 },
      { index: odd.index, token: odd.input.token, amount: spent1, positionDelta: delta1, value: spent1 },
    ];
  }

  private async _liquidatePair(
    position: PairedPosition,
    requested0: bigint,
    panic: boolean,
    params: Pair<SwapParams>,
  ): Promise<SlotMovement[]> {
    const { adapter, even, odd } = position;
    const [staked0, staked1] = await adapter.investedValue(this._custody);
    const amount0 = minBigInt(requested0, staked0);
    if (amount0 < this._dustThreshold || staked0 === 0n) return [];

    const stakedValue =
      (await this.toAsset(even.input.token, staked0)) + (await this.toAsset(odd.input.token, staked1));
    const expected = mulDiv(stakedValue, amount0, staked0);

    const before0 = this._custody.balanceOf(even.input.token);
    const before1 = this._custody.balanceOf(odd.input.token);
    await adapter.unstake(this._custody, amount0);
    const unstaked0 = this._custody.balanceOf(even.input.token) - before0;
    const unstaked1 = this._custody.balanceOf(odd.input.token) - before1;
    const [after0, after1] = await adapter.investedValue(this._custody);

    if (!panic && this._slippagePolicy === "per-leg") {
      const unstakedValue =
        (await this.toAsset(even.input.token, unstaked0)) + (await this.toAsset(odd.input.token, unstaked1));
      this._requireFloor(unstakedValue, expected, this._maxSlippageBps, `unstake from pair ${String(even.index)}`);
    }

    const received0 = sameAddress(even.input.token, this._asset)
      ? unstaked0
      : await this._swapToAsset(even.input.token, panic, params[0], `swap out of slot ${String(even.index)}`);
    const received1 = sameAddress(odd.input.token, this._asset)
      ? unstaked1
      : await this._swapToAsset(odd.input.token, panic, params[1], `swap out of slot ${String(odd.index)}`);

    if (!panic && this._slippagePolicy === "compound") {
      this._requireFloor(received0 + received1, expected, this._compoundBps(), `liquidate pair ${String(even.index)}`);
    }

    return [
      { index: even.index, token: even.input.token, amount: amount0, positionDelta: staked0 - after0, value: received0 },
      { index: odd.index, token: odd.input.token, amount: unstaked1, positionDelta: staked1 - after1, value: received1 },
    ];
  }

  private async _pairValue(position: PairedPosition): Promise<bigint> {
    const [leg0, leg1] = await position.adapter.investedValue(this._custody);
    return (
      (await this.toAsset(position.even.input.token, leg0 + this._idle(position.even.input.token))) +
      (await this.toAsset(position.odd.input.token, leg1 + this._idle(position.odd.input.token)))
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal: helpers
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Swap the full custody balance of `token` into the asset, sweeping
   * dust left by earlier runs along with the unstaked amount.
   */
  private async _swapToAsset(token: Address, panic: boolean, params: SwapParams, what: string): Promise<bigint> {
    const balance = this._custody.balanceOf(token);
    if (balance === 0n) return 0n;
    const swap = await this._swapper.decodeAndSwap(this._custody, token, this._asset, balance, params);
    if (!panic && this._slippagePolicy === "per-leg") {
      this._requireFloor(swap.received, await this.toAsset(token, balance), this._maxSlippageBps, what);
    }
    return swap.received;
  }

  /** Idle custody balance of an input token. The asset itself is never idle here. */
  private _idle(token: Address): bigint {
    return sameAddress(token, this._asset) ? 0n : this._custody.balanceOf(token);
  }

  private _cashBuffer(totalAssets: bigint, totalWeight: number): bigint {
    return mulDiv(totalAssets, BigInt(10_000 - totalWeight), 10_000n);
  }

  private _compoundBps(): number {
    return Math.min(10_000, this._maxSlippageBps * 2);
  }

  private _requireFloor(actual: bigint, expected: bigint, bps: number, what: string): void {
    const floor = applyBps(expected, bps);
    if (actual < floor) {
      throw new AllocationError(
        "AMOUNT_TOO_LOW",
        `Slippage exceeded on ${what}: got ${actual.toString()}, floor ${floor.toString()}`,
      );
    }
  }

  private async _requireFeeds(tokens: readonly Address[], asset: Address): Promise<void> {
    let foreign = false;
    for (const token of tokens) {
      if (sameAddress(token, asset)) continue;
      foreign = true;
      if (!(await this._oracle.hasFeed(token))) {
        throw new AllocationError("MISSING_ORACLE", `No price feed for input token ${token}`);
      }
    }
    if (foreign && !(await this._oracle.hasFeed(asset))) {
      throw new AllocationError("MISSING_ORACLE", `No price feed for asset ${asset}`);
    }
  }

  private _requireArrays(amounts: readonly bigint[], params: readonly SwapParams[]): void {
    if (amounts.length > MAX_INPUTS || params.length > MAX_INPUTS) {
      throw new AllocationError(
        "INCORRECT_ARRAY_LENGTHS",
        `Expected at most ${String(MAX_INPUTS)} amounts and swap params`,
      );
    }
    if (params.length > 0 && params.length !== amounts.length) {
      throw new AllocationError(
        "INCORRECT_ARRAY_LENGTHS",
        `Got ${String(amounts.length)} amounts but ${String(params.length)} swap params`,
      );
    }
    for (const amount of amounts) {
      if (amount < 0n) {
        throw new AllocationError("INVALID_DATA", "Amounts cannot be negative");
      }
    }
  }

  private _requireOnlyActive(amounts: readonly bigint[]): void {
    for (const [index, amount] of amounts.entries()) {
      if (amount >= this._dustThreshold && amount > 0n && this._slots.get(index).kind === "empty") {
        throw new AllocationError("WRONG_TOKEN", `Slot ${String(index)} is empty`);
      }
    }
  }
}
