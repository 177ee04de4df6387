/**
 * @ballast/allocation/testing — In-process stand-ins for the engine's
 * collaborators.
 *
 * Positions are receipt-token balances in the Custody passed to each
 * call, so a custody snapshot covers them. Nothing here touches a network.
 */

import type { Address } from "@ballast/types";
import { sameAddress } from "@ballast/types";
import type { Custody } from "@ballast/ledger";
import { BPS_DENOMINATOR, mulDiv, pow10 } from "@ballast/ledger";
import type {
  Pair,
  PairedProtocolAdapter,
  PriceOracle,
  ProtocolAdapter,
  RewardCapability,
  RewardClaim,
  SwapParams,
  SwapResult,
  Swapper,
} from "./types.js";
import { AllocationError } from "./types.js";

// =============================================================================
// Oracle
// =============================================================================

interface Feed {
  /** Price of one whole token in a common quote unit */
  readonly price: bigint;
  readonly decimals: number;
}

export class StaticPriceOracle implements PriceOracle {
  private readonly _feeds = new Map<string, Feed>();

  setPrice(token: Address, price: bigint, decimals: number): this {
    this._feeds.set(token.toLowerCase(), { price, decimals });
    return this;
  }

  removeFeed(token: Address): void {
    this._feeds.delete(token.toLowerCase());
  }

  async hasFeed(token: Address): Promise<boolean> {
    return this._feeds.has(token.toLowerCase());
  }

  async convert(from: Address, amount: bigint, to: Address): Promise<bigint> {
    const source = this._feed(from);
    const target = this._feed(to);
    return mulDiv(
      amount * source.price,
      pow10(target.decimals),
      target.price * pow10(source.decimals),
    );
  }

  private _feed(token: Address): Feed {
    const feed = this._feeds.get(token.toLowerCase());
    if (feed === undefined) {
      throw new AllocationError("MISSING_ORACLE", `No price feed for ${token}`);
    }
    return feed;
  }
}

// =============================================================================
// Swapper
// =============================================================================

export interface SwapCall {
  readonly inputToken: Address;
  readonly outputToken: Address;
  readonly amount: bigint;
  readonly params: SwapParams;
}

/**
 * Swaps at the oracle rate, minus a configurable shortfall.
 */
export class OracleSwapper implements Swapper {
  readonly calls: SwapCall[] = [];
  shortfallBps = 0;
  failure: Error | null = null;
  private readonly _oracle: PriceOracle;

  constructor(oracle: PriceOracle) {
    this._oracle = oracle;
  }

  async decodeAndSwap(
    custody: Custody,
    inputToken: Address,
    outputToken: Address,
    amount: bigint,
    params: SwapParams,
  ): Promise<SwapResult> {
    this.calls.push({ inputToken, outputToken, amount, params });
    if (this.failure !== null) throw this.failure;

    const quoted = sameAddress(inputToken, outputToken)
      ? amount
      : await this._oracle.convert(inputToken, amount, outputToken);
    const received = mulDiv(quoted, BPS_DENOMINATOR - BigInt(this.shortfallBps), BPS_DENOMINATOR);
    custody.debit(inputToken, amount);
    custody.credit(outputToken, received);
    return { spent: amount, received };
  }
}

// =============================================================================
// Adapters
// =============================================================================

export interface MockReward {
  readonly capability: RewardCapability;
  readonly token: Address;
  /** Amount credited on each claim */
  readonly amount: bigint;
}

const NO_REWARD: MockReward = {
  capability: { kind: "none" },
  token: "0x0000000000000000000000000000000000000000",
  amount: 0n,
};

export interface LendingAdapterOptions {
  readonly token: Address;
  readonly receipt: Address;
  readonly reward?: MockReward;
}

/**
 * Lending-market style position: one receipt unit per input unit.
 */
export class MockLendingAdapter implements ProtocolAdapter {
  readonly kind = "single";
  readonly token: Address;
  readonly receipt: Address;
  /** Haircut applied when entering the position */
  stakeLossBps = 0;
  /** Haircut applied when leaving the position */
  unstakeLossBps = 0;
  readonly claims: RewardCapability["kind"][] = [];
  private readonly _reward: MockReward;

  constructor(options: LendingAdapterOptions) {
    this.token = options.token;
    this.receipt = options.receipt;
    this._reward = options.reward ?? NO_REWARD;
  }

  async detectRewards(): Promise<RewardCapability> {
    return this._reward.capability;
  }

  async claimRewards(custody: Custody, capability: RewardCapability): Promise<readonly RewardClaim[]> {
    this.claims.push(capability.kind);
    if (capability.kind === "none" || this._reward.amount === 0n) return [];
    custody.credit(this._reward.token, this._reward.amount);
    return [{ token: this._reward.token, amount: this._reward.amount }];
  }

  async stake(custody: Custody, amount: bigint): Promise<bigint> {
    const minted = amount - mulDiv(amount, BigInt(this.stakeLossBps), BPS_DENOMINATOR);
    custody.debit(this.token, amount);
    custody.credit(this.receipt, minted);
    return minted;
  }

  async unstake(custody: Custody, amount: bigint): Promise<bigint> {
    const released = amount - mulDiv(amount, BigInt(this.unstakeLossBps), BPS_DENOMINATOR);
    custody.debit(this.receipt, amount);
    custody.credit(this.token, released);
    return released;
  }

  async investedValue(custody: Custody): Promise<bigint> {
    return custody.balanceOf(this.receipt);
  }

  /** Simulate interest: grows the position without any deposit. */
  accrue(custody: Custody, amount: bigint): void {
    custody.credit(this.receipt, amount);
  }
}

export interface PairAdapterOptions {
  readonly tokens: Pair<Address>;
  /** One receipt per leg so each leg's share stays readable */
  readonly receipts: Pair<Address>;
  readonly ratio: Pair<bigint>;
  readonly reward?: MockReward;
}

/**
 * AMM-style pair position holding both legs at a fixed ratio.
 */
export class MockPairAdapter implements PairedProtocolAdapter {
  readonly kind = "paired";
  readonly tokens: Pair<Address>;
  readonly receipts: Pair<Address>;
  readonly claims: RewardCapability["kind"][] = [];
  private readonly _ratio: Pair<bigint>;
  private readonly _reward: MockReward;

  constructor(options: PairAdapterOptions) {
    this.tokens = options.tokens;
    this.receipts = options.receipts;
    this._ratio = options.ratio;
    this._reward = options.reward ?? NO_REWARD;
  }

  async detectRewards(): Promise<RewardCapability> {
    return this._reward.capability;
  }

  async claimRewards(custody: Custody, capability: RewardCapability): Promise<readonly RewardClaim[]> {
    this.claims.push(capability.kind);
    if (capability.kind === "none" || this._reward.amount === 0n) return [];
    custody.credit(this._reward.token, this._reward.amount);
    return [{ token: this._reward.token, amount: this._reward.amount }];
  }

  async ratio(): Promise<Pair<bigint>> {
    return this._ratio;
  }

  async stake(custody: Custody, amounts: Pair<bigint>): Promise<Pair<bigint>> {
    const [amount0, amount1] = amounts;
    custody.debit(this.tokens[0], amount0);
    custody.debit(this.tokens[1], amount1);
    custody.credit(this.receipts[0], amount0);
    custody.credit(this.receipts[1], amount1);
    return amounts;
  }

  async unstake(custody: Custody, amount0: bigint): Promise<Pair<bigint>> {
    const [leg0, leg1] = await this.investedValue(custody);
    if (leg0 === 0n) return [0n, 0n];
    const amount1 = mulDiv(leg1, amount0, leg0);
    custody.debit(this.receipts[0], amount0);
    custody.debit(this.receipts[1], amount1);
    custody.credit(this.tokens[0], amount0);
    custody.credit(this.tokens[1], amount1);
    return [amount0, amount1];
  }

  async investedValue(custody: Custody): Promise<Pair<bigint>> {
    return [custody.balanceOf(this.receipts[0]), custody.balanceOf(this.receipts[1])];
  }
}
