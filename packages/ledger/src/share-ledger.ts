/**
 * @ballast/ledger — ShareLedger.
 *
 * Authoritative share accounting for a single vault: converts assets
 * to shares and back, holds share balances and allowances, and keeps
 * the fee checkpoint.
 *
 * API surface:
 * - convertToShares() / convertToAssets() / sharePrice()
 * - previewDeposit() / previewMint() / previewWithdraw() / previewRedeem()
 * - deposit() / mint() / withdraw() / redeem() and their safe variants
 * - seedLiquidity() — first deposit once minLiquidity is configured
 * - mintShares() / burnShares() / transfer() / approve()
 * - snapshot() / restore()
 *
 * Rounding always favours the pool: the depositor receives shares
 * rounded down, the withdrawer burns shares rounded up.
 */

import type { Address } from "@ballast/types";
import { ZERO_ADDRESS, sameAddress } from "@ballast/types";
import type { Custody } from "./custody.js";
import { bpsOf, mulDiv, pow10 } from "./money-math.js";
import type {
  FeeSchedule,
  Rounding,
  SafeDepositOptions,
  SafeMintOptions,
  SafeRedeemOptions,
  SafeWithdrawOptions,
  ShareLedgerInit,
  ShareLedgerSnapshot,
  ShareMovement,
  Valuation,
  VaultState,
} from "./types.js";
import { DEFAULT_FEES, LedgerError, MAX_FEES } from "./types.js";

type MutableVaultState = { -readonly [K in keyof VaultState]: VaultState[K] };

function key(address: Address): string {
  return address.toLowerCase();
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${key(owner)}:${key(spender)}`;
}

/**
 * Validate a fee schedule against the protocol ceilings.
 */
export function validateFees(fees: FeeSchedule): FeeSchedule {
  for (const component of ["perf", "mgmt", "entry", "exit"] as const) {
    const value = fees[component];
    if (!Number.isInteger(value) || value < 0) {
      throw new LedgerError("INVALID_DATA", `Fee '${component}' must be a non-negative integer`);
    }
    if (value > MAX_FEES[component]) {
      throw new LedgerError(
        "AMOUNT_TOO_HIGH",
        `Fee '${component}' of ${String(value)} bps exceeds the ${String(MAX_FEES[component])} bps ceiling`,
      );
    }
  }
  return { ...fees };
}

export class ShareLedger {
  private _state: MutableVaultState;
  private readonly _balances = new Map<string, bigint>();
  private readonly _allowances = new Map<string, bigint>();
  private readonly _exempt = new Set<string>();
  private readonly _custody: Custody;

  constructor(init: ShareLedgerInit, custody: Custody) {
    if (sameAddress(init.feeCollector, ZERO_ADDRESS)) {
      throw new LedgerError("ADDRESS_IS_ZERO", "Fee collector cannot be the zero address");
    }
    const weiPerAsset = pow10(init.assetDecimals);
    this._custody = custody;
    this._state = {
      vault: init.vault,
      asset: init.asset,
      weiPerAsset,
      weiPerShare: pow10(init.shareDecimals),
      totalSupply: 0n,
      lastSharePrice: weiPerAsset,
      lastCheckpointTime: init.now ?? 0,
      maxTotalAssets: init.maxTotalAssets ?? 2n ** 256n - 1n,
      minLiquidity: init.minLiquidity ?? 0n,
      claimableAssetFees: 0n,
      fees: validateFees(init.fees ?? DEFAULT_FEES),
      feeCollector: init.feeCollector,
      profitCooldown: init.profitCooldown ?? 0,
    };
    for (const address of init.exempt ?? []) {
      this._exempt.add(key(address));
    }
  }

  // ─── State ──────────────────────────────────────────────────────────

  get state(): Readonly<VaultState> {
    return this._state;
  }

  get totalSupply(): bigint {
    return this._state.totalSupply;
  }

  get claimableAssetFees(): bigint {
    return this._state.claimableAssetFees;
  }

  balanceOf(owner: Address): bigint {
    return this._balances.get(key(owner)) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  isExempt(caller: Address): boolean {
    return this._exempt.has(key(caller));
  }

  // ─── Conversions ────────────────────────────────────────────────────

  convertToShares(assets: bigint, valuation: Valuation, rounding: Rounding = "down"): bigint {
    const { totalSupply, weiPerShare, weiPerAsset } = this._state;
    if (totalSupply === 0n || valuation.totalAssets === 0n) {
      return mulDiv(assets, weiPerShare, weiPerAsset, rounding);
    }
    return mulDiv(assets, totalSupply, valuation.totalAssets, rounding);
  }

  convertToAssets(shares: bigint, valuation: Valuation, rounding: Rounding = "down"): bigint {
    const { totalSupply, weiPerShare, weiPerAsset } = this._state;
    if (totalSupply === 0n) {
      return mulDiv(shares, weiPerAsset, weiPerShare, rounding);
    }
    return mulDiv(shares, valuation.totalAssets, totalSupply, rounding);
  }

  /**
   * Asset value of one whole share (`weiPerShare` units).
   */
  sharePrice(valuation: Valuation): bigint {
    const { totalSupply, weiPerShare, weiPerAsset } = this._state;
    if (totalSupply === 0n) {
      return weiPerAsset;
    }
    return mulDiv(valuation.totalAssets, weiPerShare, totalSupply);
  }

  /**
   * Assets the owner's whole balance converts to, before exit fees.
   */
  assetsOf(owner: Address, valuation: Valuation): bigint {
    return this.convertToAssets(this.balanceOf(owner), valuation);
  }

  // ─── Previews ───────────────────────────────────────────────────────

  entryFee(assets: bigint, caller?: Address): bigint {
    if (caller !== undefined && this.isExempt(caller)) return 0n;
    return bpsOf(assets, this._state.fees.entry, "up");
  }

  exitFee(assets: bigint, caller?: Address): bigint {
    if (caller !== undefined && this.isExempt(caller)) return 0n;
    return bpsOf(assets, this._state.fees.exit, "up");
  }

  previewDeposit(assets: bigint, valuation: Valuation, caller?: Address): bigint {
    const fee = this.entryFee(assets, caller);
    return this.convertToShares(assets - fee, valuation, "down");
  }

  /** Assets (fee included) needed to mint `shares`. */
  previewMint(shares: bigint, valuation: Valuation, caller?: Address): bigint {
    const assets = this.convertToAssets(shares, valuation, "up");
    return assets + this.entryFee(assets, caller);
  }

  /** Shares burnt to withdraw exactly `assets` after the exit fee. */
  previewWithdraw(assets: bigint, valuation: Valuation, caller?: Address): bigint {
    const fee = this.exitFee(assets, caller);
    return this.convertToShares(assets + fee, valuation, "up");
  }

  previewRedeem(shares: bigint, valuation: Valuation, caller?: Address): bigint {
    const gross = this.convertToAssets(shares, valuation, "down");
    return gross - this.exitFee(gross, caller);
  }

  maxDeposit(caller: Address, valuation: Valuation): bigint {
    if (this.isExempt(caller)) return this._state.maxTotalAssets;
    const room = this._state.maxTotalAssets - valuation.totalAssets;
    return room > 0n ? room : 0n;
  }

  maxWithdraw(owner: Address, valuation: Valuation): bigint {
    return this.previewRedeem(this.balanceOf(owner), valuation, owner);
  }

  maxRedeem(owner: Address): bigint {
    return this.balanceOf(owner);
  }

  // ─── Deposits ───────────────────────────────────────────────────────

  deposit(caller: Address, assets: bigint, receiver: Address, valuation: Valuation): ShareMovement {
    this._requireLiquidity(valuation);
    return this._deposit(caller, assets, receiver, valuation);
  }

  safeDeposit(
    caller: Address,
    assets: bigint,
    receiver: Address,
    valuation: Valuation,
    options: SafeDepositOptions,
  ): ShareMovement {
    this._requireDeadline(options.deadline, options.now);
    const shares = this.previewDeposit(assets, valuation, caller);
    if (shares < options.minSharesOut) {
      throw new LedgerError(
        "AMOUNT_TOO_LOW",
        `Deposit yields ${shares} shares, below the ${options.minSharesOut} minimum`,
      );
    }
    return this.deposit(caller, assets, receiver, valuation);
  }

  /**
   * First deposit into a vault that enforces a minimum liquidity.
   * Also sets the deposit cap.
   */
  seedLiquidity(
    caller: Address,
    assets: bigint,
    maxTotalAssets: bigint,
    valuation: Valuation,
  ): ShareMovement {
    if (assets < this._state.minLiquidity) {
      throw new LedgerError(
        "LIQUIDITY_TOO_LOW",
        `Seed of ${assets} is below the ${this._state.minLiquidity} minimum liquidity`,
      );
    }
    this.setMaxTotalAssets(maxTotalAssets);
    return this._deposit(caller, assets, caller, valuation);
  }

  mint(caller: Address, shares: bigint, receiver: Address, valuation: Valuation): ShareMovement {
    this._requirePositive(shares, "shares");
    this._requireReceiver(receiver);
    this._requireLiquidity(valuation);

    const net = this.convertToAssets(shares, valuation, "up");
    const fee = this.entryFee(net, caller);
    const assets = net + fee;
    this._requireCap(caller, assets, valuation);

    this._custody.credit(this._state.asset, assets);
    this._state.claimableAssetFees += fee;
    this.mintShares(receiver, shares);
    return { assets, shares, fee };
  }

  safeMint(
    caller: Address,
    shares: bigint,
    receiver: Address,
    valuation: Valuation,
    options: SafeMintOptions,
  ): ShareMovement {
    this._requireDeadline(options.deadline, options.now);
    const assets = this.previewMint(shares, valuation, caller);
    if (assets > options.maxAssetsIn) {
      throw new LedgerError(
        "AMOUNT_TOO_HIGH",
        `Mint costs ${assets} assets, above the ${options.maxAssetsIn} maximum`,
      );
    }
    return this.mint(caller, shares, receiver, valuation);
  }

  // ─── Withdrawals ────────────────────────────────────────────────────

  withdraw(
    caller: Address,
    assets: bigint,
    receiver: Address,
    owner: Address,
    valuation: Valuation,
  ): ShareMovement {
    this._requirePositive(assets, "assets");
    this._requireReceiver(receiver);

    const fee = this.exitFee(assets, caller);
    const shares = this.convertToShares(assets + fee, valuation, "up");
    if (shares > this.balanceOf(owner)) {
      throw new LedgerError(
        "AMOUNT_TOO_HIGH",
        `Withdrawal of ${assets} exceeds the assets of ${owner}`,
      );
    }
    return this._release(caller, owner, assets, shares, fee, valuation);
  }

  safeWithdraw(
    caller: Address,
    assets: bigint,
    receiver: Address,
    owner: Address,
    valuation: Valuation,
    options: SafeWithdrawOptions,
  ): ShareMovement {
    this._requireDeadline(options.deadline, options.now);
    const shares = this.previewWithdraw(assets, valuation, caller);
    if (shares > options.maxSharesIn) {
      throw new LedgerError(
        "AMOUNT_TOO_HIGH",
        `Withdrawal burns ${shares} shares, above the ${options.maxSharesIn} maximum`,
      );
    }
    return this.withdraw(caller, assets, receiver, owner, valuation);
  }

  redeem(
    caller: Address,
    shares: bigint,
    receiver: Address,
    owner: Address,
    valuation: Valuation,
  ): ShareMovement {
    this._requirePositive(shares, "shares");
    this._requireReceiver(receiver);
    if (shares > this.balanceOf(owner)) {
      throw new LedgerError(
        "AMOUNT_TOO_HIGH",
        `Redemption of ${shares} shares exceeds the balance of ${owner}`,
      );
    }

    const gross = this.convertToAssets(shares, valuation, "down");
    const fee = this.exitFee(gross, caller);
    const assets = gross - fee;
    if (assets === 0n) {
      throw new LedgerError("AMOUNT_TOO_LOW", `Redemption of ${shares} shares yields no assets`);
    }
    return this._release(caller, owner, assets, shares, fee, valuation);
  }

  safeRedeem(
    caller: Address,
    shares: bigint,
    receiver: Address,
    owner: Address,
    valuation: Valuation,
    options: SafeRedeemOptions,
  ): ShareMovement {
    this._requireDeadline(options.deadline, options.now);
    const assets = this.previewRedeem(shares, valuation, caller);
    if (assets < options.minAssetsOut) {
      throw new LedgerError(
        "AMOUNT_TOO_LOW",
        `Redemption yields ${assets} assets, below the ${options.minAssetsOut} minimum`,
      );
    }
    return this.redeem(caller, shares, receiver, owner, valuation);
  }

  // ─── Share Movements ────────────────────────────────────────────────

  mintShares(to: Address, shares: bigint): void {
    if (shares < 0n) {
      throw new LedgerError("INVALID_DATA", `Cannot mint negative shares: ${shares}`);
    }
    this._balances.set(key(to), this.balanceOf(to) + shares);
    this._state.totalSupply += shares;
  }

  burnShares(from: Address, shares: bigint): void {
    const balance = this.balanceOf(from);
    if (shares > balance) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        `${from} holds ${balance} shares, cannot burn ${shares}`,
      );
    }
    this._balances.set(key(from), balance - shares);
    this._state.totalSupply -= shares;
  }

  transfer(from: Address, to: Address, shares: bigint): void {
    this._requireReceiver(to, true);
    const balance = this.balanceOf(from);
    if (shares > balance) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        `${from} holds ${balance} shares, cannot transfer ${shares}`,
      );
    }
    this._balances.set(key(from), balance - shares);
    this._balances.set(key(to), this.balanceOf(to) + shares);
  }

  approve(owner: Address, spender: Address, shares: bigint): void {
    if (sameAddress(spender, ZERO_ADDRESS)) {
      throw new LedgerError("ADDRESS_IS_ZERO", "Spender cannot be the zero address");
    }
    this._allowances.set(allowanceKey(owner, spender), shares);
  }

  /**
   * Spend `shares` of the allowance granted by `owner` to `caller`.
   * A caller acting on its own shares needs no allowance.
   */
  spendAllowance(owner: Address, caller: Address, shares: bigint): void {
    if (sameAddress(owner, caller)) return;
    const allowed = this.allowance(owner, caller);
    if (allowed < shares) {
      throw new LedgerError(
        "UNAUTHORIZED",
        `${caller} may move ${allowed} shares of ${owner}, not ${shares}`,
      );
    }
    this._allowances.set(allowanceKey(owner, caller), allowed - shares);
  }

  // ─── Fees & Checkpoints ─────────────────────────────────────────────

  checkpoint(sharePrice: bigint, time: number): void {
    this._state.lastSharePrice = sharePrice;
    this._state.lastCheckpointTime = time;
  }

  /**
   * Move the claimable entry/exit fees out of custody.
   * Returns the amount released to the fee collector.
   */
  releaseAssetFees(): bigint {
    const amount = this._state.claimableAssetFees;
    if (amount > 0n) {
      this._custody.debit(this._state.asset, amount);
      this._state.claimableAssetFees = 0n;
    }
    return amount;
  }

  // ─── Admin ──────────────────────────────────────────────────────────

  setFees(fees: FeeSchedule): void {
    this._state.fees = validateFees(fees);
  }

  setMaxTotalAssets(maxTotalAssets: bigint): void {
    if (maxTotalAssets < 0n) {
      throw new LedgerError("INVALID_DATA", "maxTotalAssets cannot be negative");
    }
    this._state.maxTotalAssets = maxTotalAssets;
  }

  setMinLiquidity(minLiquidity: bigint): void {
    if (minLiquidity < 0n) {
      throw new LedgerError("INVALID_DATA", "minLiquidity cannot be negative");
    }
    this._state.minLiquidity = minLiquidity;
  }

  setFeeCollector(feeCollector: Address): void {
    if (sameAddress(feeCollector, ZERO_ADDRESS)) {
      throw new LedgerError("ADDRESS_IS_ZERO", "Fee collector cannot be the zero address");
    }
    this._state.feeCollector = feeCollector;
  }

  setExempt(caller: Address, exempt: boolean): void {
    if (exempt) {
      this._exempt.add(key(caller));
    } else {
      this._exempt.delete(key(caller));
    }
  }

  /**
   * Switch the base asset. The fee high-water mark is re-expressed in
   * the new asset by the caller (`lastSharePrice`).
   */
  setAsset(asset: Address, assetDecimals: number, lastSharePrice: bigint): void {
    if (sameAddress(asset, ZERO_ADDRESS)) {
      throw new LedgerError("ADDRESS_IS_ZERO", "Asset cannot be the zero address");
    }
    this._state.asset = asset;
    this._state.weiPerAsset = pow10(assetDecimals);
    this._state.lastSharePrice = lastSharePrice;
  }

  // ─── Snapshots ──────────────────────────────────────────────────────

  snapshot(): ShareLedgerSnapshot {
    return {
      state: { ...this._state, fees: { ...this._state.fees } },
      balances: [...this._balances.entries()],
      allowances: [...this._allowances.entries()],
      exempt: [...this._exempt],
    };
  }

  restore(snapshot: ShareLedgerSnapshot): void {
    this._state = { ...snapshot.state, fees: { ...snapshot.state.fees } };
    this._balances.clear();
    for (const [owner, shares] of snapshot.balances) {
      this._balances.set(owner, shares);
    }
    this._allowances.clear();
    for (const [pair, shares] of snapshot.allowances) {
      this._allowances.set(pair, shares);
    }
    this._exempt.clear();
    for (const address of snapshot.exempt) {
      this._exempt.add(address);
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _deposit(
    caller: Address,
    assets: bigint,
    receiver: Address,
    valuation: Valuation,
  ): ShareMovement {
    this._requirePositive(assets, "assets");
    this._requireReceiver(receiver);
    this._requireCap(caller, assets, valuation);

    const fee = this.entryFee(assets, caller);
    const shares = this.convertToShares(assets - fee, valuation, "down");
    if (shares === 0n) {
      throw new LedgerError("AMOUNT_TOO_LOW", `Deposit of ${assets} mints no shares`);
    }

    this._custody.credit(this._state.asset, assets);
    this._state.claimableAssetFees += fee;
    this.mintShares(receiver, shares);
    return { assets, shares, fee };
  }

  private _release(
    caller: Address,
    owner: Address,
    assets: bigint,
    shares: bigint,
    fee: bigint,
    valuation: Valuation,
  ): ShareMovement {
    if (valuation.available < assets + fee) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        `Only ${valuation.available} assets are available, ${assets + fee} required`,
      );
    }
    this.spendAllowance(owner, caller, shares);
    this.burnShares(owner, shares);
    this._custody.debit(this._state.asset, assets);
    this._state.claimableAssetFees += fee;
    return { assets, shares, fee };
  }

  private _requirePositive(amount: bigint, label: string): void {
    if (amount <= 0n) {
      throw new LedgerError("AMOUNT_TOO_LOW", `${label} must be greater than zero`);
    }
  }

  private _requireReceiver(receiver: Address, allowVault = false): void {
    if (sameAddress(receiver, ZERO_ADDRESS)) {
      throw new LedgerError("ADDRESS_IS_ZERO", "Receiver cannot be the zero address");
    }
    if (!allowVault && sameAddress(receiver, this._state.vault)) {
      throw new LedgerError("UNAUTHORIZED", "The vault cannot mint shares to itself");
    }
  }

  private _requireCap(caller: Address, assets: bigint, valuation: Valuation): void {
    if (this.isExempt(caller)) return;
    if (valuation.totalAssets + assets > this._state.maxTotalAssets) {
      throw new LedgerError(
        "AMOUNT_TOO_HIGH",
        `Deposit of ${assets} would exceed the ${this._state.maxTotalAssets} asset cap`,
      );
    }
  }

  private _requireLiquidity(valuation: Valuation): void {
    if (valuation.totalAssets < this._state.minLiquidity) {
      throw new LedgerError(
        "LIQUIDITY_TOO_LOW",
        `Vault holds ${valuation.totalAssets} assets, below the ${this._state.minLiquidity} seed floor`,
      );
    }
  }

  private _requireDeadline(deadline: number, now: number): void {
    if (now > deadline) {
      throw new LedgerError(
        "TRANSACTION_EXPIRED",
        `Deadline ${String(deadline)} has passed (now ${String(now)})`,
      );
    }
  }
}
