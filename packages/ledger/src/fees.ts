/**
 * @ballast/ledger — FeeAccrualEngine.
 *
 * Performance and management fees are paid in newly minted shares to
 * the fee collector. Entry and exit fees are retained in assets by the
 * ShareLedger and released to the collector at the same time.
 *
 * Rules:
 * - Performance fees apply only to growth above the last checkpoint price
 * - Management fees accrue linearly with elapsed time
 * - Collection inside the profit cooldown is a no-op
 */

import type { ShareLedger } from "./share-ledger.js";
import { SECONDS_PER_YEAR, BPS_DENOMINATOR, bpsOf, mulDiv } from "./money-math.js";
import type { FeeCollection, Valuation } from "./types.js";

export interface FeePreview {
  readonly elapsed: number;
  readonly profit: bigint;
  readonly perfFees: bigint;
  readonly mgmtFees: bigint;
  readonly sharesToMint: bigint;
}

export class FeeAccrualEngine {
  private readonly _ledger: ShareLedger;

  constructor(ledger: ShareLedger) {
    this._ledger = ledger;
  }

  /**
   * Seconds left before fees may be collected again (0 when due).
   */
  cooldownRemaining(now: number): number {
    const { lastCheckpointTime, profitCooldown } = this._ledger.state;
    const remaining = lastCheckpointTime + profitCooldown - now;
    return remaining > 0 ? remaining : 0;
  }

  /**
   * Fees that a collection at `now` would charge.
   */
  preview(valuation: Valuation, now: number): FeePreview {
    const { lastSharePrice, lastCheckpointTime, weiPerShare, totalSupply, fees } =
      this._ledger.state;
    const elapsed = Math.max(0, now - lastCheckpointTime);

    if (totalSupply === 0n) {
      return { elapsed, profit: 0n, perfFees: 0n, mgmtFees: 0n, sharesToMint: 0n };
    }

    // Value the current supply would hold at the high-water mark
    const checkpointAssets = mulDiv(lastSharePrice, totalSupply, weiPerShare);
    const growth = valuation.totalAssets - checkpointAssets;
    const profit = growth > 0n ? growth : 0n;

    const perfFees = bpsOf(profit, fees.perf);
    const mgmtFees = mulDiv(
      valuation.totalAssets,
      BigInt(fees.mgmt) * BigInt(elapsed),
      BPS_DENOMINATOR * SECONDS_PER_YEAR,
    );
    const sharesToMint = this._ledger.convertToShares(perfFees + mgmtFees, valuation);

    return { elapsed, profit, perfFees, mgmtFees, sharesToMint };
  }

  /**
   * Collect accrued fees. Returns null while the cooldown is running.
   */
  collect(valuation: Valuation, now: number): FeeCollection | null {
    if (this.cooldownRemaining(now) > 0) {
      return null;
    }

    const { elapsed, profit, perfFees, mgmtFees, sharesToMint } = this.preview(valuation, now);
    if (sharesToMint > 0n) {
      this._ledger.mintShares(this._ledger.state.feeCollector, sharesToMint);
    }
    const assetFeesClaimed = this._ledger.releaseAssetFees();
    const sharePrice = this._ledger.sharePrice(valuation);
    this._ledger.checkpoint(sharePrice, now);

    return {
      elapsed,
      profit,
      perfFees,
      mgmtFees,
      sharesMinted: sharesToMint,
      assetFeesClaimed,
      sharePrice,
    };
  }
}
