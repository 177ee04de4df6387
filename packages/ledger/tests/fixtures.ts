/**
 * Shared fixtures for @ballast/ledger tests.
 */

import type { Address } from "@ballast/types";
import { InMemoryCustody } from "../src/custody.js";
import { ShareLedger } from "../src/share-ledger.js";
import type { FeeSchedule, ShareLedgerInit, Valuation } from "../src/types.js";

export const VAULT: Address = "0x00000000000000000000000000000000000000f0";
export const ASSET: Address = "0x00000000000000000000000000000000000000a0";
export const COLLECTOR: Address = "0x00000000000000000000000000000000000000c0";
export const ALICE: Address = "0x00000000000000000000000000000000000000a1";
export const BOB: Address = "0x00000000000000000000000000000000000000b1";
export const MANAGER: Address = "0x00000000000000000000000000000000000000e1";

export const NO_FEES: FeeSchedule = { perf: 0, mgmt: 0, entry: 0, exit: 0 };

export interface LedgerHarness {
  readonly custody: InMemoryCustody;
  readonly ledger: ShareLedger;
  /** Valuation of an uninvested vault: everything not owed as fees is available. */
  value(): Valuation;
}

export function createHarness(overrides: Partial<ShareLedgerInit> = {}): LedgerHarness {
  const custody = new InMemoryCustody();
  const ledger = new ShareLedger(
    {
      vault: VAULT,
      asset: ASSET,
      assetDecimals: 6,
      shareDecimals: 6,
      feeCollector: COLLECTOR,
      fees: NO_FEES,
      ...overrides,
    },
    custody,
  );
  return {
    custody,
    ledger,
    value() {
      const free = custody.balanceOf(ledger.state.asset) - ledger.claimableAssetFees;
      return { totalAssets: free, available: free };
    },
  };
}

/**
 * Run `fn` and return what it threw.
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected the call to throw");
}
