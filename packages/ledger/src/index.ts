/**
 * @ballast/ledger — Share accounting for a yield vault.
 *
 * - ShareLedger: assets ↔ shares, balances, allowances, fee checkpoint
 * - FeeAccrualEngine: performance / management fees on a cooldown
 * - InMemoryCustody: the vault's token balance book
 * - Deterministic bigint math
 */

export { ShareLedger, validateFees } from "./share-ledger.js";
export { FeeAccrualEngine } from "./fees.js";
export type { FeePreview } from "./fees.js";
export { InMemoryCustody } from "./custody.js";
export type { Custody, CustodySnapshot } from "./custody.js";

export {
  BPS_DENOMINATOR,
  SECONDS_PER_YEAR,
  mulDiv,
  assertBps,
  bpsOf,
  applyBps,
  pow10,
  minBigInt,
  maxBigInt,
  sumBigInt,
} from "./money-math.js";

export type {
  FeeSchedule,
  VaultState,
  Valuation,
  Rounding,
  ShareLedgerInit,
  ShareMovement,
  SafeDepositOptions,
  SafeMintOptions,
  SafeWithdrawOptions,
  SafeRedeemOptions,
  FeeCollection,
  ShareLedgerSnapshot,
  LedgerErrorCode,
} from "./types.js";
export { LedgerError, MAX_FEES, DEFAULT_FEES } from "./types.js";
