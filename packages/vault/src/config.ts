/**
 * @ballast/vault — Configuration.
 *
 * Vault construction parameters and process-level settings are both
 * validated with zod. Amounts may be given as bigint, integer number or
 * base-10 string and always come out as bigint.
 */

import { z } from "zod";
import { isNonZeroAddress } from "@ballast/types";
import { DEFAULT_FEES, MAX_FEES } from "@ballast/ledger";
import { DEFAULT_DUST_THRESHOLD, DEFAULT_MAX_SLIPPAGE_BPS } from "@ballast/allocation";
import { VaultError } from "./types.js";

// =============================================================================
// Primitives
// =============================================================================

const address = z.string().refine(isNonZeroAddress, { message: "Expected a non-zero address" });

const amount = z
  .union([
    z.bigint(),
    z.number().int().nonnegative(),
    z.string().regex(/^\d+$/, { message: "Expected a base-10 amount" }),
  ])
  .transform((value) => BigInt(value))
  .refine((value) => value >= 0n, { message: "Amount cannot be negative" });

const decimals = z.number().int().min(0).max(36);

const bps = z.number().int().min(0).max(10_000);

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

// =============================================================================
// Vault Config
// =============================================================================

export const FeeScheduleSchema = z.object({
  perf: z.number().int().min(0).max(MAX_FEES.perf),
  mgmt: z.number().int().min(0).max(MAX_FEES.mgmt),
  entry: z.number().int().min(0).max(MAX_FEES.entry),
  exit: z.number().int().min(0).max(MAX_FEES.exit),
});

export const VaultConfigSchema = z.object({
  /** The vault's own address; escrowed shares are held here */
  vault: address,
  asset: address,
  assetDecimals: decimals,
  shareDecimals: decimals,
  /** Caller allowed to run admin operations */
  manager: address,
  feeCollector: address,
  fees: FeeScheduleSchema.default(DEFAULT_FEES),
  maxTotalAssets: amount.default(2n ** 256n - 1n),
  minLiquidity: amount.default(0n),
  profitCooldown: z.number().int().nonnegative().default(0),
  mode: z.enum(["single", "paired"]).default("single"),
  maxSlippageBps: bps.default(DEFAULT_MAX_SLIPPAGE_BPS),
  slippagePolicy: z.enum(["compound", "per-leg"]).default("compound"),
  dustThreshold: amount.default(DEFAULT_DUST_THRESHOLD),
  /** Seconds between requestRescue and the earliest rescue */
  rescueTimelock: z.number().int().nonnegative().default(2 * 24 * 3600),
  /** Seconds a rescue stays executable once unlocked */
  rescueValidity: z.number().int().positive().default(7 * 24 * 3600),
  /** Callers exempt from entry/exit fees and the deposit cap */
  exempt: z.array(address).default([]),
});

export type VaultConfigInput = z.input<typeof VaultConfigSchema>;
export type VaultConfig = z.output<typeof VaultConfigSchema>;

// =============================================================================
// Runtime Settings
// =============================================================================

export const RuntimeSettingsSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  BALLAST_PROFIT_COOLDOWN: z.coerce.number().int().nonnegative().optional(),
  BALLAST_MAX_SLIPPAGE_BPS: z.coerce.number().int().min(0).max(10_000).optional(),
  BALLAST_SLIPPAGE_POLICY: z.enum(["compound", "per-leg"]).optional(),
  BALLAST_DUST_THRESHOLD: z
    .string()
    .regex(/^\d+$/, { message: "Expected a base-10 amount" })
    .transform((value) => BigInt(value))
    .optional(),
});

export type RuntimeSettings = z.output<typeof RuntimeSettingsSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * Load process-level settings from the environment.
 *
 * @throws VaultError INVALID_CONFIG listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): RuntimeSettings {
  const result = RuntimeSettingsSchema.safeParse(env);
  if (!result.success) {
    throw new VaultError("INVALID_CONFIG", `Invalid environment: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Validate vault parameters. Settings from the environment override the
 * tuning values they name.
 *
 * @throws VaultError INVALID_CONFIG listing every invalid field
 */
export function parseVaultConfig(input: unknown, settings?: RuntimeSettings): VaultConfig {
  const result = VaultConfigSchema.safeParse(input);
  if (!result.success) {
    throw new VaultError("INVALID_CONFIG", `Invalid vault config: ${describeIssues(result.error)}`);
  }
  const config = result.data;
  if (settings === undefined) return config;
  return {
    ...config,
    profitCooldown: settings.BALLAST_PROFIT_COOLDOWN ?? config.profitCooldown,
    maxSlippageBps: settings.BALLAST_MAX_SLIPPAGE_BPS ?? config.maxSlippageBps,
    slippagePolicy: settings.BALLAST_SLIPPAGE_POLICY ?? config.slippagePolicy,
    dustThreshold: settings.BALLAST_DUST_THRESHOLD ?? config.dustThreshold,
  };
}
