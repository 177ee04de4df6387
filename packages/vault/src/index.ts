/**
 * @ballast/vault — Yield vault coordinator.
 *
 * Wires share accounting, asynchronous requests and weighted allocation
 * into one transactional API with validated configuration and pino
 * logging.
 *
 * Design rules:
 * - Admin operations are restricted to the configured manager
 * - Every operation commits fully or leaves no trace
 * - Committed events go to the "vault" stream of the event store
 */

// Top-level vault
export { Vault, VAULT_STREAM } from "./vault.js";

// Configuration
export {
  VaultConfigSchema,
  FeeScheduleSchema,
  RuntimeSettingsSchema,
  loadConfig,
  parseVaultConfig,
} from "./config.js";
export type { VaultConfig, VaultConfigInput, RuntimeSettings } from "./config.js";

// Logging
export { createLogger } from "./logger.js";
export type { LoggerOptions } from "./logger.js";

// Types
export type {
  VaultDependencies,
  VaultSnapshot,
  CompoundResult,
  EmptyStrategyResult,
  RescueRequest,
  VaultErrorCode,
} from "./types.js";
export { VaultError } from "./types.js";
