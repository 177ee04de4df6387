/**
 * @ballast/vault — Structured logging.
 *
 * pino JSON logs. Coordinators derive a child logger bound to their
 * component name.
 */

import pino from "pino";
import type { Logger, LevelWithSilent } from "pino";

export interface LoggerOptions {
  readonly level?: LevelWithSilent;
  readonly name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "ballast",
    level: options.level ?? "info",
  });
}
