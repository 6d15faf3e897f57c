/**
 * Logger del módulo de ratings.
 *
 * Usa el `Logger` de Seyfert (mismo formato que `client.logger`) con su propio
 * nombre y nivel, configurable vía `LOG_LEVEL`.
 */
import { Logger, LogLevels } from "seyfert/lib/common";
import type { LogLevelName } from "@/configuration/env";
import type { RatingLogger } from "./types";

const LEVELS: Record<LogLevelName, LogLevels> = {
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
};

export function createRatingLogger(level: LogLevelName = "info"): RatingLogger {
  return new Logger({ name: "ratings", logLevel: LEVELS[level] });
}
