/**
 * @payledger/cli
 *
 * Stripe balance history → accrual engine → GnuCash CSV.
 */

export { runCli, parseInvocation, CliError, USAGE } from "./cli.js";
export type { CliDeps, CliIo, CliErrorCode } from "./cli.js";
export {
  ConfigurationError,
  EnvSchema,
  EngineConfigSchema,
  loadEnv,
  parseEngineConfig,
  loadEngineConfig,
} from "./config.js";
export type { EnvConfig, EngineConfigFile } from "./config.js";
export { createLogger } from "./logger.js";
export { renderSummary, EXIT_CODES } from "./summary.js";
