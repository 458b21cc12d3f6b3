/**
 * Core module exports for @pullseq/core
 *
 * Ambient services shared by the pullseq packages:
 * - Unified configuration (files via cosmiconfig, PULLSEQ_* env, programmatic)
 * - Scoped console logging
 * - Pipeline contract errors
 */

export {
  config,
  defineConfig,
  getContractsMode,
  getLogLevel,
  type PullseqConfig,
  type ContractsConfig,
  type ContractsMode,
  type LogConfig,
  type LogLevel,
} from "./config.js";

export { createLogger, type Logger } from "./logger.js";

export { SequenceContractError, type SequenceContractReason } from "./errors.js";
