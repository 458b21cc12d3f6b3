/**
 * Build-time checks on the callbacks handed to sequence stages.
 *
 * Checks run when a stage is assembled, never during evaluation. Their
 * strictness follows `contracts.mode`:
 *
 * - `full`: every violation throws `SequenceContractError`
 * - `warn`: a non-function still throws; too many declared parameters is logged
 * - `none`: nothing is checked
 */

import { SequenceContractError, createLogger, getContractsMode } from "@pullseq/core";

const log = createLogger("contracts");

/**
 * Verifies that `fn` is callable with at most `maxParams` arguments.
 *
 * A callback declaring more parameters than the stage supplies would see
 * `undefined` for the extras, which almost always means the wrong function
 * was passed (e.g. a comparator where a predicate belongs). Default and
 * rest parameters do not count toward `fn.length`.
 */
export function checkCallback(stage: string, fn: unknown, maxParams: number): void {
  const mode = getContractsMode();
  if (mode === "none") return;

  if (typeof fn !== "function") {
    throw new SequenceContractError(
      stage,
      "not_callable",
      `expected a function, got ${describe(fn)}`
    );
  }

  if (fn.length > maxParams) {
    const detail = `callback declares ${fn.length} parameters but is called with ${maxParams}`;
    if (mode === "full") {
      throw new SequenceContractError(stage, "extra_parameters", detail);
    }
    log.warn(`${stage}: ${detail}`);
  }
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return typeof value;
}
