/**
 * Error types for pipeline assembly.
 *
 * Normal evaluation never throws: bad counts and steps produce empty or
 * trivial sequences. The only failures are contract violations detected
 * while a pipeline is being built.
 */

/** Reason codes for pipeline contract violations. */
export type SequenceContractReason =
  | "not_callable"
  | "extra_parameters"
  | "not_restartable"
  | "already_owned";

/** Thrown when a pipeline stage is assembled in a way it cannot honour. */
export class SequenceContractError extends Error {
  constructor(
    readonly stage: string,
    readonly reason: SequenceContractReason,
    readonly detail: string
  ) {
    super(`${stage}: ${detail}`);
    this.name = "SequenceContractError";
  }
}
