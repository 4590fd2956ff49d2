/**
 * Error types raised inside the engine. The processor catches both and turns
 * them into diagnostics; neither escapes a round.
 */

import { TypeKey } from "./types";

/**
 * A broken engine invariant for one type (e.g. duplicate property names).
 * Aborts synthesis of that type only.
 */
export class InvariantViolationError extends Error {
  readonly typeKey: TypeKey;

  constructor(typeKey: TypeKey, message: string) {
    super(message);
    this.name = "InvariantViolationError";
    this.typeKey = typeKey;
  }
}

/**
 * Writing an output unit failed.
 */
export class EmissionError extends Error {
  readonly typeKey: TypeKey;
  readonly outputPath: string;

  constructor(typeKey: TypeKey, outputPath: string, cause: unknown) {
    super(`Failed to write ${outputPath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "EmissionError";
    this.typeKey = typeKey;
    this.outputPath = outputPath;
  }
}
