/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

/** `pow` called with something other than a plain number as the exponent. */
export class InvalidExponentType extends Data.TaggedError("InvalidExponentType")<{
  readonly message: string;
}> {}

/** An input sequence whose length disagrees with a module's input width. */
export class DimensionMismatch extends Data.TaggedError("DimensionMismatch")<{
  readonly message: string;
  readonly expected: number;
  readonly actual: number;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class TrainError extends Data.TaggedError("TrainError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
