/**
 * Typed error classes for the tokenization pipeline.
 *
 * Construction-time problems are configuration errors; anything that depends
 * on the data handed to a single call is a malformed-input error.
 */
import { Data } from "effect";

export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class MalformedInputError extends Data.TaggedError("MalformedInputError")<{
  readonly message: string;
  /** Position of the offending item inside a batch call, when known. */
  readonly index?: number;
  readonly cause?: unknown;
}> {}
