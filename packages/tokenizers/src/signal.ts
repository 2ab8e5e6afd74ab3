/**
 * 1D signal tokenizers.
 *
 * A signal is cut into overlapping windows and each window is hashed with
 * random hyperplanes, so similar stretches of signal tend to share ids.
 */
import { Effect } from "effect";
import {
  MalformedInputError,
  firstDifference,
  type HashingTokenizer,
  type Signal,
  type SignalOptions,
  type WindowTensor,
} from "@hashtok/core";
import { encodeBatch } from "./batch.js";
import { resolveSignalOptions, type OptionsInit } from "./config.js";
import { LshQuantizer } from "./lsh.js";
import { extractWindows1d } from "./window.js";

function lshFor(options: SignalOptions): LshQuantizer {
  return new LshQuantizer({
    numEmbeddings: options.numEmbeddings,
    paddingIdx: options.paddingIdx,
    dimension: options.windowSize,
    randomSeed: options.randomSeed,
  });
}

/** One id per window of the raw signal. */
export class SignalTokenizer implements HashingTokenizer<Signal, WindowTensor, Int32Array> {
  readonly name = "signal";
  readonly options: SignalOptions;
  readonly quantizer: LshQuantizer;

  constructor(init: OptionsInit<SignalOptions>) {
    this.options = resolveSignalOptions(init);
    this.quantizer = lshFor(this.options);
  }

  get numEmbeddings(): number {
    return this.options.numEmbeddings;
  }

  get paddingIdx(): number {
    return this.options.paddingIdx;
  }

  /** `[outputLength, windowSize]` windows of the signal. */
  tokenize(signal: Signal): Effect.Effect<WindowTensor, MalformedInputError> {
    return extractWindows1d(signal, this.options);
  }

  numerize(windows: WindowTensor): Int32Array {
    return this.quantizer.quantizeRows(windows.data);
  }

  call(inputs: readonly Signal[]): Effect.Effect<Int32Array[], MalformedInputError> {
    return encodeBatch(this, inputs);
  }
}

/**
 * One id per window of the signal's first difference, which makes ids
 * insensitive to a constant offset in the input.
 */
export class SignalDerivativeTokenizer implements HashingTokenizer<Signal, WindowTensor, Int32Array> {
  readonly name = "signal-derivative";
  readonly options: SignalOptions;
  readonly quantizer: LshQuantizer;

  constructor(init: OptionsInit<SignalOptions>) {
    this.options = resolveSignalOptions(init);
    this.quantizer = lshFor(this.options);
  }

  get numEmbeddings(): number {
    return this.options.numEmbeddings;
  }

  get paddingIdx(): number {
    return this.options.paddingIdx;
  }

  /** `[outputLength, windowSize]` windows of `signal[i + 1] - signal[i]`. */
  tokenize(signal: Signal): Effect.Effect<WindowTensor, MalformedInputError> {
    if (signal.length < 2) {
      return Effect.fail(
        new MalformedInputError({
          message: `A derivative needs at least 2 samples, got ${signal.length}`,
        }),
      );
    }
    return extractWindows1d(firstDifference(signal), this.options);
  }

  numerize(windows: WindowTensor): Int32Array {
    return this.quantizer.quantizeRows(windows.data);
  }

  call(inputs: readonly Signal[]): Effect.Effect<Int32Array[], MalformedInputError> {
    return encodeBatch(this, inputs);
  }
}
