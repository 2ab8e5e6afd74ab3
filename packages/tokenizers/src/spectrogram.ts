/**
 * Audio tokenizer. A waveform is trimmed of leading and trailing silence,
 * turned into a decibel spectrogram (frequency bins by frames), and the
 * spectrogram is tokenized like an image with square windows.
 */
import { Effect } from "effect";
import {
  MalformedInputError,
  firstNonFinite,
  type HashingTokenizer,
  type Signal,
  type SpectrogramOptions,
  type WindowTensor,
} from "@hashtok/core";
import { encodeBatch } from "./batch.js";
import { resolveSpectrogramOptions, type OptionsInit } from "./config.js";
import { reshapeIds } from "./image.js";
import { LshQuantizer } from "./lsh.js";
import { magnitudeToDb, stftMagnitude, trimSilence } from "./spectral.js";
import { extractWindows2d } from "./window.js";

export class SpectrogramTokenizer implements HashingTokenizer<Signal, WindowTensor, Int32Array[]> {
  readonly name = "spectrogram";
  readonly options: SpectrogramOptions;
  readonly quantizer: LshQuantizer;

  constructor(init: OptionsInit<SpectrogramOptions>) {
    this.options = resolveSpectrogramOptions(init);
    this.quantizer = new LshQuantizer({
      numEmbeddings: this.options.numEmbeddings,
      paddingIdx: this.options.paddingIdx,
      dimension: this.options.windowSize * this.options.windowSize,
      randomSeed: this.options.randomSeed,
    });
  }

  get numEmbeddings(): number {
    return this.options.numEmbeddings;
  }

  get paddingIdx(): number {
    return this.options.paddingIdx;
  }

  /** Decibel spectrogram of the trimmed waveform, one row per frequency bin. */
  spectrogram(waveform: Signal): Effect.Effect<Float64Array[], MalformedInputError> {
    const { nFft, hopLength, silenceThreshold, silenceOffset } = this.options;
    return Effect.suspend(() => {
      if (waveform.length === 0) {
        return Effect.fail(new MalformedInputError({ message: "Cannot tokenize an empty waveform" }));
      }
      const bad = firstNonFinite(waveform);
      if (bad >= 0) {
        return Effect.fail(
          new MalformedInputError({ message: `waveform has a non-finite sample at index ${bad}` }),
        );
      }
      const trimmed = trimSilence(waveform, silenceThreshold, silenceOffset);
      return Effect.succeed(magnitudeToDb(stftMagnitude(trimmed, nFft, hopLength)));
    });
  }

  /** Square `windowSize` windows over the spectrogram. */
  tokenize(waveform: Signal): Effect.Effect<WindowTensor, MalformedInputError> {
    const { windowSize, stride, paddingValue } = this.options;
    return this.spectrogram(waveform).pipe(
      Effect.flatMap((db) =>
        extractWindows2d(db, { windowHeight: windowSize, windowWidth: windowSize, stride, paddingValue }),
      ),
    );
  }

  numerize(windows: WindowTensor): Int32Array[] {
    const [rows = 0, cols = 0] = windows.shape;
    return reshapeIds(this.quantizer.quantizeRows(windows.data), rows, cols);
  }

  call(inputs: readonly Signal[]): Effect.Effect<Int32Array[][], MalformedInputError> {
    return encodeBatch(this, inputs);
  }
}
