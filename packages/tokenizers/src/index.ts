/**
 * @hashtok/tokenizers -- feature-hashing tokenizers for text, signals,
 * images and audio.
 *
 * Every tokenizer maps raw input to integer ids in `[0, numEmbeddings)`
 * without a vocabulary: strings are hashed with SHA3-224 and numeric windows
 * with random-hyperplane LSH. A pre-populated registry builds any of them by
 * kind name.
 */
import { Effect } from "effect";
import {
  ConfigurationError,
  Registry,
  type TokenizerKind,
  type TokenizerOptions,
} from "@hashtok/core";
import { ImageTokenizer } from "./image.js";
import { SignalDerivativeTokenizer, SignalTokenizer } from "./signal.js";
import { SpectrogramTokenizer } from "./spectrogram.js";
import {
  CharacterTokenizer,
  NgramTokenizer,
  PrecisePositionalTokenizer,
  RoughPositionalTokenizer,
  WordTokenizer,
} from "./text.js";

// ── Re-exports ────────────────────────────────────────────────────────────
export {
  WordTokenizer,
  NgramTokenizer,
  CharacterTokenizer,
  PrecisePositionalTokenizer,
  RoughPositionalTokenizer,
  type TextCollaborators,
  type PositionalToken,
} from "./text.js";
export { SignalTokenizer, SignalDerivativeTokenizer } from "./signal.js";
export { ImageTokenizer, reshapeIds } from "./image.js";
export { SpectrogramTokenizer } from "./spectrogram.js";
export { encodeBatch } from "./batch.js";
export {
  type AxisPlan,
  type Window1dOptions,
  type Window2dOptions,
  planAxis,
  minimumLength,
  extractWindows1d,
  extractWindows2d,
} from "./window.js";
export { ngrams, skipgrams, wordGrams } from "./grams.js";
export { precisePositions, roughPositions } from "./positions.js";
export { IntlWordSegmenter, wholeInputSegmenter } from "./segment.js";
export {
  EnglishSyllableSegmenter,
  ThaiSyllableSegmenter,
  syllableSegmenterFor,
} from "./syllables.js";
export { STRING_HASH_ALGORITHM, digestToken, CryptoHashQuantizer } from "./hash-quantizer.js";
export { type LshOptions, LshQuantizer } from "./lsh.js";
export {
  TOP_DB,
  type Spectrum,
  trimSilence,
  hannWindow,
  stftMagnitude,
  magnitudeToDb,
} from "./spectral.js";
export {
  type OptionsInit,
  MAX_NUM_EMBEDDINGS,
  validateBase,
  resolveTextOptions,
  resolveNgramOptions,
  resolvePositionalOptions,
  resolveRoughPositionalOptions,
  resolveSignalOptions,
  resolveImageOptions,
  resolveSpectrogramOptions,
  parseTokenizerConfig,
  saveTokenizerConfig,
  loadTokenizerConfig,
} from "./config.js";

// ── Tokenizer registry ────────────────────────────────────────────────────

export type AnyTokenizer =
  | WordTokenizer
  | NgramTokenizer
  | CharacterTokenizer
  | PrecisePositionalTokenizer
  | RoughPositionalTokenizer
  | SignalTokenizer
  | SignalDerivativeTokenizer
  | ImageTokenizer
  | SpectrogramTokenizer;

/**
 * Global tokenizer registry, keyed by `TokenizerKind`. Options a kind does
 * not use are ignored by it.
 *
 * ```ts
 * const tok = tokenizerRegistry.get("ngram", { numEmbeddings: 50_000 });
 * ```
 */
export const tokenizerRegistry = new Registry<TokenizerOptions, AnyTokenizer>("tokenizer");

tokenizerRegistry.register("word", (o) => new WordTokenizer(o));
tokenizerRegistry.register("ngram", (o) => new NgramTokenizer(o));
tokenizerRegistry.register("character", (o) => new CharacterTokenizer(o));
tokenizerRegistry.register("positional-precise", (o) => new PrecisePositionalTokenizer(o));
tokenizerRegistry.register("positional-rough", (o) => new RoughPositionalTokenizer(o));
tokenizerRegistry.register("signal", (o) => new SignalTokenizer(o));
tokenizerRegistry.register("signal-derivative", (o) => new SignalDerivativeTokenizer(o));
tokenizerRegistry.register("image", (o) => new ImageTokenizer(o));
tokenizerRegistry.register("spectrogram", (o) => new SpectrogramTokenizer(o));

/** Build a tokenizer from the registry, surfacing bad options as a typed failure. */
export function createTokenizer(
  kind: TokenizerKind | string,
  options: TokenizerOptions,
): Effect.Effect<AnyTokenizer, ConfigurationError> {
  return Effect.try({
    try: () => tokenizerRegistry.get(kind, options),
    catch: (cause) =>
      cause instanceof ConfigurationError
        ? cause
        : new ConfigurationError({ message: `Failed to build "${kind}" tokenizer`, cause }),
  }).pipe(
    Effect.tap((tok) => Effect.logDebug(`built ${tok.name} tokenizer (N=${tok.numEmbeddings})`)),
  );
}
