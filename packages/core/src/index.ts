/**
 * @hashtok/core -- shared types, errors, randomness and helpers.
 */
export {
  type Signal,
  type Matrix,
  type Shape,
  type WindowTensor,
  type SpecialToken,
  type PositionalIds,
  type TokenizerKind,
  type Language,
  type BaseOptions,
  type TextOptions,
  type NgramOptions,
  type PositionalOptions,
  type RoughPositionalOptions,
  type SignalOptions,
  type ImageOptions,
  type SpectrogramOptions,
  type TokenizerOptions,
  type TokenizerConfig,
  SPECIAL_TOKENS,
  firstHashedId,
  specialTokenIds,
  TOKENIZER_KINDS,
  isTokenizerKind,
  SUPPORTED_LANGUAGES,
  isLanguage,
  defaultTextOptions,
  defaultNgramOptions,
  defaultPositionalOptions,
  defaultRoughPositionalOptions,
  defaultSignalOptions,
  defaultImageOptions,
  defaultSpectrogramOptions,
} from "./types.js";

export { ConfigurationError, MalformedInputError } from "./errors.js";

export {
  type HashingTokenizer,
  type NamedTokenizer,
  type Quantizer,
  type WordSegmenter,
  type SyllableSegmenter,
  type Rng,
  TokenizerService,
} from "./interfaces.js";

export { SeededRng } from "./rng.js";
export { Registry } from "./registry.js";
export { configFingerprint } from "./hash.js";
export {
  hyperplaneBits,
  dot,
  firstDifference,
  firstNonFinite,
  isPositiveInt,
  isNonNegativeInt,
} from "./numeric.js";
