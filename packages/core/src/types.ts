/**
 * Core types for the hashtok system.
 */

// ── Raw inputs ─────────────────────────────────────────────────────────────

/** A 1D signal: any ordered sequence of real samples. */
export type Signal = ArrayLike<number>;

/** A 2D matrix given row by row. Every row must have the same length. */
export type Matrix = readonly ArrayLike<number>[];

// ── Windows ────────────────────────────────────────────────────────────────
export type Shape = readonly number[];

/** A dense row-major block of windows produced by the window extractor. */
export interface WindowTensor {
  readonly shape: Shape;
  readonly data: Float64Array;
}

// ── Token ids ──────────────────────────────────────────────────────────────

/** Reserved symbolic tokens. They occupy ids `[paddingIdx, paddingIdx + 5)`. */
export const SPECIAL_TOKENS = ["<PAD>", "<CLS>", "<SEP>", "<MASK>", "<UNK>"] as const;

export type SpecialToken = (typeof SPECIAL_TOKENS)[number];

/** Lowest id the hashing path may ever emit. */
export function firstHashedId(paddingIdx: number): number {
  return paddingIdx + SPECIAL_TOKENS.length;
}

/** Id assigned to each special token for a given padding index. */
export function specialTokenIds(paddingIdx: number): Readonly<Record<SpecialToken, number>> {
  return {
    "<PAD>": paddingIdx,
    "<CLS>": paddingIdx + 1,
    "<SEP>": paddingIdx + 2,
    "<MASK>": paddingIdx + 3,
    "<UNK>": paddingIdx + 4,
  };
}

/** Character ids paired with their coarse in-word positions. */
export interface PositionalIds {
  readonly ids: Int32Array;
  readonly positions: Int32Array;
}

// ── Tokenizer kinds ────────────────────────────────────────────────────────
export const TOKENIZER_KINDS = [
  "word",
  "ngram",
  "character",
  "positional-precise",
  "positional-rough",
  "signal",
  "signal-derivative",
  "image",
  "spectrogram",
] as const;

export type TokenizerKind = (typeof TOKENIZER_KINDS)[number];

export function isTokenizerKind(value: string): value is TokenizerKind {
  return (TOKENIZER_KINDS as readonly string[]).includes(value);
}

export const SUPPORTED_LANGUAGES = ["en", "th"] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export function isLanguage(value: string): value is Language {
  return (SUPPORTED_LANGUAGES as readonly string[]).includes(value);
}

// ── Options ────────────────────────────────────────────────────────────────
export interface BaseOptions {
  /** Size of the embedding table ids must fit into. */
  readonly numEmbeddings: number;
  readonly paddingIdx: number;
}

export interface TextOptions extends BaseOptions {
  /** Treat every input string as one word instead of segmenting it. */
  readonly inputWord: boolean;
}

export interface NgramOptions extends TextOptions {
  readonly ngrams: readonly number[];
  readonly skipngrams: readonly number[];
}

export interface PositionalOptions extends TextOptions {
  readonly maxPositional: number;
}

export interface RoughPositionalOptions extends PositionalOptions {
  readonly language: string;
}

export interface SignalOptions extends BaseOptions {
  readonly windowSize: number;
  readonly stride: number;
  readonly paddingValue: number;
  readonly randomSeed: number;
}

export interface ImageOptions extends BaseOptions {
  readonly windowHeight: number;
  readonly windowWidth: number;
  readonly stride: number;
  readonly paddingValue: number;
  readonly randomSeed: number;
}

export interface SpectrogramOptions extends SignalOptions {
  readonly nFft: number;
  readonly hopLength: number;
  /** Samples with magnitude at or below this count as silence. */
  readonly silenceThreshold: number;
  /** Samples kept on each side of the loud region when trimming. */
  readonly silenceOffset: number;
}

type AllOptions = NgramOptions & RoughPositionalOptions & ImageOptions & SpectrogramOptions;

/**
 * Every option any tokenizer accepts, flattened. Used where the kind is only
 * known at run time (registry, config files, CLI).
 */
export type TokenizerOptions = Pick<AllOptions, "numEmbeddings"> &
  Partial<Omit<AllOptions, "numEmbeddings">>;

export type TokenizerConfig = { readonly kind: TokenizerKind } & TokenizerOptions;

export const defaultTextOptions = {
  paddingIdx: 0,
  inputWord: false,
} satisfies Omit<TextOptions, "numEmbeddings">;

export const defaultNgramOptions = {
  ...defaultTextOptions,
  ngrams: [3, 4, 5, 6],
  skipngrams: [2, 3],
} satisfies Omit<NgramOptions, "numEmbeddings">;

export const defaultPositionalOptions = {
  ...defaultTextOptions,
  maxPositional: 10,
} satisfies Omit<PositionalOptions, "numEmbeddings">;

export const defaultRoughPositionalOptions = {
  ...defaultPositionalOptions,
  language: "en",
} satisfies Omit<RoughPositionalOptions, "numEmbeddings">;

export const defaultSignalOptions = {
  paddingIdx: 0,
  windowSize: 1000,
  stride: 100,
  paddingValue: 0,
  randomSeed: 0,
} satisfies Omit<SignalOptions, "numEmbeddings">;

export const defaultImageOptions = {
  paddingIdx: 0,
  windowHeight: 9,
  windowWidth: 9,
  stride: 1,
  paddingValue: 0,
  randomSeed: 0,
} satisfies Omit<ImageOptions, "numEmbeddings">;

export const defaultSpectrogramOptions = {
  paddingIdx: 0,
  windowSize: 9,
  stride: 1,
  paddingValue: -80,
  randomSeed: 0,
  nFft: 2000,
  hopLength: 100,
  silenceThreshold: 1e-3,
  silenceOffset: 500,
} satisfies Omit<SpectrogramOptions, "numEmbeddings">;
