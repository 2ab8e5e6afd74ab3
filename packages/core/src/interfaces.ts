/**
 * Subsystem interfaces (ports). Every pluggable piece implements one of these.
 */
import { Context, Effect } from "effect";
import type { MalformedInputError } from "./errors.js";
import type { TokenizerKind } from "./types.js";

// ── Tokenizer ──────────────────────────────────────────────────────────────

/**
 * A hashing tokenizer for one input modality.
 *
 * `tokenize` turns one raw input into tokens, `numerize` maps those tokens to
 * ids with the same nesting, and `call` does both for every item of a batch.
 */
export interface HashingTokenizer<Raw, Tokens, Ids> {
  readonly name: TokenizerKind;
  readonly numEmbeddings: number;
  readonly paddingIdx: number;
  tokenize(raw: Raw): Effect.Effect<Tokens, MalformedInputError>;
  numerize(tokens: Tokens): Ids;
  call(inputs: readonly Raw[]): Effect.Effect<Ids[], MalformedInputError>;
}

/** Anything that can describe itself as a tokenizer. */
export interface NamedTokenizer {
  readonly name: TokenizerKind;
  readonly numEmbeddings: number;
  readonly paddingIdx: number;
}

export class TokenizerService extends Context.Tag("TokenizerService")<
  TokenizerService,
  NamedTokenizer
>() {}

// ── Quantizer ──────────────────────────────────────────────────────────────

/** Collapses an unbounded token space into `[firstId, numEmbeddings)`. */
export interface Quantizer<T> {
  readonly numEmbeddings: number;
  /** Lowest id this quantizer ever returns. */
  readonly firstId: number;
  quantize(token: T): number;
}

// ── Segmenters ─────────────────────────────────────────────────────────────

/** Splits running text into ordered word strings. */
export interface WordSegmenter {
  segment(text: string): string[];
}

/**
 * Splits one word into syllables. The syllables, joined, must give back the
 * word unchanged.
 */
export interface SyllableSegmenter {
  readonly language: string;
  segment(word: string): string[];
}

// ── RNG ────────────────────────────────────────────────────────────────────
export interface Rng {
  readonly seed: number;
  next(): number;
  nextGauss(): number;
  gaussianMatrix(rows: number, cols: number): Float64Array;
}
