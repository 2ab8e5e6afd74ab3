/**
 * Text tokenizers.
 *
 * Each splits a string into words (or keeps it whole with `inputWord`),
 * derives string tokens per word, and hashes them with SHA3-224 into the
 * embedding range. No vocabulary is ever built.
 */
import { Effect } from "effect";
import type {
  HashingTokenizer,
  MalformedInputError,
  NgramOptions,
  PositionalIds,
  PositionalOptions,
  RoughPositionalOptions,
  SyllableSegmenter,
  TextOptions,
  WordSegmenter,
} from "@hashtok/core";
import { encodeBatch } from "./batch.js";
import {
  resolveNgramOptions,
  resolvePositionalOptions,
  resolveRoughPositionalOptions,
  resolveTextOptions,
  type OptionsInit,
} from "./config.js";
import { wordGrams } from "./grams.js";
import { CryptoHashQuantizer } from "./hash-quantizer.js";
import { precisePositions, roughPositions } from "./positions.js";
import { IntlWordSegmenter, wholeInputSegmenter } from "./segment.js";
import { syllableSegmenterFor } from "./syllables.js";

/** Pluggable segmentation for text tokenizers. */
export interface TextCollaborators {
  readonly wordSegmenter?: WordSegmenter;
  readonly syllableSegmenter?: SyllableSegmenter;
}

/** Characters of one word with their bucketed positions. */
export interface PositionalToken {
  readonly chars: string[];
  readonly positions: Int32Array;
}

function pickSegmenter(options: TextOptions, collaborators: TextCollaborators): WordSegmenter {
  if (options.inputWord) return wholeInputSegmenter;
  return collaborators.wordSegmenter ?? new IntlWordSegmenter();
}

// ── Word ───────────────────────────────────────────────────────────────────

/** One id per word. */
export class WordTokenizer implements HashingTokenizer<string, string[], Int32Array> {
  readonly name = "word";
  readonly options: TextOptions;
  private readonly _segmenter: WordSegmenter;
  private readonly _quantizer: CryptoHashQuantizer;

  constructor(init: OptionsInit<TextOptions>, collaborators: TextCollaborators = {}) {
    this.options = resolveTextOptions(init);
    this._segmenter = pickSegmenter(this.options, collaborators);
    this._quantizer = new CryptoHashQuantizer(this.options.numEmbeddings, this.options.paddingIdx);
  }

  get numEmbeddings(): number {
    return this.options.numEmbeddings;
  }

  get paddingIdx(): number {
    return this.options.paddingIdx;
  }

  tokenize(text: string): Effect.Effect<string[], MalformedInputError> {
    return Effect.sync(() => this._segmenter.segment(text));
  }

  numerize(words: string[]): Int32Array {
    return this._quantizer.quantizeAll(words);
  }

  call(inputs: readonly string[]): Effect.Effect<Int32Array[], MalformedInputError> {
    return encodeBatch(this, inputs);
  }
}

// ── N-gram / skip-gram ─────────────────────────────────────────────────────

/** One id per gram, grouped by word. */
export class NgramTokenizer implements HashingTokenizer<string, string[][], Int32Array[]> {
  readonly name = "ngram";
  readonly options: NgramOptions;
  private readonly _segmenter: WordSegmenter;
  private readonly _quantizer: CryptoHashQuantizer;

  constructor(init: OptionsInit<NgramOptions>, collaborators: TextCollaborators = {}) {
    this.options = resolveNgramOptions(init);
    this._segmenter = pickSegmenter(this.options, collaborators);
    this._quantizer = new CryptoHashQuantizer(this.options.numEmbeddings, this.options.paddingIdx);
  }

  get numEmbeddings(): number {
    return this.options.numEmbeddings;
  }

  get paddingIdx(): number {
    return this.options.paddingIdx;
  }

  tokenize(text: string): Effect.Effect<string[][], MalformedInputError> {
    const { ngrams, skipngrams } = this.options;
    return Effect.sync(() =>
      this._segmenter.segment(text).map((word) => wordGrams(word, ngrams, skipngrams)),
    );
  }

  numerize(grams: string[][]): Int32Array[] {
    return grams.map((word) => this._quantizer.quantizeAll(word));
  }

  call(inputs: readonly string[]): Effect.Effect<Int32Array[][], MalformedInputError> {
    return encodeBatch(this, inputs);
  }
}

// ── Character ──────────────────────────────────────────────────────────────

/** One id per character, grouped by word. */
export class CharacterTokenizer implements HashingTokenizer<string, string[][], Int32Array[]> {
  readonly name = "character";
  readonly options: TextOptions;
  private readonly _segmenter: WordSegmenter;
  private readonly _quantizer: CryptoHashQuantizer;

  constructor(init: OptionsInit<TextOptions>, collaborators: TextCollaborators = {}) {
    this.options = resolveTextOptions(init);
    this._segmenter = pickSegmenter(this.options, collaborators);
    this._quantizer = new CryptoHashQuantizer(this.options.numEmbeddings, this.options.paddingIdx);
  }

  get numEmbeddings(): number {
    return this.options.numEmbeddings;
  }

  get paddingIdx(): number {
    return this.options.paddingIdx;
  }

  tokenize(text: string): Effect.Effect<string[][], MalformedInputError> {
    return Effect.sync(() => this._segmenter.segment(text).map((word) => Array.from(word)));
  }

  numerize(chars: string[][]): Int32Array[] {
    return chars.map((word) => this._quantizer.quantizeAll(word));
  }

  call(inputs: readonly string[]): Effect.Effect<Int32Array[][], MalformedInputError> {
    return encodeBatch(this, inputs);
  }
}

// ── Positional character ───────────────────────────────────────────────────

function numerizePositional(quantizer: CryptoHashQuantizer, tokens: PositionalToken[]): PositionalIds[] {
  return tokens.map(({ chars, positions }) => ({
    ids: quantizer.quantizeAll(chars),
    positions: Int32Array.from(positions),
  }));
}

/** Character ids plus each character's index in its word, clamped. */
export class PrecisePositionalTokenizer
  implements HashingTokenizer<string, PositionalToken[], PositionalIds[]>
{
  readonly name = "positional-precise";
  readonly options: PositionalOptions;
  private readonly _segmenter: WordSegmenter;
  private readonly _quantizer: CryptoHashQuantizer;

  constructor(init: OptionsInit<PositionalOptions>, collaborators: TextCollaborators = {}) {
    this.options = resolvePositionalOptions(init);
    this._segmenter = pickSegmenter(this.options, collaborators);
    this._quantizer = new CryptoHashQuantizer(this.options.numEmbeddings, this.options.paddingIdx);
  }

  get numEmbeddings(): number {
    return this.options.numEmbeddings;
  }

  get paddingIdx(): number {
    return this.options.paddingIdx;
  }

  tokenize(text: string): Effect.Effect<PositionalToken[], MalformedInputError> {
    const { maxPositional } = this.options;
    return Effect.sync(() =>
      this._segmenter.segment(text).map((word) => {
        const chars = Array.from(word);
        return { chars, positions: precisePositions(chars, maxPositional) };
      }),
    );
  }

  numerize(tokens: PositionalToken[]): PositionalIds[] {
    return numerizePositional(this._quantizer, tokens);
  }

  call(inputs: readonly string[]): Effect.Effect<PositionalIds[][], MalformedInputError> {
    return encodeBatch(this, inputs);
  }
}

/** Character ids plus the index of the syllable each character belongs to. */
export class RoughPositionalTokenizer
  implements HashingTokenizer<string, PositionalToken[], PositionalIds[]>
{
  readonly name = "positional-rough";
  readonly options: RoughPositionalOptions;
  private readonly _segmenter: WordSegmenter;
  private readonly _syllables: SyllableSegmenter;
  private readonly _quantizer: CryptoHashQuantizer;

  constructor(init: OptionsInit<RoughPositionalOptions>, collaborators: TextCollaborators = {}) {
    this.options = resolveRoughPositionalOptions(init);
    this._syllables = collaborators.syllableSegmenter ?? syllableSegmenterFor(this.options.language);
    this._segmenter = pickSegmenter(this.options, collaborators);
    this._quantizer = new CryptoHashQuantizer(this.options.numEmbeddings, this.options.paddingIdx);
  }

  get numEmbeddings(): number {
    return this.options.numEmbeddings;
  }

  get paddingIdx(): number {
    return this.options.paddingIdx;
  }

  tokenize(text: string): Effect.Effect<PositionalToken[], MalformedInputError> {
    const { maxPositional } = this.options;
    return Effect.suspend(() =>
      Effect.forEach(this._segmenter.segment(text), (word) => {
        const chars = Array.from(word);
        return roughPositions(chars, maxPositional, this._syllables).pipe(
          Effect.map((positions) => ({ chars, positions })),
        );
      }),
    );
  }

  numerize(tokens: PositionalToken[]): PositionalIds[] {
    return numerizePositional(this._quantizer, tokens);
  }

  call(inputs: readonly string[]): Effect.Effect<PositionalIds[][], MalformedInputError> {
    return encodeBatch(this, inputs);
  }
}
