/**
 * Option resolution, validation and persistence for tokenizer configs.
 *
 * Every constructor resolves its options here, so an invalid value is
 * rejected when the tokenizer is built, never halfway through a call.
 */
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import {
  ConfigurationError,
  defaultImageOptions,
  defaultNgramOptions,
  defaultPositionalOptions,
  defaultRoughPositionalOptions,
  defaultSignalOptions,
  defaultSpectrogramOptions,
  defaultTextOptions,
  firstHashedId,
  isNonNegativeInt,
  isLanguage,
  isPositiveInt,
  isTokenizerKind,
  SUPPORTED_LANGUAGES,
  TOKENIZER_KINDS,
  type BaseOptions,
  type ImageOptions,
  type NgramOptions,
  type PositionalOptions,
  type RoughPositionalOptions,
  type SignalOptions,
  type SpectrogramOptions,
  type TextOptions,
  type TokenizerConfig,
} from "@hashtok/core";

/** What callers pass to a constructor: `numEmbeddings` plus any overrides. */
export type OptionsInit<T extends BaseOptions> = Pick<T, "numEmbeddings"> &
  Partial<Omit<T, "numEmbeddings">>;

// ── Field checks ───────────────────────────────────────────────────────────

function fail(message: string): never {
  throw new ConfigurationError({ message });
}

function requirePositiveInt(name: string, value: number): void {
  if (!isPositiveInt(value)) fail(`${name} must be a positive integer, got ${value}`);
}

function requireNonNegativeInt(name: string, value: number): void {
  if (!isNonNegativeInt(value)) fail(`${name} must be a non-negative integer, got ${value}`);
}

function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) fail(`${name} must be a finite number, got ${value}`);
}

function requireSizes(name: string, values: readonly number[]): void {
  for (const v of values) {
    if (!isPositiveInt(v)) fail(`${name} must contain positive integers, got ${JSON.stringify(values)}`);
  }
}

/** Largest id an `Int32Array` of ids can hold. */
export const MAX_NUM_EMBEDDINGS = 0x7fffffff;

/**
 * `numEmbeddings` must leave room above the reserved special-token range,
 * otherwise no hashed id could satisfy `firstId <= id < numEmbeddings`. Ids
 * are stored as int32, which caps it from above.
 */
export function validateBase(options: BaseOptions): void {
  requireNonNegativeInt("paddingIdx", options.paddingIdx);
  const floor = firstHashedId(options.paddingIdx);
  if (!Number.isInteger(options.numEmbeddings) || options.numEmbeddings <= floor) {
    fail(
      `numEmbeddings must be an integer greater than ${floor} ` +
        `(paddingIdx + special tokens), got ${options.numEmbeddings}`,
    );
  }
  if (options.numEmbeddings > MAX_NUM_EMBEDDINGS) {
    fail(`numEmbeddings must be at most ${MAX_NUM_EMBEDDINGS}, got ${options.numEmbeddings}`);
  }
}

/** A stride wider than the window would skip samples between windows. */
function requireStrideWithin(name: string, size: number, stride: number): void {
  if (stride > size) fail(`stride (${stride}) must not exceed ${name} (${size})`);
}

function validateWindowing(options: SignalOptions | ImageOptions): void {
  requirePositiveInt("stride", options.stride);
  requireFinite("paddingValue", options.paddingValue);
  if (!Number.isSafeInteger(options.randomSeed)) {
    fail(`randomSeed must be a safe integer, got ${options.randomSeed}`);
  }
}

// ── Resolution ─────────────────────────────────────────────────────────────

export function resolveTextOptions(init: OptionsInit<TextOptions>): TextOptions {
  const options: TextOptions = {
    numEmbeddings: init.numEmbeddings,
    paddingIdx: init.paddingIdx ?? defaultTextOptions.paddingIdx,
    inputWord: init.inputWord ?? defaultTextOptions.inputWord,
  };
  validateBase(options);
  return options;
}

export function resolveNgramOptions(init: OptionsInit<NgramOptions>): NgramOptions {
  const options: NgramOptions = {
    ...resolveTextOptions(init),
    ngrams: [...(init.ngrams ?? defaultNgramOptions.ngrams)],
    skipngrams: [...(init.skipngrams ?? defaultNgramOptions.skipngrams)],
  };
  requireSizes("ngrams", options.ngrams);
  requireSizes("skipngrams", options.skipngrams);
  return options;
}

export function resolvePositionalOptions(init: OptionsInit<PositionalOptions>): PositionalOptions {
  const options: PositionalOptions = {
    ...resolveTextOptions(init),
    maxPositional: init.maxPositional ?? defaultPositionalOptions.maxPositional,
  };
  requirePositiveInt("maxPositional", options.maxPositional);
  return options;
}

export function resolveRoughPositionalOptions(
  init: OptionsInit<RoughPositionalOptions>,
): RoughPositionalOptions {
  const options: RoughPositionalOptions = {
    ...resolvePositionalOptions(init),
    language: init.language ?? defaultRoughPositionalOptions.language,
  };
  if (!isLanguage(options.language)) {
    fail(`Unsupported language "${options.language}". Supported: ${SUPPORTED_LANGUAGES.join(", ")}`);
  }
  return options;
}

export function resolveSignalOptions(init: OptionsInit<SignalOptions>): SignalOptions {
  const options: SignalOptions = {
    numEmbeddings: init.numEmbeddings,
    paddingIdx: init.paddingIdx ?? defaultSignalOptions.paddingIdx,
    windowSize: init.windowSize ?? defaultSignalOptions.windowSize,
    stride: init.stride ?? defaultSignalOptions.stride,
    paddingValue: init.paddingValue ?? defaultSignalOptions.paddingValue,
    randomSeed: init.randomSeed ?? defaultSignalOptions.randomSeed,
  };
  validateBase(options);
  requirePositiveInt("windowSize", options.windowSize);
  validateWindowing(options);
  requireStrideWithin("windowSize", options.windowSize, options.stride);
  return options;
}

export function resolveImageOptions(init: OptionsInit<ImageOptions>): ImageOptions {
  const options: ImageOptions = {
    numEmbeddings: init.numEmbeddings,
    paddingIdx: init.paddingIdx ?? defaultImageOptions.paddingIdx,
    windowHeight: init.windowHeight ?? defaultImageOptions.windowHeight,
    windowWidth: init.windowWidth ?? defaultImageOptions.windowWidth,
    stride: init.stride ?? defaultImageOptions.stride,
    paddingValue: init.paddingValue ?? defaultImageOptions.paddingValue,
    randomSeed: init.randomSeed ?? defaultImageOptions.randomSeed,
  };
  validateBase(options);
  requirePositiveInt("windowHeight", options.windowHeight);
  requirePositiveInt("windowWidth", options.windowWidth);
  validateWindowing(options);
  requireStrideWithin("windowHeight", options.windowHeight, options.stride);
  requireStrideWithin("windowWidth", options.windowWidth, options.stride);
  return options;
}

export function resolveSpectrogramOptions(init: OptionsInit<SpectrogramOptions>): SpectrogramOptions {
  const options: SpectrogramOptions = {
    numEmbeddings: init.numEmbeddings,
    paddingIdx: init.paddingIdx ?? defaultSpectrogramOptions.paddingIdx,
    windowSize: init.windowSize ?? defaultSpectrogramOptions.windowSize,
    stride: init.stride ?? defaultSpectrogramOptions.stride,
    paddingValue: init.paddingValue ?? defaultSpectrogramOptions.paddingValue,
    randomSeed: init.randomSeed ?? defaultSpectrogramOptions.randomSeed,
    nFft: init.nFft ?? defaultSpectrogramOptions.nFft,
    hopLength: init.hopLength ?? defaultSpectrogramOptions.hopLength,
    silenceThreshold: init.silenceThreshold ?? defaultSpectrogramOptions.silenceThreshold,
    silenceOffset: init.silenceOffset ?? defaultSpectrogramOptions.silenceOffset,
  };
  validateBase(options);
  requirePositiveInt("windowSize", options.windowSize);
  validateWindowing(options);
  requireStrideWithin("windowSize", options.windowSize, options.stride);
  requirePositiveInt("nFft", options.nFft);
  requirePositiveInt("hopLength", options.hopLength);
  requireFinite("silenceThreshold", options.silenceThreshold);
  if (options.silenceThreshold < 0) fail(`silenceThreshold must be >= 0, got ${options.silenceThreshold}`);
  requireNonNegativeInt("silenceOffset", options.silenceOffset);
  return options;
}

// ── Config files ───────────────────────────────────────────────────────────

const NUMBER_FIELDS = new Set([
  "numEmbeddings",
  "paddingIdx",
  "maxPositional",
  "windowSize",
  "windowHeight",
  "windowWidth",
  "stride",
  "paddingValue",
  "randomSeed",
  "nFft",
  "hopLength",
  "silenceThreshold",
  "silenceOffset",
]);
const KNOWN_FIELDS = new Set([...NUMBER_FIELDS, "kind", "inputWord", "language", "ngrams", "skipngrams"]);

function optNumber(record: Record<string, unknown>, field: string): number | undefined {
  const v = record[field];
  if (v === undefined) return undefined;
  if (typeof v !== "number") fail(`"${field}" must be a number, got ${JSON.stringify(v)}`);
  return v;
}

function optNumberList(record: Record<string, unknown>, field: string): number[] | undefined {
  const v = record[field];
  if (v === undefined) return undefined;
  if (!Array.isArray(v)) fail(`"${field}" must be an array of numbers`);
  return v.map((n: unknown) => {
    if (typeof n !== "number") fail(`"${field}" must be an array of numbers`);
    return n;
  });
}

/**
 * Check a parsed JSON value against the `TokenizerConfig` shape. Value ranges
 * are checked later, when the tokenizer is built from it.
 */
export function parseTokenizerConfig(data: unknown): TokenizerConfig {
  if (data === null || typeof data !== "object" || Array.isArray(data)) {
    fail("Tokenizer config must be a JSON object");
  }
  const record: Record<string, unknown> = { ...data };
  for (const key of Object.keys(record)) {
    if (!KNOWN_FIELDS.has(key)) fail(`Unknown tokenizer config field "${key}"`);
  }

  const kind = record.kind;
  if (typeof kind !== "string" || !isTokenizerKind(kind)) {
    fail(`"kind" must be one of ${TOKENIZER_KINDS.join(", ")}, got ${JSON.stringify(kind)}`);
  }
  const numEmbeddings = optNumber(record, "numEmbeddings");
  if (numEmbeddings === undefined) fail(`"numEmbeddings" is required`);
  const inputWord = record.inputWord;
  if (inputWord !== undefined && typeof inputWord !== "boolean") fail(`"inputWord" must be a boolean`);
  const language = record.language;
  if (language !== undefined && typeof language !== "string") fail(`"language" must be a string`);

  return {
    kind,
    numEmbeddings,
    paddingIdx: optNumber(record, "paddingIdx"),
    inputWord,
    ngrams: optNumberList(record, "ngrams"),
    skipngrams: optNumberList(record, "skipngrams"),
    maxPositional: optNumber(record, "maxPositional"),
    language,
    windowSize: optNumber(record, "windowSize"),
    windowHeight: optNumber(record, "windowHeight"),
    windowWidth: optNumber(record, "windowWidth"),
    stride: optNumber(record, "stride"),
    paddingValue: optNumber(record, "paddingValue"),
    randomSeed: optNumber(record, "randomSeed"),
    nFft: optNumber(record, "nFft"),
    hopLength: optNumber(record, "hopLength"),
    silenceThreshold: optNumber(record, "silenceThreshold"),
    silenceOffset: optNumber(record, "silenceOffset"),
  };
}

/**
 * Write a tokenizer config as pretty-printed JSON, creating parent
 * directories as needed. Unset fields are left out of the file.
 */
export function saveTokenizerConfig(
  path: string,
  config: TokenizerConfig,
): Effect.Effect<void, ConfigurationError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, JSON.stringify(config, null, 2) + "\n", "utf-8");
    },
    catch: (cause) =>
      new ConfigurationError({ message: `Failed to save tokenizer config to "${path}"`, cause }),
  });
}

/** Read and shape-check a tokenizer config file. */
export function loadTokenizerConfig(path: string): Effect.Effect<TokenizerConfig, ConfigurationError> {
  return Effect.tryPromise({
    try: async () => parseTokenizerConfig(JSON.parse(await readFile(path, "utf-8"))),
    catch: (cause) =>
      cause instanceof ConfigurationError
        ? cause
        : new ConfigurationError({ message: `Failed to load tokenizer config from "${path}"`, cause }),
  });
}
