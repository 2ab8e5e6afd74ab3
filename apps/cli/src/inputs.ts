/**
 * Reading encode inputs and printing ids.
 */
import { Effect } from "effect";
import { MalformedInputError, type Matrix, type Signal } from "@hashtok/core";
import type { AnyTokenizer } from "@hashtok/tokenizers";

/** Text items from a file: one per non-blank line. */
export function textLines(content: string): string[] {
  return content.split(/\r?\n/).filter((line) => line.trim() !== "");
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number");
}

function parseJsonArray(content: string): Effect.Effect<unknown[], MalformedInputError> {
  return Effect.try({
    try: (): unknown => JSON.parse(content),
    catch: (cause) => new MalformedInputError({ message: "Input is not valid JSON", cause }),
  }).pipe(
    Effect.filterOrFail(
      (data): data is unknown[] => Array.isArray(data),
      () => new MalformedInputError({ message: "Input must be a JSON array of items" }),
    ),
  );
}

/** A JSON array of signals, e.g. `[[0.1, 0.2], [0.3]]`. */
export function parseSignals(content: string): Effect.Effect<Signal[], MalformedInputError> {
  return parseJsonArray(content).pipe(
    Effect.flatMap((items) =>
      Effect.forEach(items, (item, index) =>
        isNumberArray(item)
          ? Effect.succeed(item)
          : Effect.fail(new MalformedInputError({ message: `Item ${index} is not an array of numbers`, index })),
      ),
    ),
  );
}

/** A JSON array of matrices, each an array of numeric rows. */
export function parseMatrices(content: string): Effect.Effect<Matrix[], MalformedInputError> {
  return parseJsonArray(content).pipe(
    Effect.flatMap((items) =>
      Effect.forEach(items, (item, index) =>
        Array.isArray(item) && item.every(isNumberArray)
          ? Effect.succeed<Matrix>(item)
          : Effect.fail(new MalformedInputError({ message: `Item ${index} is not a matrix of numbers`, index })),
      ),
    ),
  );
}

/**
 * Encode raw input with any tokenizer. `fromFile` decides whether text
 * input is one item or one item per line; numeric input is always a JSON
 * array of items.
 */
export function encodeContent(
  tokenizer: AnyTokenizer,
  content: string,
  fromFile: boolean,
): Effect.Effect<readonly unknown[], MalformedInputError> {
  const texts = fromFile ? textLines(content) : [content];
  switch (tokenizer.name) {
    case "word":
    case "ngram":
    case "character":
    case "positional-precise":
    case "positional-rough":
      return tokenizer.call(texts);
    case "signal":
    case "signal-derivative":
    case "spectrogram": {
      const numeric = tokenizer;
      return parseSignals(content).pipe(Effect.flatMap((signals): Effect.Effect<readonly unknown[], MalformedInputError> => numeric.call(signals)));
    }
    case "image": {
      const image = tokenizer;
      return parseMatrices(content).pipe(Effect.flatMap((images) => image.call(images)));
    }
  }
}

/** JSON with typed arrays written as plain arrays. */
export function toJsonLine(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => (v instanceof Int32Array ? Array.from(v) : v));
}
