import { describe, it, expect } from "vitest";
import { Effect, Logger, LogLevel } from "effect";
import { MalformedInputError } from "@hashtok/core";
import { makePrettyLogger } from "@hashtok/effect-runtime";
import { SignalDerivativeTokenizer, WordTokenizer, encodeBatch } from "@hashtok/tokenizers";

const word = new WordTokenizer({ numEmbeddings: 1000 });

function captureLogs<A, E>(effect: Effect.Effect<A, E>): { lines: string[]; run: Effect.Effect<A, E> } {
  const lines: string[] = [];
  const run = effect.pipe(
    Logger.withMinimumLogLevel(LogLevel.Debug),
    Effect.provide(Logger.replace(Logger.defaultLogger, makePrettyLogger((line) => lines.push(line)))),
  );
  return { lines, run };
}

describe("encodeBatch", () => {
  it("keeps input order", () => {
    const out = Effect.runSync(word.call(["red", "green", "blue"]));
    expect(out).toEqual([
      Effect.runSync(word.call(["red"]))[0],
      Effect.runSync(word.call(["green"]))[0],
      Effect.runSync(word.call(["blue"]))[0],
    ]);
  });

  it("returns nothing for an empty batch", () => {
    expect(Effect.runSync(word.call([]))).toEqual([]);
  });

  it("fails the whole batch on the first bad item", () => {
    const tok = new SignalDerivativeTokenizer({ numEmbeddings: 1000, windowSize: 2, stride: 1 });
    const err = Effect.runSync(Effect.flip(tok.call([[1, 2, 3], [1], [], [4, 5, 6]])));
    expect(err).toBeInstanceOf(MalformedInputError);
    expect(err.index).toBe(1);
    expect(err.message).toBe("Input 1: A derivative needs at least 2 samples, got 1");
    expect(err.cause).toBeInstanceOf(MalformedInputError);
  });

  it("logs the batch size with the tokenizer name", () => {
    const { lines, run } = captureLogs(encodeBatch(word, ["a", "b"]));
    Effect.runSync(run);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] DEBUG encoded 2 inputs tokenizer=word$/);
  });

  it("logs a warning when a batch is rejected", () => {
    const tok = new SignalDerivativeTokenizer({ numEmbeddings: 1000, windowSize: 2, stride: 1 });
    const { lines, run } = captureLogs(tok.call([[1]]));
    Effect.runSync(Effect.flip(run));
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(
      /WARN {2}batch rejected: Input 0: A derivative needs at least 2 samples, got 1 tokenizer=signal-derivative$/,
    );
  });
});
