import { describe, it, expect } from "vitest";
import { Effect, Logger, LogLevel } from "effect";
import { ConfigurationError, TokenizerService } from "@hashtok/core";
import {
  TokenizerFrom,
  TokenizerFromConfig,
  makePrettyLogger,
  parseLogLevel,
  withPrettyLogging,
} from "@hashtok/effect-runtime";
import { SignalTokenizer } from "@hashtok/tokenizers";

describe("parseLogLevel", () => {
  it("maps level names case-insensitively", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.Debug);
    expect(parseLogLevel("WARNING")).toBe(LogLevel.Warning);
    expect(parseLogLevel("warn")).toBe(LogLevel.Warning);
    expect(parseLogLevel("none")).toBe(LogLevel.None);
  });

  it("falls back to info", () => {
    expect(parseLogLevel("verbose")).toBe(LogLevel.Info);
  });
});

describe("makePrettyLogger", () => {
  it("writes timestamp, level, message and annotations on one line", () => {
    const lines: string[] = [];
    const logger = makePrettyLogger((line) => lines.push(line));
    Effect.runSync(
      Effect.logInfo("hello").pipe(
        Effect.annotateLogs({ run: "r1" }),
        Effect.provide(Logger.replace(Logger.defaultLogger, logger)),
      ),
    );
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] INFO  hello run=r1$/);
  });
});

describe("withPrettyLogging", () => {
  it("passes the result through", () => {
    expect(Effect.runSync(withPrettyLogging(Effect.succeed(3), LogLevel.None))).toBe(3);
  });
});

describe("tokenizer layers", () => {
  const describeService = Effect.gen(function* () {
    const tok = yield* TokenizerService;
    return `${tok.name}:${tok.numEmbeddings}`;
  });

  it("provides a ready tokenizer", () => {
    const tok = new SignalTokenizer({ numEmbeddings: 512, windowSize: 4, stride: 2 });
    expect(Effect.runSync(describeService.pipe(Effect.provide(TokenizerFrom(tok))))).toBe("signal:512");
  });

  it("builds the tokenizer a config describes", () => {
    const layer = TokenizerFromConfig({ kind: "ngram", numEmbeddings: 2048 });
    expect(Effect.runSync(describeService.pipe(Effect.provide(layer)))).toBe("ngram:2048");
  });

  it("fails the layer on invalid options", () => {
    const layer = TokenizerFromConfig({ kind: "word", numEmbeddings: 2 });
    const err = Effect.runSync(Effect.flip(describeService.pipe(Effect.provide(layer))));
    expect(err).toBeInstanceOf(ConfigurationError);
  });
});
