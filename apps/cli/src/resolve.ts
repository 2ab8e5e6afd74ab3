/**
 * Turn CLI flags into a tokenizer config and a tokenizer.
 */
import { Effect } from "effect";
import { ConfigurationError, type TokenizerConfig } from "@hashtok/core";
import { createTokenizer, parseTokenizerConfig, tokenizerRegistry, type AnyTokenizer } from "@hashtok/tokenizers";
import { boolArg, intListArg, requireArg } from "./parse.js";

const NUMBER_FLAGS = [
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
] as const;

/**
 * Collect the tokenizer flags present in `kv` into a shape-checked config.
 * Flags the CLI uses for other purposes (`--text`, `--out`, ...) are ignored.
 */
export function resolveConfig(kv: Record<string, string>): TokenizerConfig {
  const record: Record<string, unknown> = {
    kind: requireArg(kv, "kind", tokenizerRegistry.list().join(" | ")),
  };
  requireArg(kv, "numEmbeddings", "size of the id space");
  for (const flag of NUMBER_FLAGS) {
    const val = kv[flag];
    if (val !== undefined) record[flag] = Number(val);
  }
  if (kv["inputWord"] !== undefined) record.inputWord = boolArg(kv, "inputWord", false);
  if (kv["language"] !== undefined) record.language = kv["language"];
  record.ngrams = intListArg(kv, "ngrams");
  record.skipngrams = intListArg(kv, "skipngrams");
  return parseTokenizerConfig(record);
}

/** Config plus tokenizer, both failing as `ConfigurationError`. */
export function resolveTokenizer(
  kv: Record<string, string>,
): Effect.Effect<{ config: TokenizerConfig; tokenizer: AnyTokenizer }, ConfigurationError> {
  return Effect.try({
    try: () => resolveConfig(kv),
    catch: (cause) =>
      cause instanceof ConfigurationError
        ? cause
        : new ConfigurationError({ message: cause instanceof Error ? cause.message : String(cause), cause }),
  }).pipe(
    Effect.flatMap((config) => {
      const { kind, ...options } = config;
      return createTokenizer(kind, options).pipe(Effect.map((tokenizer) => ({ config, tokenizer })));
    }),
  );
}
