/**
 * Effect layers for dependency injection.
 *
 * Programs that only need to know which tokenizer they run against depend
 * on `TokenizerService`; these layers provide it.
 */
import { Layer } from "effect";
import {
  TokenizerService,
  type ConfigurationError,
  type NamedTokenizer,
  type TokenizerConfig,
} from "@hashtok/core";
import { createTokenizer } from "@hashtok/tokenizers";

// ── Tokenizer Layer ────────────────────────────────────────────────────────

export const TokenizerFrom = (tokenizer: NamedTokenizer) =>
  Layer.succeed(TokenizerService, tokenizer);

/** Build the tokenizer a config describes, failing the layer on bad options. */
export const TokenizerFromConfig = (
  config: TokenizerConfig,
): Layer.Layer<TokenizerService, ConfigurationError> => {
  const { kind, ...options } = config;
  return Layer.effect(TokenizerService, createTokenizer(kind, options));
};
