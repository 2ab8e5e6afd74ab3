/**
 * Shared batch entry point for every tokenizer.
 */
import { Effect } from "effect";
import { MalformedInputError, type HashingTokenizer } from "@hashtok/core";

/**
 * `numerize(tokenize(x))` for every input, in input order.
 *
 * The first item that fails aborts the whole batch; the error names its
 * index. Nothing partial is returned.
 */
export function encodeBatch<Raw, Tokens, Ids>(
  tokenizer: HashingTokenizer<Raw, Tokens, Ids>,
  inputs: readonly Raw[],
): Effect.Effect<Ids[], MalformedInputError> {
  return Effect.forEach(inputs, (raw, index) =>
    tokenizer.tokenize(raw).pipe(
      Effect.map((tokens) => tokenizer.numerize(tokens)),
      Effect.mapError(
        (cause) =>
          new MalformedInputError({ message: `Input ${index}: ${cause.message}`, index, cause }),
      ),
    ),
  ).pipe(
    Effect.tap((ids) => Effect.logDebug(`encoded ${ids.length} inputs`)),
    Effect.tapError((err) => Effect.logWarning(`batch rejected: ${err.message}`)),
    Effect.annotateLogs({ tokenizer: tokenizer.name }),
    Effect.withSpan(`tokenizer.${tokenizer.name}.call`, { attributes: { items: inputs.length } }),
  );
}
