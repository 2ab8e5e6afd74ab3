/**
 * Command: hashtok info
 *
 * Prints the fully resolved config of a tokenizer with its fingerprint and
 * id layout.
 */
import { Effect } from "effect";
import { configFingerprint, firstHashedId, specialTokenIds } from "@hashtok/core";
import { parseLogLevel, withPrettyLogging } from "@hashtok/effect-runtime";
import type { AnyTokenizer } from "@hashtok/tokenizers";
import { loadConfig, parseKV, strArg } from "../parse.js";
import { resolveTokenizer } from "../resolve.js";

export interface TokenizerInfo {
  readonly config: Record<string, unknown>;
  readonly fingerprint: string;
  /** Half-open range of ids reserved for special tokens. */
  readonly reservedIds: readonly [number, number];
  readonly specialTokens: Readonly<Record<string, number>>;
  readonly lsh?: { readonly bits: number; readonly dimension: number };
}

export function describeTokenizer(tokenizer: AnyTokenizer): TokenizerInfo {
  const config = { kind: tokenizer.name, ...tokenizer.options };
  const info: TokenizerInfo = {
    config,
    fingerprint: configFingerprint(config),
    reservedIds: [tokenizer.paddingIdx, firstHashedId(tokenizer.paddingIdx)],
    specialTokens: specialTokenIds(tokenizer.paddingIdx),
  };
  if ("quantizer" in tokenizer) {
    const { bits, dimension } = tokenizer.quantizer;
    return { ...info, lsh: { bits, dimension } };
  }
  return info;
}

export async function infoCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const level = parseLogLevel(strArg(kv, "logLevel", "info"));

  const program = resolveTokenizer(kv).pipe(
    Effect.map(({ tokenizer }) => describeTokenizer(tokenizer)),
    Effect.tap((info) => Effect.sync(() => console.log(JSON.stringify(info, null, 2)))),
  );

  await Effect.runPromise(withPrettyLogging(program, level));
}
