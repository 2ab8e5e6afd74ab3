/**
 * Command: hashtok config save
 *
 * Usage:
 *   hashtok config save --kind=image --numEmbeddings=4096 --windowHeight=4 --out=configs/image.json
 */
import { Effect } from "effect";
import { configFingerprint } from "@hashtok/core";
import { parseLogLevel, withPrettyLogging } from "@hashtok/effect-runtime";
import { saveTokenizerConfig } from "@hashtok/tokenizers";
import { loadConfig, parseKV, requireArg, strArg } from "../parse.js";
import { resolveTokenizer } from "../resolve.js";

export async function configSaveCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const outPath = requireArg(kv, "out", "output path for the config file");
  const level = parseLogLevel(strArg(kv, "logLevel", "info"));

  const program = Effect.gen(function* () {
    const { config } = yield* resolveTokenizer(kv);
    yield* saveTokenizerConfig(outPath, config);
    yield* Effect.logInfo(`saved ${config.kind} config ${configFingerprint(config)} to ${outPath}`);
  });

  await Effect.runPromise(withPrettyLogging(program, level));
}
