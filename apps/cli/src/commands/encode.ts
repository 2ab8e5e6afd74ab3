/**
 * Command: hashtok encode
 *
 * Usage:
 *   hashtok encode --kind=ngram --numEmbeddings=50000 --text="hello world"
 *   hashtok encode --kind=signal --numEmbeddings=1024 --windowSize=8 --stride=4 --input=signals.json
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { MalformedInputError } from "@hashtok/core";
import { parseLogLevel, withPrettyLogging } from "@hashtok/effect-runtime";
import { loadConfig, parseKV, strArg } from "../parse.js";
import { resolveTokenizer } from "../resolve.js";
import { encodeContent, toJsonLine } from "../inputs.js";

function readInput(kv: Record<string, string>): Effect.Effect<{ content: string; fromFile: boolean }, MalformedInputError> {
  const text = kv["text"];
  if (text !== undefined) return Effect.succeed({ content: text, fromFile: false });
  const path = kv["input"];
  if (!path) {
    return Effect.fail(new MalformedInputError({ message: "Pass --text=<value> or --input=<path>" }));
  }
  return Effect.tryPromise({
    try: async () => ({ content: await readFile(path, "utf-8"), fromFile: true }),
    catch: (cause) => new MalformedInputError({ message: `Failed to read input "${path}"`, cause }),
  });
}

export async function encodeCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const level = parseLogLevel(strArg(kv, "logLevel", "info"));

  const program = Effect.gen(function* () {
    const { tokenizer } = yield* resolveTokenizer(kv);
    const { content, fromFile } = yield* readInput(kv);
    const encoded = yield* encodeContent(tokenizer, content, fromFile);
    for (const ids of encoded) console.log(toJsonLine(ids));
    yield* Effect.logInfo(`encoded ${encoded.length} items with ${tokenizer.name}`);
  });

  await Effect.runPromise(withPrettyLogging(program, level));
}
