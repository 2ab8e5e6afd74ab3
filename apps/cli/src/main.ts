#!/usr/bin/env node
/**
 * hashtok CLI: the main entry point.
 *
 * Commands: encode, info, config save
 */
import { encodeCmd } from "./commands/encode.js";
import { infoCmd } from "./commands/info.js";
import { configSaveCmd } from "./commands/config.js";

const USAGE = `
hashtok: vocabulary-free hashing tokenizers for text, signals, images and audio

Commands:
  encode           Print the ids of each input item, one JSON line per item
  info             Show a tokenizer's resolved config, fingerprint and id layout
  config save      Write a validated tokenizer config file

Options:
  --kind=<kind>            word | ngram | character | positional-precise |
                           positional-rough | signal | signal-derivative |
                           image | spectrogram
  --numEmbeddings=<n>      Size of the id space
  --config=<path>          JSON config file; flags override its values
  --text=<value>           Inline input (JSON array of items for numeric kinds)
  --input=<path>           Input file (one text per line, or a JSON array)
  --logLevel=<level>       debug | info | warn | error | none
  --help, -h               Show this help

Examples:
  hashtok encode --kind=ngram --numEmbeddings=50000 --text="hello world"
  hashtok encode --kind=image --numEmbeddings=4096 --windowHeight=2 --windowWidth=2 --input=images.json
  hashtok info --kind=spectrogram --numEmbeddings=1024
  hashtok config save --kind=signal --numEmbeddings=1024 --windowSize=16 --stride=8 --out=configs/signal.json
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "encode") {
    await encodeCmd(args.slice(1));
  } else if (command === "info") {
    await infoCmd(args.slice(1));
  } else if (command === "config" && args[1] === "save") {
    await configSaveCmd(args.slice(2));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error("Fatal:", err instanceof Error ? err.message : err);
  process.exit(1);
});
