/**
 * @hashtok/cli -- helpers behind the `hashtok` command, exported for reuse
 * and testing. The executable entry point is `main.ts`.
 */
export { parseKV, requireArg, strArg, boolArg, intListArg, configToKV, loadConfig } from "./parse.js";
export { resolveConfig, resolveTokenizer } from "./resolve.js";
export { textLines, parseSignals, parseMatrices, encodeContent, toJsonLine } from "./inputs.js";
export { describeTokenizer, type TokenizerInfo } from "./commands/info.js";
