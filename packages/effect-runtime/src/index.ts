export { TokenizerFrom, TokenizerFromConfig } from "./layers.js";

export {
  makePrettyLogger,
  prettyLogger,
  PrettyLoggerLive,
  withPrettyLogging,
  parseLogLevel,
} from "./logging.js";
