export {
  RngLive,
  RngFrom,
} from "./layers.js";

export {
  prettyLogger,
  makePrettyLogger,
  loggingLayer,
  withSpan,
  parseLogLevel,
} from "./logging.js";
