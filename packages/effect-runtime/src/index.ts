export {
  TrainerFrom,
  ConfigFrom,
  RuntimeFrom,
} from "./layers.js";

export {
  prettyLogger,
  formatLogLine,
  loggingLayer,
  parseLogLevel,
} from "./logging.js";
