export {
  prettyLogger,
  makePrettyLogger,
  parseLogLevel,
  createLogger,
  silentLog,
  type Log,
  type LogFields,
  type LogLevelName,
} from "./logging.js";

export { ModelLock } from "./lock.js";
