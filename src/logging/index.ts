export {
  createStreamLogger,
  describeError,
  LogLevel,
  silentLogger,
} from "./logger.js";
export type { GateLogger, StreamLoggerOptions, WritableLike } from "./logger.js";
