/**
 * @fuzzgraph/core: errors, configuration and logging shared by all packages.
 */

export type { FuzzGraphConfig, GraphDefaultsConfig } from "./config.js";
export { config, defineConfig } from "./config.js";

export type { FuzzGraphErrorKind } from "./errors.js";
export {
  FuzzGraphError,
  GraphTypeError,
  NotFoundError,
  DuplicateError,
  InvalidEdgeError,
  UnsupportedError,
  InvalidMembershipError,
  isFuzzGraphError,
} from "./errors.js";

export type { Logger, LogWriter } from "./logger.js";
export { createLogger, setLogWriter } from "./logger.js";
