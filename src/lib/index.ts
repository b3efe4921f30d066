// Error classes
export {
  ProbeError,
  ConfigurationError,
  ToolUnavailableError,
  InvocationTimeout,
  InvocationFailure,
  StatePersistenceError,
  errorMessage,
  hasErrorCode,
} from "./errors.js";

// Result type and utilities
export { ok, err, unwrap } from "./result.js";
export type { Result } from "./result.js";

// Logger
export { Logger, logger } from "./logger.js";
export type { LogLevel } from "./logger.js";
