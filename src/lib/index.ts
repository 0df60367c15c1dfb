// Error classes
export {
  RegistryError,
  ConflictError,
  TemplateLookupError,
  ViewConfigurationError,
  ConfigError,
} from "./errors.js";

// Result type and utilities
export { ok, err, tryCatch } from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, Logger } from "./logger.js";
export type { LogLevel, LoggerConfig } from "./logger.js";
