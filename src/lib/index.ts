// Error classes
export {
  ModelsmithError,
  ValidationError,
  ConfigError,
  InputVariableError,
  UnknownGeneratorError,
  DuplicateGeneratorError,
  InvalidGeneratorArgumentError,
  TemplateConfigError,
  ContextTemplateError,
  ContextRenderError,
  PlanTemplateError,
  PlanRenderError,
  PathTraversalError,
  RenderTaskError,
} from "./errors.js";

// Result type and utilities
export { ok, err, unwrap, unwrapOr, andThen, tryCatch } from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, Logger } from "./logger.js";
export type { LogLevel } from "./logger.js";
