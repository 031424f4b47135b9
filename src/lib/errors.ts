/**
 * Base error class for all Modelsmith errors
 */
export class ModelsmithError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ModelsmithError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or host presentation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for schema validation failures
 */
export class ValidationError extends ModelsmithError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for an invalid model configuration document
 */
export class ConfigError extends ModelsmithError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, "CONFIG_ERROR", context, options);
    this.name = "ConfigError";
  }
}

/**
 * Error for missing or malformed host input variables
 */
export class InputVariableError extends ModelsmithError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INPUT_VARIABLE_ERROR", context);
    this.name = "InputVariableError";
  }
}

// ─────────────────────────────────────────────────────────────────────────
// Generators
// ─────────────────────────────────────────────────────────────────────────

/**
 * A template referenced a generator (or helper) that is not registered
 */
export class UnknownGeneratorError extends ModelsmithError {
  constructor(public readonly generator: string, context?: Record<string, unknown>) {
    super(`Unknown generator: ${generator}`, "UNKNOWN_GENERATOR", { ...context, generator });
    this.name = "UnknownGeneratorError";
  }
}

export class DuplicateGeneratorError extends ModelsmithError {
  constructor(public readonly generator: string) {
    super(`Generator already registered: ${generator}`, "DUPLICATE_GENERATOR", { generator });
    this.name = "DuplicateGeneratorError";
  }
}

/**
 * A generator was called with an out-of-range or malformed parameter
 */
export class InvalidGeneratorArgumentError extends ModelsmithError {
  constructor(
    public readonly generator: string,
    public readonly method: string,
    public readonly parameter: string,
    reason: string
  ) {
    super(
      `Invalid argument '${parameter}' for ${generator}.${method}: ${reason}`,
      "INVALID_GENERATOR_ARGUMENT",
      { generator, method, parameter, reason }
    );
    this.name = "InvalidGeneratorArgumentError";
  }
}

// ─────────────────────────────────────────────────────────────────────────
// Templates
// ─────────────────────────────────────────────────────────────────────────

/**
 * Invalid template engine options, raised while the environment is built
 */
export class TemplateConfigError extends ModelsmithError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "TEMPLATE_CONFIG_ERROR", context);
    this.name = "TemplateConfigError";
  }
}

/**
 * The context template failed to expand
 */
export class ContextTemplateError extends ModelsmithError {
  constructor(public readonly templatePath: string, options: { cause: unknown }) {
    super(
      `Failed to expand context template ${templatePath}: ${describeCause(options.cause)}`,
      "CONTEXT_TEMPLATE_ERROR",
      { templatePath },
      options
    );
    this.name = "ContextTemplateError";
  }
}

/**
 * The expanded context template is not a valid context mapping
 */
export class ContextRenderError extends ModelsmithError {
  constructor(
    public readonly templatePath: string,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(`Invalid context from ${templatePath}: ${message}`, "CONTEXT_RENDER_ERROR", { ...context, templatePath }, options);
    this.name = "ContextRenderError";
  }
}

/**
 * The plan template failed to expand
 */
export class PlanTemplateError extends ModelsmithError {
  constructor(public readonly templatePath: string, options: { cause: unknown }) {
    super(
      `Failed to expand plan template ${templatePath}: ${describeCause(options.cause)}`,
      "PLAN_TEMPLATE_ERROR",
      { templatePath },
      options
    );
    this.name = "PlanTemplateError";
  }
}

/**
 * The expanded plan template is not a valid list of plan entries
 */
export class PlanRenderError extends ModelsmithError {
  constructor(
    public readonly templatePath: string,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(`Invalid plan from ${templatePath}: ${message}`, "PLAN_RENDER_ERROR", { ...context, templatePath }, options);
    this.name = "PlanRenderError";
  }
}

/**
 * A plan path resolves outside of the root it must stay in
 */
export class PathTraversalError extends ModelsmithError {
  constructor(
    public readonly path: string,
    public readonly root: string,
    public readonly kind: "source" | "destination"
  ) {
    super(`Plan ${kind} '${path}' escapes ${root}`, "PATH_TRAVERSAL", { path, root, kind });
    this.name = "PathTraversalError";
  }
}

/**
 * A single render task failed; rendering stops here
 */
export class RenderTaskError extends ModelsmithError {
  constructor(
    public readonly source: string | undefined,
    public readonly destination: string,
    options: { cause: unknown }
  ) {
    super(
      `Failed to render ${source ?? "<directory>"} -> ${destination}: ${describeCause(options.cause)}`,
      "RENDER_TASK_ERROR",
      { source, destination },
      options
    );
    this.name = "RenderTaskError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
