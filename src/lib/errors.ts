/**
 * Base error class for all template registry errors
 */
export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "RegistryError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or JSON output
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
 * Two templates would resolve to the same (module, name) pair
 */
export class ConflictError extends RegistryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFLICT_ERROR", context);
    this.name = "ConflictError";
  }
}

/**
 * A template name could not be resolved
 */
export class TemplateLookupError extends RegistryError {
  constructor(
    message: string,
    public readonly templateName: string,
    context?: Record<string, unknown>
  ) {
    super(message, "TEMPLATE_LOOKUP_ERROR", { ...context, templateName });
    this.name = "TemplateLookupError";
  }
}

/**
 * A view declaration cannot be matched up with a template
 */
export class ViewConfigurationError extends RegistryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VIEW_CONFIGURATION_ERROR", context);
    this.name = "ViewConfigurationError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends RegistryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}
