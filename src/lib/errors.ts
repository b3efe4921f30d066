/**
 * Base error class for all qsprobe errors
 */
export class ProbeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ProbeError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or reports
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
 * Missing or invalid input sources and options. Fatal before scheduling.
 */
export class ConfigurationError extends ProbeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", context);
    this.name = "ConfigurationError";
  }
}

/**
 * External tool could not be resolved or is not runnable
 */
export class ToolUnavailableError extends ProbeError {
  constructor(
    public readonly tool: string,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(`${tool} is not available: ${reason}`, "TOOL_UNAVAILABLE", { ...context, tool });
    this.name = "ToolUnavailableError";
  }
}

/**
 * A single invocation attempt exceeded its timeout
 */
export class InvocationTimeout extends ProbeError {
  constructor(
    public readonly attempt: number,
    public readonly timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(`Attempt ${attempt} timed out after ${timeoutMs}ms`, "INVOCATION_TIMEOUT", {
      ...context,
      attempt,
      timeoutMs,
    });
    this.name = "InvocationTimeout";
  }
}

/**
 * A single invocation attempt exited non-zero
 */
export class InvocationFailure extends ProbeError {
  constructor(
    public readonly attempt: number,
    public readonly exitCode: number,
    detail?: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Attempt ${attempt} exited with code ${exitCode}${detail ? `: ${detail}` : ""}`,
      "INVOCATION_FAILURE",
      { ...context, attempt, exitCode }
    );
    this.name = "InvocationFailure";
  }
}

/**
 * Durable state could not be read or written. Always fatal.
 */
export class StatePersistenceError extends ProbeError {
  constructor(
    message: string,
    public readonly filePath: string,
    context?: Record<string, unknown>
  ) {
    super(message, "STATE_PERSISTENCE_ERROR", { ...context, filePath });
    this.name = "StatePersistenceError";
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Whether a thrown value is a system error with the given errno code
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
