/**
 * Error taxonomy.
 *
 * Tool-level failures are values ({@link ToolError}) that end up as text in the
 * conversation. Everything that must stop the caller derives from
 * {@link AppError}.
 */

export type ToolErrorKind =
  | "transport"
  | "empty_result"
  | "malformed_result"
  | "remote"
  | "unknown_tool"
  | "invalid_arguments"
  | "execution";

export interface ToolError {
  kind: ToolErrorKind;
  message: string;
}

export function toolError(kind: ToolErrorKind, message: string): ToolError {
  return { kind, message };
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T, E = ToolError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function fail<E>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AppError";
  }
}

/** Invalid wiring detected at setup: duplicate tool names, nested delegation, bad config. */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIGURATION", false, context);
    this.name = "ConfigurationError";
  }
}

/** An agent could not start. `hint` tells the operator what to fix. */
export class InitializationError extends AppError {
  constructor(
    message: string,
    public readonly hint: string,
    context?: Record<string, unknown>,
  ) {
    super(message, "INITIALIZATION", false, context);
    this.name = "InitializationError";
  }
}

export class AgentNotStartedError extends AppError {
  constructor(agentName: string) {
    super(
      `${agentName} is not started; call start() before chat()`,
      "NOT_STARTED",
      false,
      { agent: agentName },
    );
    this.name = "AgentNotStartedError";
  }
}

/** A turn was appended that breaks the call-id pairing of the history. */
export class ProtocolError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "PROTOCOL", false, context);
    this.name = "ProtocolError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
