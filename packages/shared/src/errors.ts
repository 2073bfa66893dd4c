/**
 * Error classes
 *
 * Errors are split along the recovery boundary they cross:
 *
 * - **Tool-level** (`ToolError`): fed back to the model as a failed tool result.
 * - **Turn-level** (`StepLimitError`, `ModelResponseError`, model `TimeoutError`):
 *   end the current turn with one `error` event; the session stays usable.
 * - **Protocol** (`InvalidMessageError`): a client message that cannot be handled.
 *
 * @module @citeline/shared/errors
 */

export type CitelineErrorCode =
  | "TOOL_ERROR"
  | "STEP_LIMIT"
  | "MODEL_RESPONSE"
  | "TIMEOUT"
  | "INVALID_MESSAGE"
  | "TURN_IN_PROGRESS";

/**
 * Base class for every error this project raises on purpose.
 */
export class CitelineError extends Error {
  constructor(
    message: string,
    readonly code: CitelineErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CitelineError";
  }
}

/**
 * Category reported to the model in a failed tool result.
 */
export type ToolErrorType =
  | "TOOL_NOT_FOUND"
  | "INVALID_ARGUMENTS"
  | "INVALID_URL"
  | "EMPTY_NOTE"
  | "COLLABORATOR_FAILED"
  | "TIMEOUT";

/**
 * A recoverable failure inside a single tool call.
 */
export class ToolError extends CitelineError {
  constructor(
    message: string,
    readonly errorType: ToolErrorType,
    options?: { cause?: unknown },
  ) {
    super(message, "TOOL_ERROR", options);
    this.name = "ToolError";
  }
}

/**
 * The model kept requesting tools past the configured number of rounds.
 */
export class StepLimitError extends CitelineError {
  constructor(readonly maxSteps: number) {
    super(
      `Unable to complete research: exceeded the limit of ${maxSteps} tool steps for this question`,
      "STEP_LIMIT",
    );
    this.name = "StepLimitError";
  }
}

/**
 * The model produced output the loop cannot interpret.
 */
export class ModelResponseError extends CitelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "MODEL_RESPONSE", options);
    this.name = "ModelResponseError";
  }
}

/**
 * An external call did not settle within its bounded wait.
 */
export class TimeoutError extends CitelineError {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT");
    this.name = "TimeoutError";
  }
}

export class InvalidMessageError extends CitelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "INVALID_MESSAGE", options);
    this.name = "InvalidMessageError";
  }
}

export function isToolError(error: unknown): error is ToolError {
  return error instanceof ToolError;
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/**
 * Human-readable message for any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === "string" && error) return error;
  return "Unknown error";
}
