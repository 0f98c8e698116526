/**
 * Base class for every error raised by the evaluation pipeline.
 * Keeps the underlying error (if any) and appends its stack.
 */
export class PipelineError extends Error {
  constructor(message: string, cause?: unknown) {
    const combinedMessage =
      cause instanceof Error ? `${message}: ${cause.message}` : message;
    super(combinedMessage, { cause });
    this.name = "PipelineError";
    if (cause instanceof Error && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Invalid settings or a collaborator that cannot be used at start-up.
 * Raised before any question is processed.
 */
export class ConfigError extends PipelineError {
  constructor(message: string, public readonly issues: string[] = [], cause?: unknown) {
    super(issues.length > 0 ? `${message} (${issues.join("; ")})` : message, cause);
    this.name = "ConfigError";
  }
}

export class NotInitializedError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = "NotInitializedError";
  }
}

/**
 * The retrieval backend stopped responding. Fatal for the whole batch.
 */
export class BackendUnavailableError extends PipelineError {
  constructor(public readonly backend: string, message: string, cause?: unknown) {
    super(`${backend} unavailable: ${message}`, cause);
    this.name = "BackendUnavailableError";
  }
}

export class GenerationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GenerationError";
  }
}

export class ScoringError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ScoringError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : "Unknown error";
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}
