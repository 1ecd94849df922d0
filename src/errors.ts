export class AppError extends Error {
  readonly statusCode: number;
  readonly context?: Record<string, unknown>;

  constructor(message: string, statusCode = 500, context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.context = context;
  }
}

/** A provider has no credentials, or the server runs in offline mode. */
export class CapabilityUnavailableError extends AppError {
  constructor(capability: string, reason: string) {
    super(`${capability} is unavailable: ${reason}`, 503, { capability });
  }
}

export class CapabilityTimeoutError extends AppError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 504, { operation, timeoutMs });
    this.timeoutMs = timeoutMs;
  }
}

export class UnknownStageError extends AppError {
  constructor(name: string) {
    super(`Unknown stage "${name}"`, 404, { stage: name });
  }
}

export class StageInvocationError extends AppError {
  constructor(stage: string, message: string) {
    super(`Stage "${stage}" invocation failed: ${message}`, 502, { stage });
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
