import type { ErrorKind } from "@/types/batch";

export class AppError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Missing or invalid API key / settings. Blocks every run. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super("configuration", message);
  }
}

/** No images or no usable prompt. Recoverable by selecting again. */
export class SelectionError extends AppError {
  constructor(message: string) {
    super("selection", message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super("not_found", message);
  }
}

export class RunInProgressError extends AppError {
  constructor(runId: string) {
    super("run_conflict", `Run ${runId} is still active`);
  }
}

// --- Per-item errors: recorded on the task, never abort a run ---

export class PerItemError extends AppError {}

export class AuthError extends PerItemError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("auth", message, options);
  }
}

export class RateLimitError extends PerItemError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("rate_limit", message, options);
  }
}

export class TransientNetworkError extends PerItemError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("network", message, options);
  }
}

export class InvalidResponseError extends PerItemError {
  constructor(message: string) {
    super("invalid_response", message);
  }
}

export class ApiRequestError extends PerItemError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("api", message, options);
  }
}

export class FileIOError extends PerItemError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("io", message, options);
  }
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === "string" && error) return error;
  return fallback;
}

export function errorKind(error: unknown): ErrorKind | undefined {
  return error instanceof AppError ? error.kind : undefined;
}
