/**
 * Typed error hierarchy
 * Machine-readable codes plus optional context for diagnostics.
 */

export class DiffpressError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "DiffpressError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised before any row is processed; aborts the run with usage text
 */
export class PreconditionError extends DiffpressError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "PRECONDITION_FAILED", context);
    this.name = "PreconditionError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TimeoutError extends DiffpressError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    context?: Record<string, unknown>,
  ) {
    super(message, "TIMEOUT", context);
    this.name = "TimeoutError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ContentStoreError extends DiffpressError {
  constructor(
    message: string,
    public readonly status?: number,
    context?: Record<string, unknown>,
  ) {
    super(message, "CONTENT_STORE_ERROR", context);
    this.name = "ContentStoreError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RenderError extends DiffpressError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "RENDER_ERROR", context);
    this.name = "RenderError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
