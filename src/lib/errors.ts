export class DomainError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number = 400,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "DomainError";
  }
}

export class ValidationError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_ERROR", message, 400, details);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends DomainError {
  constructor(message: string) {
    super("NOT_FOUND", message, 404);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends DomainError {
  constructor(message: string) {
    super("CONFLICT", message, 409);
    this.name = "ConflictError";
  }
}

export type UpstreamErrorKind = "rate_limit" | "network" | "malformed" | "http" | "auth";

/**
 * Failure talking to the company data provider. Retryable by resuming an
 * export or repeating the request later.
 */
export class UpstreamError extends DomainError {
  constructor(
    readonly kind: UpstreamErrorKind,
    message: string,
    readonly upstreamStatus: number | null = null,
  ) {
    super("UPSTREAM_ERROR", message, 502, { kind, upstreamStatus });
    this.name = "UpstreamError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
