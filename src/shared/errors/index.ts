/**
 * Shared Error Classes
 *
 * Every error surfaced by the alerting core carries a stable kind (`code`),
 * the HTTP status the API maps it to, and an optional detail record.
 */

export type ErrorKind =
  | "VALIDATION"
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "INVALID_SCHEDULE"
  | "CONFLICT"
  | "STORE_UNAVAILABLE"
  | "INTERNAL"
  | "AUTHENTICATION"
  | "AUTHORIZATION"

export type ErrorDetail = Record<string, unknown>

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: ErrorKind = "INTERNAL",
    public detail?: ErrorDetail
  ) {
    super(message)
    this.name = this.constructor.name
    Error.captureStackTrace(this, this.constructor)
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public field?: string, detail?: ErrorDetail) {
    super(message, 400, "VALIDATION", field ? { field, ...detail } : detail)
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = "Resource") {
    super(`${resource} not found`, 404, "NOT_FOUND")
  }
}

export class InvalidTransitionError extends AppError {
  constructor(public fromState: string, public toState: string) {
    super(
      `Invalid state transition: ${fromState} -> ${toState}`,
      400,
      "INVALID_TRANSITION",
      { from: fromState, to: toState }
    )
  }
}

export class InvalidScheduleError extends AppError {
  constructor(message: string, detail?: ErrorDetail) {
    super(message, 422, "INVALID_SCHEDULE", detail)
  }
}

export class ConflictError extends AppError {
  constructor(message: string, detail?: ErrorDetail) {
    super(message, 409, "CONFLICT", detail)
  }
}

export class StoreUnavailableError extends AppError {
  constructor(operation: string, cause?: unknown) {
    super(
      `Store unavailable during ${operation}`,
      503,
      "STORE_UNAVAILABLE",
      cause instanceof Error ? { operation, cause: cause.name } : { operation }
    )
  }
}

export class InternalError extends AppError {
  constructor(message: string = "Internal server error") {
    super(message, 500, "INTERNAL")
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = "Unauthorized") {
    super(message, 401, "AUTHENTICATION")
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = "Forbidden") {
    super(message, 403, "AUTHORIZATION")
  }
}

export interface ErrorBody {
  error: {
    kind: ErrorKind
    message: string
    detail?: ErrorDetail
  }
}

export function toErrorBody(error: AppError): ErrorBody {
  return {
    error: {
      kind: error.code,
      message: error.message,
      ...(error.detail && { detail: error.detail }),
    },
  }
}
