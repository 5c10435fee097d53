/**
 * API Gateway plumbing shared by every route: session and permission checks,
 * request validation and the JSON error envelope.
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda"
import type { z } from "zod"
import { sessionFromCookieHeader } from "../../shared/auth/session"
import { isValidTimeZone, parseZonedInstant } from "../../domain/oncall/timezone"
import { requirePermission, type Permission, type Resource } from "../../shared/rbac/rbac"
import { AppError, AuthenticationError, InternalError, ValidationError, toErrorBody } from "../../shared/errors"
import type { SessionData } from "../../shared/types"

const JSON_HEADERS = { "Content-Type": "application/json" }

export function jsonResponse(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: JSON_HEADERS,
    body: JSON.stringify(body),
  }
}

export function noContent(): APIGatewayProxyResult {
  return { statusCode: 204, headers: JSON_HEADERS, body: "" }
}

export function errorResponse(error: unknown, tag: string): APIGatewayProxyResult {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      console.error(`[${tag}] ${error.code}: ${error.message}`)
    }
    return jsonResponse(error.statusCode, toErrorBody(error))
  }

  console.error(`[${tag}] Unhandled error:`, error)
  return jsonResponse(500, toErrorBody(new InternalError()))
}

export function getSession(event: APIGatewayProxyEvent): SessionData {
  const session = sessionFromCookieHeader(event.headers.cookie ?? event.headers.Cookie)
  if (!session) {
    throw new AuthenticationError()
  }
  return session
}

export function authorize(
  event: APIGatewayProxyEvent,
  resource: Resource,
  action: Permission["action"]
): SessionData {
  const session = getSession(event)
  requirePermission(session.role, resource, action)
  return session
}

export function pathParam(event: APIGatewayProxyEvent, name: string): string {
  const value = event.pathParameters?.[name]
  if (!value) {
    throw new ValidationError(`Path parameter ${name} is required`, name)
  }
  return value
}

function toValidationError(message: string, error: z.ZodError): ValidationError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }))
  return new ValidationError(message, issues[0]?.path || undefined, { issues })
}

export function parseBody<S extends z.ZodTypeAny>(event: APIGatewayProxyEvent, schema: S): z.output<S> {
  let raw: unknown = {}
  if (event.body) {
    try {
      raw = JSON.parse(event.body)
    } catch {
      throw new ValidationError("Request body must be valid JSON")
    }
  }

  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw toValidationError("Invalid request body", parsed.error)
  }
  return parsed.data
}

export function parseQuery<S extends z.ZodTypeAny>(event: APIGatewayProxyEvent, schema: S): z.output<S> {
  const parsed = schema.safeParse(event.queryStringParameters ?? {})
  if (!parsed.success) {
    throw toValidationError("Invalid query parameters", parsed.error)
  }
  return parsed.data
}

/**
 * Wraps a route body so every thrown error becomes the JSON error envelope.
 */
export function route(
  tag: string,
  handle: (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>
): (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult> {
  return async (event) => {
    try {
      return await handle(event)
    } catch (error) {
      return errorResponse(error, tag)
    }
  }
}

/**
 * Reads an instant given in a schedule's zone; values carrying an offset
 * are taken as-is.
 */
export function zonedInstant(value: string, timezone: string, field: string): Date {
  if (!isValidTimeZone(timezone)) {
    throw new ValidationError(`Unknown timezone: ${timezone}`, "timezone")
  }
  const instant = parseZonedInstant(value, timezone)
  if (!instant) {
    throw new ValidationError(`${field} must be an ISO-8601 date-time`, field)
  }
  return instant
}
