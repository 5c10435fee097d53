/**
 * Session tokens
 *
 * A session is a base64-encoded JSON payload carried in the `session` cookie.
 * Issuing sessions belongs to the platform's identity service; the alerting
 * core only decodes them to learn the actor and role.
 */

import { z } from "zod"
import type { SessionData } from "../types"
import { AuthenticationError } from "../errors"

const sessionSchema = z.object({
  userId: z.string().min(1),
  role: z.enum(["ADMIN", "OPERATOR", "VIEWER", "SYSTEM"]),
})

export function encodeSessionToken(session: SessionData): string {
  return Buffer.from(JSON.stringify(session)).toString("base64")
}

export function decodeSessionToken(token: string): SessionData {
  let payload: unknown
  try {
    payload = JSON.parse(Buffer.from(token, "base64").toString("utf-8"))
  } catch {
    throw new AuthenticationError("Invalid session token")
  }

  const parsed = sessionSchema.safeParse(payload)
  if (!parsed.success) {
    throw new AuthenticationError("Invalid session token")
  }
  return parsed.data
}

/**
 * Reads the session from a Cookie header value. Returns null when absent.
 */
export function sessionFromCookieHeader(cookieHeader: string | undefined): SessionData | null {
  const sessionCookie = (cookieHeader || "")
    .split(";")
    .map((c) => c.trim())
    .find((c) => c.startsWith("session="))

  if (!sessionCookie) {
    return null
  }

  return decodeSessionToken(sessionCookie.slice("session=".length))
}

/** Actor recorded in history: system sessions act as the system (null). */
export function actorOf(session: SessionData): string | null {
  return session.role === "SYSTEM" ? null : session.userId
}
