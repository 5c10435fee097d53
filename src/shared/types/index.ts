/**
 * Shared Types
 */

export type Role = "ADMIN" | "OPERATOR" | "VIEWER" | "SYSTEM"

export interface SessionData {
  userId: string
  role: Role
}

/** JSON object carried on alerts, history entries and groups. */
export type JsonRecord = Record<string, unknown>
