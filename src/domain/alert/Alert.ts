/**
 * Alert Domain Entity
 *
 * An alert raised by a rule engine or an anomaly detector for one device.
 * Attributes are immutable after creation; only the lifecycle state,
 * escalation tracking and group link change, and only through the
 * repository operations below.
 */

import type { JsonRecord } from "../../shared/types"
import type { AlertSla } from "../sla/Sla"
import type { AlertGroup } from "../group/AlertGroup"
import type { NotificationIntent } from "../notification/Notification"

export const ALERT_SEVERITIES = ["critical", "high", "medium", "low", "info"] as const
export type AlertSeverity = (typeof ALERT_SEVERITIES)[number]

export const ALERT_STATES = ["new", "acknowledged", "investigating", "resolved"] as const
export type AlertState = (typeof ALERT_STATES)[number]

export function isAlertSeverity(value: unknown): value is AlertSeverity {
  return typeof value === "string" && ALERT_SEVERITIES.some((severity) => severity === value)
}

export function isAlertState(value: unknown): value is AlertState {
  return typeof value === "string" && ALERT_STATES.some((state) => state === value)
}

/**
 * Denormalized copy of the escalation tier recorded in the latest history
 * entry, plus the instant the next tier becomes due (null when nothing is
 * pending, which also removes the alert from the escalation scan).
 */
export interface EscalationTracking {
  tier: number
  policyId: string | null
  nextEscalationAt: Date | null
  lastEscalatedAt: Date | null
}

export interface Alert {
  id: string
  deviceId: string
  ruleId: string
  severity: AlertSeverity
  message: string
  payload: JsonRecord
  createdAt: Date
  currentState: AlertState
  // Instant of the latest history entry
  stateChangedAt: Date
  groupId: string | null
  escalation: EscalationTracking
  // Bumped by every history append; doubles as the entry sequence
  version: number
}

export interface AlertStateEntry {
  alertId: string
  sequence: number
  state: AlertState
  // null for system
  actor: string | null
  createdAt: Date
  notes: string | null
  metadata: JsonRecord
}

export interface CreateAlertInput {
  deviceId: string
  ruleId: string
  severity: AlertSeverity
  message: string
  payload?: JsonRecord
}

export interface AlertFilter {
  severity?: AlertSeverity
  state?: AlertState
  deviceId?: string
  ruleId?: string
  source?: string
  from?: Date
  to?: Date
  limit: number
  cursor?: string
}

export interface AlertPage {
  alerts: Alert[]
  nextCursor: string | null
}

/**
 * How a new alert joins a group. `open` may supersede a stale active group
 * for the same key, which is closed in the same write.
 */
export type GroupLinkage =
  | { kind: "open"; group: AlertGroup; supersedes: AlertGroup | null }
  | { kind: "absorb"; group: AlertGroup; previousCount: number }

export interface NewAlertRecord {
  alert: Alert
  initialEntry: AlertStateEntry
  sla: AlertSla
  linkage: GroupLinkage
}

export interface AlertStateChange {
  alertId: string
  expectedVersion: number
  entry: AlertStateEntry
  currentState: AlertState
  escalation: EscalationTracking
  intents?: NotificationIntent[]
}

export interface AlertRepository {
  findById(id: string): Promise<Alert | null>
  findHistory(alertId: string): Promise<AlertStateEntry[]>
  findLatestEntry(alertId: string): Promise<AlertStateEntry | null>
  list(filter: AlertFilter): Promise<AlertPage>
  /** Alert, initial entry, SLA row and group linkage in one atomic write. */
  create(record: NewAlertRecord): Promise<void>
  /**
   * Appends a history entry (and any notification intents) and moves the
   * alert to `version + 1`. Throws ConflictError when the stored version
   * is no longer `expectedVersion`.
   */
  appendEntry(change: AlertStateChange): Promise<Alert>
  /** Moves the escalation schedule without writing history. */
  reschedule(alertId: string, nextEscalationAt: Date | null, expectedVersion: number): Promise<Alert>
  findDueForEscalation(now: Date, limit: number): Promise<Alert[]>
  /** Deletes the alert with its history, SLA row and notification intents. */
  delete(id: string): Promise<void>
}
