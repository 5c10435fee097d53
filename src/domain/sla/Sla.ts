/**
 * SLA Domain Entity
 *
 * One row per alert. Targets come from the severity table at creation and
 * never change; actuals are written at most once each.
 */

import type { AlertSeverity } from "../alert/Alert"

export interface SlaTargets {
  ttaMinutes: number
  ttrMinutes: number
}

export type SeverityTargets = Record<AlertSeverity, SlaTargets>

export const DEFAULT_SLA_TARGETS: SeverityTargets = {
  critical: { ttaMinutes: 5, ttrMinutes: 30 },
  high: { ttaMinutes: 15, ttrMinutes: 120 },
  medium: { ttaMinutes: 60, ttrMinutes: 480 },
  low: { ttaMinutes: 240, ttrMinutes: 1440 },
  info: { ttaMinutes: 1440, ttrMinutes: 10080 },
}

export interface AlertSla {
  alertId: string
  severity: AlertSeverity
  ttaTargetMin: number
  ttrTargetMin: number
  ttaActualMin: number | null
  ttrActualMin: number | null
  acknowledgedAt: Date | null
  resolvedAt: Date | null
  ttaBreached: boolean
  ttrBreached: boolean
  createdAt: Date
}

export type BreachType = "tta" | "ttr" | "all"

export interface SlaMeasurement {
  at: Date
  actualMin: number
  breached: boolean
}

export interface SlaRepository {
  findByAlertId(alertId: string): Promise<AlertSla | null>
  /** Returns null when TTA was already recorded. */
  recordAcknowledgement(alertId: string, measurement: SlaMeasurement): Promise<AlertSla | null>
  /** Returns null when TTR was already recorded. */
  recordResolution(alertId: string, measurement: SlaMeasurement): Promise<AlertSla | null>
  findCreatedBetween(from: Date, to: Date, severity?: AlertSeverity): Promise<AlertSla[]>
  findBreached(type: BreachType, severity: AlertSeverity | undefined, limit: number): Promise<AlertSla[]>
}
