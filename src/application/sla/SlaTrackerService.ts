/**
 * SLA Tracker Service
 *
 * Targets are fixed per severity when the alert is created. Time to
 * acknowledge is measured on the first human response (acknowledged,
 * investigating, or a direct resolve) and time to resolve on resolution,
 * both in whole minutes from alert creation. Breach is strictly
 * `actual > target`.
 */

import type { AlertSeverity } from "../../domain/alert/Alert"
import { RESPONSE_STATES, type AlertTransitionEvent } from "../../domain/alert/AlertLifecycle"
import type { AlertSla, BreachType, SeverityTargets, SlaRepository, SlaTargets } from "../../domain/sla/Sla"
import { ALERT_SEVERITIES } from "../../domain/alert/Alert"
import type { Clock } from "../../shared/clock"
import { NotFoundError, ValidationError } from "../../shared/errors"
import { addDays, minutesBetween, roundTo } from "../../shared/time"

export interface ComplianceReport {
  severity: AlertSeverity | "all"
  totalAlerts: number
  acknowledgedAlerts: number
  resolvedAlerts: number
  ttaComplianceCount: number
  ttaComplianceRate: number
  ttrComplianceCount: number
  ttrComplianceRate: number
  avgTta: number
  avgTtr: number
  ttaBreaches: number
  ttrBreaches: number
  periodStart: Date
  periodEnd: Date
}

export interface ComplianceReportRequest {
  severity?: AlertSeverity
  from?: Date
  to?: Date
}

export interface SlaStatus {
  sla: AlertSla
  elapsedMin: number
  // Minutes left before the target is breached; null once measured
  ttaRemainingMin: number | null
  ttrRemainingMin: number | null
}

export interface SlaTrackerOptions {
  severityTargets: SeverityTargets
  reportWindowDays: number
}

function average(values: number[]): number {
  return values.length > 0 ? roundTo(values.reduce((sum, v) => sum + v, 0) / values.length, 1) : 0
}

function rate(count: number, total: number): number {
  return total > 0 ? roundTo((count / total) * 100, 1) : 0
}

export class SlaTrackerService {
  constructor(
    private slaRepository: SlaRepository,
    private clock: Clock,
    private options: SlaTrackerOptions
  ) {}

  targetsFor(severity: AlertSeverity): SlaTargets {
    return this.options.severityTargets[severity]
  }

  /**
   * The SLA row for a new alert. It is written by the alert creation
   * transaction, never on its own.
   */
  materialize(alertId: string, severity: AlertSeverity, createdAt: Date): AlertSla {
    const targets = this.targetsFor(severity)
    return {
      alertId,
      severity,
      ttaTargetMin: targets.ttaMinutes,
      ttrTargetMin: targets.ttrMinutes,
      ttaActualMin: null,
      ttrActualMin: null,
      acknowledgedAt: null,
      resolvedAt: null,
      ttaBreached: false,
      ttrBreached: false,
      createdAt,
    }
  }

  /**
   * Transition listener. Failures are logged for reconciliation and never
   * reach the transition that triggered them.
   */
  async handleTransition(event: AlertTransitionEvent): Promise<void> {
    try {
      if (RESPONSE_STATES.includes(event.toState)) {
        await this.onFirstHumanResponse(event.alertId, event.occurredAt)
      }
      if (event.toState === "resolved") {
        await this.onResolved(event.alertId, event.occurredAt)
      }
    } catch (error) {
      console.error(`[SLA] Failed to update SLA for alert ${event.alertId}, needs reconciliation:`, error)
    }
  }

  /** Records TTA once; later calls return the row unchanged. */
  async onFirstHumanResponse(alertId: string, at: Date = this.clock.now()): Promise<AlertSla> {
    const sla = await this.getSla(alertId)
    if (sla.ttaActualMin !== null) {
      return sla
    }

    const actualMin = minutesBetween(sla.createdAt, at)
    const breached = actualMin > sla.ttaTargetMin
    const updated = await this.slaRepository.recordAcknowledgement(alertId, { at, actualMin, breached })
    if (!updated) {
      // Another writer recorded it first
      return this.getSla(alertId)
    }

    if (breached) {
      console.warn(`[SLA] TTA breached for alert ${alertId}: ${actualMin} min > ${sla.ttaTargetMin} min target`)
    }
    return updated
  }

  /** Records TTR once; later calls return the row unchanged. */
  async onResolved(alertId: string, at: Date = this.clock.now()): Promise<AlertSla> {
    const sla = await this.getSla(alertId)
    if (sla.ttrActualMin !== null) {
      return sla
    }

    const actualMin = minutesBetween(sla.createdAt, at)
    const breached = actualMin > sla.ttrTargetMin
    const updated = await this.slaRepository.recordResolution(alertId, { at, actualMin, breached })
    if (!updated) {
      return this.getSla(alertId)
    }

    if (breached) {
      console.warn(`[SLA] TTR breached for alert ${alertId}: ${actualMin} min > ${sla.ttrTargetMin} min target`)
    }
    return updated
  }

  async getSla(alertId: string): Promise<AlertSla> {
    const sla = await this.slaRepository.findByAlertId(alertId)
    if (!sla) {
      throw new NotFoundError("SLA")
    }
    return sla
  }

  async getSlaStatus(alertId: string): Promise<SlaStatus> {
    const sla = await this.getSla(alertId)
    const elapsedMin = minutesBetween(sla.createdAt, this.clock.now())

    return {
      sla,
      elapsedMin,
      ttaRemainingMin: sla.ttaActualMin === null ? sla.ttaTargetMin - elapsedMin : null,
      ttrRemainingMin: sla.ttrActualMin === null ? sla.ttrTargetMin - elapsedMin : null,
    }
  }

  async getBreachedAlerts(type: BreachType = "all", severity?: AlertSeverity, limit: number = 100): Promise<AlertSla[]> {
    return this.slaRepository.findBreached(type, severity, limit)
  }

  async complianceReport(request: ComplianceReportRequest = {}): Promise<ComplianceReport> {
    const { from, to } = this.reportWindow(request)
    const rows = await this.slaRepository.findCreatedBetween(from, to, request.severity)
    return this.summarize(rows, request.severity ?? "all", from, to)
  }

  /** One report per severity over the same window. */
  async complianceBreakdown(request: Omit<ComplianceReportRequest, "severity"> = {}): Promise<ComplianceReport[]> {
    const { from, to } = this.reportWindow(request)
    const rows = await this.slaRepository.findCreatedBetween(from, to)

    return ALERT_SEVERITIES.map((severity) =>
      this.summarize(rows.filter((row) => row.severity === severity), severity, from, to)
    )
  }

  private reportWindow(request: ComplianceReportRequest): { from: Date; to: Date } {
    const to = request.to ?? this.clock.now()
    const from = request.from ?? addDays(to, -this.options.reportWindowDays)
    if (from.getTime() > to.getTime()) {
      throw new ValidationError("from must not be after to", "from")
    }
    return { from, to }
  }

  private summarize(rows: AlertSla[], severity: AlertSeverity | "all", from: Date, to: Date): ComplianceReport {
    const acknowledged = rows.filter((row) => row.ttaActualMin !== null)
    const resolved = rows.filter((row) => row.ttrActualMin !== null)
    const ttaComplianceCount = acknowledged.filter((row) => !row.ttaBreached).length
    const ttrComplianceCount = resolved.filter((row) => !row.ttrBreached).length

    return {
      severity,
      totalAlerts: rows.length,
      acknowledgedAlerts: acknowledged.length,
      resolvedAlerts: resolved.length,
      ttaComplianceCount,
      ttaComplianceRate: rate(ttaComplianceCount, acknowledged.length),
      ttrComplianceCount,
      ttrComplianceRate: rate(ttrComplianceCount, resolved.length),
      avgTta: average(acknowledged.flatMap((row) => (row.ttaActualMin === null ? [] : [row.ttaActualMin]))),
      avgTtr: average(resolved.flatMap((row) => (row.ttrActualMin === null ? [] : [row.ttrActualMin]))),
      ttaBreaches: acknowledged.length - ttaComplianceCount,
      ttrBreaches: resolved.length - ttrComplianceCount,
      periodStart: from,
      periodEnd: to,
    }
  }
}
