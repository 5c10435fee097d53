/**
 * Response shapes. Entities are camelCase in the core and snake_case on the
 * wire; instants are ISO-8601 UTC strings.
 */

import type { Alert, AlertPage, AlertStateEntry } from "../../domain/alert/Alert"
import type { AlertSla } from "../../domain/sla/Sla"
import type { AlertGroup } from "../../domain/group/AlertGroup"
import type { EscalationPolicy } from "../../domain/escalation/EscalationPolicy"
import type { NotificationIntent } from "../../domain/notification/Notification"
import type { OnCallAssignment, OnCallSchedule } from "../../domain/oncall/OnCallSchedule"
import type { CreateAlertResult, AlertDetail } from "../../application/alert/AlertService"
import type { ComplianceReport, SlaStatus } from "../../application/sla/SlaTrackerService"
import type { GroupStatistics, OverallGroupStatistics } from "../../application/grouping/GroupingService"
import type { EscalationOutcome, EscalationStatus } from "../../application/escalation/EscalationService"
import type { HealthReport } from "../../application/health/HealthService"

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null
}

export function presentAlert(alert: Alert) {
  return {
    id: alert.id,
    device_id: alert.deviceId,
    rule_id: alert.ruleId,
    severity: alert.severity,
    message: alert.message,
    payload: alert.payload,
    created_at: iso(alert.createdAt),
    current_state: alert.currentState,
    state_changed_at: iso(alert.stateChangedAt),
    group_id: alert.groupId,
    escalation_tier: alert.escalation.tier,
    policy_id: alert.escalation.policyId,
    next_escalation_at: iso(alert.escalation.nextEscalationAt),
    last_escalated_at: iso(alert.escalation.lastEscalatedAt),
  }
}

export function presentAlertPage(page: AlertPage) {
  return {
    alerts: page.alerts.map(presentAlert),
    next_cursor: page.nextCursor,
  }
}

export function presentEntry(entry: AlertStateEntry) {
  return {
    alert_id: entry.alertId,
    sequence: entry.sequence,
    state: entry.state,
    actor: entry.actor,
    created_at: iso(entry.createdAt),
    notes: entry.notes,
    metadata: entry.metadata,
  }
}

export function presentSla(sla: AlertSla) {
  return {
    alert_id: sla.alertId,
    severity: sla.severity,
    tta_target_min: sla.ttaTargetMin,
    ttr_target_min: sla.ttrTargetMin,
    tta_actual_min: sla.ttaActualMin,
    ttr_actual_min: sla.ttrActualMin,
    acknowledged_at: iso(sla.acknowledgedAt),
    resolved_at: iso(sla.resolvedAt),
    tta_breached: sla.ttaBreached,
    ttr_breached: sla.ttrBreached,
    created_at: iso(sla.createdAt),
  }
}

export function presentSlaStatus(status: SlaStatus) {
  return {
    ...presentSla(status.sla),
    elapsed_min: status.elapsedMin,
    tta_remaining_min: status.ttaRemainingMin,
    ttr_remaining_min: status.ttrRemainingMin,
  }
}

export function presentGroup(group: AlertGroup) {
  return {
    id: group.id,
    device_id: group.deviceId,
    rule_id: group.ruleId,
    severity: group.severity,
    group_key: group.groupKey,
    first_occurrence: iso(group.firstOccurrence),
    last_occurrence: iso(group.lastOccurrence),
    occurrence_count: group.occurrenceCount,
    status: group.status,
    representative_alert_id: group.representativeAlertId,
    metadata: group.metadata,
    created_at: iso(group.createdAt),
    updated_at: iso(group.updatedAt),
    closed_at: iso(group.closedAt),
  }
}

export function presentCreatedAlert(result: CreateAlertResult) {
  return {
    alert_id: result.alertId,
    initial_state: result.initialState,
    sla_targets: {
      tta_minutes: result.slaTargets.ttaMinutes,
      ttr_minutes: result.slaTargets.ttrMinutes,
    },
    group_id: result.groupId,
    grouped: result.grouped,
    alert: presentAlert(result.alert),
  }
}

export function presentAlertDetail(detail: AlertDetail) {
  return {
    alert: presentAlert(detail.alert),
    history: detail.history.map(presentEntry),
    sla: detail.sla ? presentSla(detail.sla) : null,
    group: detail.group ? presentGroup(detail.group) : null,
  }
}

export function presentGroupStatistics(stats: GroupStatistics) {
  return {
    group_id: stats.groupId,
    group_key: stats.groupKey,
    device_id: stats.deviceId,
    rule_id: stats.ruleId,
    severity: stats.severity,
    occurrence_count: stats.occurrenceCount,
    first_occurrence: iso(stats.firstOccurrence),
    last_occurrence: iso(stats.lastOccurrence),
    age_minutes: stats.ageMinutes,
    noise_reduction_pct: stats.noiseReductionPct,
    status: stats.status,
  }
}

export function presentOverallStatistics(stats: OverallGroupStatistics) {
  return {
    total_groups: stats.totalGroups,
    active_groups: stats.activeGroups,
    closed_groups: stats.closedGroups,
    total_alerts_grouped: stats.totalAlertsGrouped,
    avg_alerts_per_group: stats.avgAlertsPerGroup,
    max_alerts_in_group: stats.maxAlertsInGroup,
    overall_noise_reduction_pct: stats.overallNoiseReductionPct,
  }
}

export function presentComplianceReport(report: ComplianceReport) {
  return {
    severity: report.severity,
    total_alerts: report.totalAlerts,
    acknowledged_alerts: report.acknowledgedAlerts,
    resolved_alerts: report.resolvedAlerts,
    tta_compliance_count: report.ttaComplianceCount,
    tta_compliance_rate: report.ttaComplianceRate,
    ttr_compliance_count: report.ttrComplianceCount,
    ttr_compliance_rate: report.ttrComplianceRate,
    avg_tta: report.avgTta,
    avg_ttr: report.avgTtr,
    tta_breaches: report.ttaBreaches,
    ttr_breaches: report.ttrBreaches,
    period_start: iso(report.periodStart),
    period_end: iso(report.periodEnd),
  }
}

export function presentAssignment(assignment: OnCallAssignment) {
  return {
    schedule_id: assignment.scheduleId,
    user_id: assignment.userId,
    user_order: assignment.userOrder,
    shift_start: iso(assignment.shiftStart),
    shift_end: iso(assignment.shiftEnd),
    is_override: assignment.isOverride,
    override_reason: assignment.overrideReason,
  }
}

export function presentSchedule(schedule: OnCallSchedule) {
  return {
    id: schedule.id,
    name: schedule.name,
    description: schedule.description,
    timezone: schedule.timezone,
    enabled: schedule.enabled,
    rotation_type: schedule.rotationType,
    rotation_start: iso(schedule.rotationStart),
    users: schedule.users,
    overrides: schedule.overrides.map((o) => ({
      user_id: o.userId,
      start: iso(o.start),
      end: iso(o.end),
      reason: o.reason,
    })),
    created_at: iso(schedule.createdAt),
    updated_at: iso(schedule.updatedAt),
  }
}

export function presentPolicy(policy: EscalationPolicy) {
  return {
    id: policy.id,
    name: policy.name,
    description: policy.description,
    severities: policy.severities,
    enabled: policy.enabled,
    acknowledge_suppresses: policy.acknowledgeSuppresses,
    tiers: policy.tiers.map((t) => ({
      level: t.level,
      delay_minutes: t.delayMinutes,
      channels: t.channels,
      recipients: t.recipients,
    })),
    created_at: iso(policy.createdAt),
    updated_at: iso(policy.updatedAt),
  }
}

export function presentIntent(intent: NotificationIntent) {
  return {
    id: intent.id,
    alert_id: intent.alertId,
    tier: intent.tier,
    policy_id: intent.policyId,
    channel: intent.channel,
    recipient: intent.recipient,
    status: intent.status,
    created_at: iso(intent.createdAt),
    dispatched_at: iso(intent.dispatchedAt),
    acknowledged_at: iso(intent.acknowledgedAt),
    detail: intent.detail,
  }
}

export function presentEscalationStatus(status: EscalationStatus) {
  return {
    alert_id: status.alertId,
    policy: status.policy ? { id: status.policy.id, name: status.policy.name } : null,
    current_tier: status.currentTier,
    total_tiers: status.totalTiers,
    next_escalation_at: iso(status.nextEscalationAt),
    escalation_complete: status.escalationComplete,
    current_state: status.currentState,
    paused: status.paused,
  }
}

export function presentEscalationOutcome(outcome: EscalationOutcome) {
  if (outcome.kind === "skipped") {
    return { escalated: false, alert_id: outcome.alertId, reason: outcome.reason }
  }
  const { result } = outcome
  return {
    escalated: true,
    alert_id: result.alertId,
    tier: result.tier,
    policy_id: result.policyId,
    policy_name: result.policyName,
    forced: result.forced,
    intents: result.intents.map(presentIntent),
  }
}

export function presentHealth(report: HealthReport) {
  return {
    status: report.status,
    store: report.store,
    config: {
      grouping_window_minutes: report.config.groupingWindowMinutes,
      escalation_tick_interval_seconds: report.config.escalationTickIntervalSeconds,
      acknowledge_suppresses: report.config.acknowledgeSuppresses,
      anomaly_min_confidence: report.config.anomalyMinConfidence,
      anomaly_auto_escalate: report.config.anomalyAutoEscalate,
      sla_report_window_days: report.config.slaReportWindowDays,
      notification_webhook_configured: report.config.notificationWebhookConfigured,
    },
  }
}
