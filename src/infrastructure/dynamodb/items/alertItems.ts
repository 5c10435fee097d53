/**
 * Alert and state-entry item layout.
 *
 * alerts:              PK ALERT#<id>, SK METADATA
 *   created-index         GSI1PK ALERTS, GSI1SK <created_at>#<id>
 *   device-created-index  GSI2PK DEVICE#<device>, GSI2SK <created_at>#<id>
 *   escalation-due-index  ESC_PK ESCALATION#PENDING, ESC_SK <next_at>#<id> (sparse)
 *   group-index           GROUP_PK GROUP#<group>, GROUP_SK <created_at>#<id> (sparse)
 * alert_state_entries: PK ALERT#<id>, SK STATE#<sequence>
 */

import type { Alert, AlertStateEntry, EscalationTracking } from "../../../domain/alert/Alert"
import { isAlertSeverity, isAlertState } from "../../../domain/alert/Alert"
import { InternalError } from "../../../shared/errors"
import {
  type Item,
  padSequence,
  readDate,
  readNumber,
  readOptionalDate,
  readOptionalString,
  readRecord,
  readString,
} from "../attributes"

export const ALERT_SK = "METADATA"
export const ALL_ALERTS_PARTITION = "ALERTS"
export const ESCALATION_PENDING_PARTITION = "ESCALATION#PENDING"

export const CREATED_INDEX = "created-index"
export const DEVICE_CREATED_INDEX = "device-created-index"
export const ESCALATION_DUE_INDEX = "escalation-due-index"
export const GROUP_INDEX = "group-index"

export function alertPk(alertId: string): string {
  return `ALERT#${alertId}`
}

export function alertKey(alertId: string): Item {
  return { PK: alertPk(alertId), SK: ALERT_SK }
}

export function stateEntrySk(sequence: number): string {
  return `STATE#${padSequence(sequence)}`
}

export function escalationSortKey(nextAt: Date, alertId: string): string {
  return `${nextAt.toISOString()}#${alertId}`
}

export function groupPk(groupId: string): string {
  return `GROUP#${groupId}`
}

export function mapAlertToItem(alert: Alert): Item {
  const createdAt = alert.createdAt.toISOString()
  return {
    ...alertKey(alert.id),
    GSI1PK: ALL_ALERTS_PARTITION,
    GSI1SK: `${createdAt}#${alert.id}`,
    GSI2PK: `DEVICE#${alert.deviceId}`,
    GSI2SK: `${createdAt}#${alert.id}`,
    ...(alert.escalation.nextEscalationAt && {
      ESC_PK: ESCALATION_PENDING_PARTITION,
      ESC_SK: escalationSortKey(alert.escalation.nextEscalationAt, alert.id),
      next_escalation_at: alert.escalation.nextEscalationAt.toISOString(),
    }),
    ...(alert.groupId
      ? {
          GROUP_PK: groupPk(alert.groupId),
          GROUP_SK: `${createdAt}#${alert.id}`,
          group_id: alert.groupId,
        }
      : {}),
    id: alert.id,
    device_id: alert.deviceId,
    rule_id: alert.ruleId,
    severity: alert.severity,
    message: alert.message,
    payload: alert.payload,
    created_at: createdAt,
    current_state: alert.currentState,
    state_changed_at: alert.stateChangedAt.toISOString(),
    escalation_tier: alert.escalation.tier,
    escalation_policy_id: alert.escalation.policyId,
    last_escalated_at: alert.escalation.lastEscalatedAt?.toISOString() ?? null,
    version: alert.version,
  }
}

export function mapItemToAlert(item: Item): Alert {
  const severity = readString(item, "severity")
  const currentState = readString(item, "current_state")
  if (!isAlertSeverity(severity) || !isAlertState(currentState)) {
    throw new InternalError(`Malformed alert item ${String(item.PK)}`)
  }

  return {
    id: readString(item, "id"),
    deviceId: readString(item, "device_id"),
    ruleId: readString(item, "rule_id"),
    severity,
    message: readString(item, "message"),
    payload: readRecord(item, "payload"),
    createdAt: readDate(item, "created_at"),
    currentState,
    stateChangedAt: readDate(item, "state_changed_at"),
    groupId: readOptionalString(item, "group_id"),
    escalation: {
      tier: readNumber(item, "escalation_tier"),
      policyId: readOptionalString(item, "escalation_policy_id"),
      nextEscalationAt: readOptionalDate(item, "next_escalation_at"),
      lastEscalatedAt: readOptionalDate(item, "last_escalated_at"),
    },
    version: readNumber(item, "version"),
  }
}

export function mapStateEntryToItem(entry: AlertStateEntry): Item {
  return {
    PK: alertPk(entry.alertId),
    SK: stateEntrySk(entry.sequence),
    alert_id: entry.alertId,
    sequence: entry.sequence,
    state: entry.state,
    actor: entry.actor,
    created_at: entry.createdAt.toISOString(),
    notes: entry.notes,
    metadata: entry.metadata,
  }
}

export function mapItemToStateEntry(item: Item): AlertStateEntry {
  const state = readString(item, "state")
  if (!isAlertState(state)) {
    throw new InternalError(`Malformed state entry ${String(item.PK)}/${String(item.SK)}`)
  }

  return {
    alertId: readString(item, "alert_id"),
    sequence: readNumber(item, "sequence"),
    state,
    actor: readOptionalString(item, "actor"),
    createdAt: readDate(item, "created_at"),
    notes: readOptionalString(item, "notes"),
    metadata: readRecord(item, "metadata"),
  }
}

/**
 * SET/REMOVE clauses that move an alert's escalation schedule. Index keys
 * are removed rather than nulled so the alert leaves the sparse index.
 */
export function escalationUpdateClauses(
  alertId: string,
  escalation: EscalationTracking
): { set: string[]; remove: string[]; values: Item } {
  const set = [
    "escalation_tier = :tier",
    "escalation_policy_id = :policyId",
    "last_escalated_at = :lastEscalatedAt",
  ]
  const remove: string[] = []
  const values: Item = {
    ":tier": escalation.tier,
    ":policyId": escalation.policyId,
    ":lastEscalatedAt": escalation.lastEscalatedAt?.toISOString() ?? null,
  }

  if (escalation.nextEscalationAt) {
    set.push("ESC_PK = :escPk", "ESC_SK = :escSk", "next_escalation_at = :nextAt")
    values[":escPk"] = ESCALATION_PENDING_PARTITION
    values[":escSk"] = escalationSortKey(escalation.nextEscalationAt, alertId)
    values[":nextAt"] = escalation.nextEscalationAt.toISOString()
  } else {
    remove.push("ESC_PK", "ESC_SK", "next_escalation_at")
  }

  return { set, remove, values }
}

export function updateExpression(set: string[], remove: string[]): string {
  return [
    set.length > 0 ? `SET ${set.join(", ")}` : "",
    remove.length > 0 ? `REMOVE ${remove.join(", ")}` : "",
  ]
    .filter(Boolean)
    .join(" ")
}
