/**
 * alert_groups: PK GROUP#<id>, SK METADATA
 *   status-index        GSI1PK STATUS#<status>, GSI1SK <last_occurrence>#<id>
 *   device-group-index  GSI2PK DEVICE#<device>, GSI2SK <last_occurrence>#<id>
 * Active-key guard:     PK GROUPKEY#<key>, SK ACTIVE, group_id
 */

import type { AlertGroup } from "../../../domain/group/AlertGroup"
import { isAlertSeverity } from "../../../domain/alert/Alert"
import { InternalError } from "../../../shared/errors"
import {
  type Item,
  readDate,
  readNumber,
  readOptionalDate,
  readRecord,
  readString,
} from "../attributes"
import { groupPk } from "./alertItems"

export const GROUP_SK = "METADATA"
export const ACTIVE_GUARD_SK = "ACTIVE"
export const STATUS_INDEX = "status-index"
export const DEVICE_GROUP_INDEX = "device-group-index"

export function groupKey(groupId: string): Item {
  return { PK: groupPk(groupId), SK: GROUP_SK }
}

export function activeGuardKey(compositeKey: string): Item {
  return { PK: `GROUPKEY#${compositeKey}`, SK: ACTIVE_GUARD_SK }
}

export function mapGroupToItem(group: AlertGroup): Item {
  const lastOccurrence = group.lastOccurrence.toISOString()
  return {
    ...groupKey(group.id),
    GSI1PK: `STATUS#${group.status}`,
    GSI1SK: `${lastOccurrence}#${group.id}`,
    GSI2PK: `DEVICE#${group.deviceId}`,
    GSI2SK: `${lastOccurrence}#${group.id}`,
    id: group.id,
    device_id: group.deviceId,
    rule_id: group.ruleId,
    severity: group.severity,
    group_key: group.groupKey,
    first_occurrence: group.firstOccurrence.toISOString(),
    last_occurrence: lastOccurrence,
    occurrence_count: group.occurrenceCount,
    status: group.status,
    representative_alert_id: group.representativeAlertId,
    metadata: group.metadata,
    created_at: group.createdAt.toISOString(),
    updated_at: group.updatedAt.toISOString(),
    closed_at: group.closedAt?.toISOString() ?? null,
  }
}

export function mapActiveGuardToItem(group: AlertGroup): Item {
  return {
    ...activeGuardKey(group.groupKey),
    group_id: group.id,
  }
}

export function mapItemToGroup(item: Item): AlertGroup {
  const severity = readString(item, "severity")
  const status = readString(item, "status")
  if (!isAlertSeverity(severity) || (status !== "active" && status !== "closed")) {
    throw new InternalError(`Malformed group item ${String(item.PK)}`)
  }

  return {
    id: readString(item, "id"),
    deviceId: readString(item, "device_id"),
    ruleId: readString(item, "rule_id"),
    severity,
    groupKey: readString(item, "group_key"),
    firstOccurrence: readDate(item, "first_occurrence"),
    lastOccurrence: readDate(item, "last_occurrence"),
    occurrenceCount: readNumber(item, "occurrence_count"),
    status,
    representativeAlertId: readString(item, "representative_alert_id"),
    metadata: readRecord(item, "metadata"),
    createdAt: readDate(item, "created_at"),
    updatedAt: readDate(item, "updated_at"),
    closedAt: readOptionalDate(item, "closed_at"),
  }
}
