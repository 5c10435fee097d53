/**
 * Alert Group Domain Entity
 *
 * Deduplicates bursts of alerts sharing (device, rule, severity). At most one
 * group per composite key is active at a time.
 */

import type { AlertSeverity } from "../alert/Alert"
import type { JsonRecord } from "../../shared/types"

export type AlertGroupStatus = "active" | "closed"

export interface AlertGroup {
  id: string
  deviceId: string
  ruleId: string
  severity: AlertSeverity
  groupKey: string
  firstOccurrence: Date
  lastOccurrence: Date
  occurrenceCount: number
  status: AlertGroupStatus
  representativeAlertId: string
  metadata: JsonRecord
  createdAt: Date
  updatedAt: Date
  closedAt: Date | null
}

export interface AlertGroupFilter {
  status?: AlertGroupStatus
  deviceId?: string
  limit: number
}

export function buildGroupKey(deviceId: string, ruleId: string, severity: AlertSeverity): string {
  return `${deviceId}:${ruleId}:${severity}`
}

export interface AlertGroupRepository {
  findById(id: string): Promise<AlertGroup | null>
  findActiveByKey(groupKey: string): Promise<AlertGroup | null>
  list(filter: AlertGroupFilter): Promise<AlertGroup[]>
  findAll(): Promise<AlertGroup[]>
  /** Closes an active group and releases its key. ConflictError if it changed. */
  close(group: AlertGroup, closedAt: Date, reason: string | null): Promise<AlertGroup>
  updateMetadata(id: string, metadata: JsonRecord, updatedAt: Date): Promise<AlertGroup>
  /** Deletes the group and clears the group link on its member alerts. */
  delete(id: string): Promise<void>
}
