/**
 * Grouping Service
 *
 * Deduplicates alert floods. An alert with composite key K at instant T
 * joins the active group for K when `T - lastOccurrence <= window`
 * (inclusive), otherwise it opens a new group and the stale one, if any, is
 * closed in the same write. Out-of-order alerts still join and only widen
 * the first/last occurrence range.
 */

import type { Alert, GroupLinkage } from "../../domain/alert/Alert"
import {
  buildGroupKey,
  type AlertGroup,
  type AlertGroupFilter,
  type AlertGroupRepository,
} from "../../domain/group/AlertGroup"
import type { JsonRecord } from "../../shared/types"
import type { Clock } from "../../shared/clock"
import type { IdGenerator } from "../../shared/ids"
import { NotFoundError } from "../../shared/errors"
import { MS_PER_MINUTE, earlierOf, laterOf, roundTo } from "../../shared/time"

export interface GroupStatistics {
  groupId: string
  groupKey: string
  deviceId: string
  ruleId: string
  severity: AlertGroup["severity"]
  occurrenceCount: number
  firstOccurrence: Date
  lastOccurrence: Date
  ageMinutes: number
  noiseReductionPct: number
  status: AlertGroup["status"]
}

export interface OverallGroupStatistics {
  totalGroups: number
  activeGroups: number
  closedGroups: number
  totalAlertsGrouped: number
  avgAlertsPerGroup: number
  maxAlertsInGroup: number
  overallNoiseReductionPct: number
}

export interface GroupingOptions {
  windowMinutes: number
}

export function noiseReductionPct(occurrenceCount: number): number {
  return occurrenceCount > 1 ? roundTo(((occurrenceCount - 1) / occurrenceCount) * 100, 2) : 0
}

export class GroupingService {
  constructor(
    private groupRepository: AlertGroupRepository,
    private clock: Clock,
    private newId: IdGenerator,
    private options: GroupingOptions
  ) {}

  /**
   * Decides how `alert` joins a group. Nothing is written here: the linkage
   * is committed with the alert, conditional on the group being unchanged.
   */
  async planLinkage(alert: Pick<Alert, "id" | "deviceId" | "ruleId" | "severity">, at: Date): Promise<GroupLinkage> {
    const groupKey = buildGroupKey(alert.deviceId, alert.ruleId, alert.severity)
    const active = await this.groupRepository.findActiveByKey(groupKey)

    if (active && at.getTime() - active.lastOccurrence.getTime() <= this.options.windowMinutes * MS_PER_MINUTE) {
      return {
        kind: "absorb",
        previousCount: active.occurrenceCount,
        group: {
          ...active,
          occurrenceCount: active.occurrenceCount + 1,
          firstOccurrence: earlierOf(active.firstOccurrence, at),
          lastOccurrence: laterOf(active.lastOccurrence, at),
          updatedAt: at,
        },
      }
    }

    return {
      kind: "open",
      supersedes: active,
      group: {
        id: this.newId(),
        deviceId: alert.deviceId,
        ruleId: alert.ruleId,
        severity: alert.severity,
        groupKey,
        firstOccurrence: at,
        lastOccurrence: at,
        occurrenceCount: 1,
        status: "active",
        representativeAlertId: alert.id,
        metadata: {},
        createdAt: at,
        updatedAt: at,
        closedAt: null,
      },
    }
  }

  async getGroup(id: string): Promise<AlertGroup> {
    const group = await this.groupRepository.findById(id)
    if (!group) {
      throw new NotFoundError("Alert group")
    }
    return group
  }

  async listGroups(filter: AlertGroupFilter): Promise<AlertGroup[]> {
    return this.groupRepository.list(filter)
  }

  async getGroupsForDevice(deviceId: string, activeOnly: boolean = true, limit: number = 50): Promise<AlertGroup[]> {
    return this.groupRepository.list({ deviceId, status: activeOnly ? "active" : undefined, limit })
  }

  async closeGroup(id: string, reason: string | null = null): Promise<AlertGroup> {
    const group = await this.getGroup(id)
    if (group.status === "closed") {
      return group
    }

    const closed = await this.groupRepository.close(group, this.clock.now(), reason)
    console.log(`[Grouping] Closed group ${id} (${group.groupKey}) after ${group.occurrenceCount} alerts`)
    return closed
  }

  /** Shallow merge onto the existing metadata. */
  async updateGroupMetadata(id: string, patch: JsonRecord): Promise<AlertGroup> {
    const group = await this.getGroup(id)
    return this.groupRepository.updateMetadata(id, { ...group.metadata, ...patch }, this.clock.now())
  }

  async deleteGroup(id: string): Promise<void> {
    await this.groupRepository.delete(id)
    console.log(`[Grouping] Deleted group ${id}`)
  }

  async groupStatistics(id: string): Promise<GroupStatistics> {
    const group = await this.getGroup(id)
    const ageMs = this.clock.now().getTime() - group.firstOccurrence.getTime()

    return {
      groupId: group.id,
      groupKey: group.groupKey,
      deviceId: group.deviceId,
      ruleId: group.ruleId,
      severity: group.severity,
      occurrenceCount: group.occurrenceCount,
      firstOccurrence: group.firstOccurrence,
      lastOccurrence: group.lastOccurrence,
      ageMinutes: roundTo(ageMs / MS_PER_MINUTE, 1),
      noiseReductionPct: noiseReductionPct(group.occurrenceCount),
      status: group.status,
    }
  }

  async overallStatistics(): Promise<OverallGroupStatistics> {
    const groups = await this.groupRepository.findAll()
    const counts = groups.map((g) => g.occurrenceCount)
    const total = counts.reduce((sum, c) => sum + c, 0)

    return {
      totalGroups: groups.length,
      activeGroups: groups.filter((g) => g.status === "active").length,
      closedGroups: groups.filter((g) => g.status === "closed").length,
      totalAlertsGrouped: total,
      avgAlertsPerGroup: groups.length > 0 ? roundTo(total / groups.length, 2) : 0,
      maxAlertsInGroup: counts.length > 0 ? Math.max(...counts) : 0,
      overallNoiseReductionPct: total > groups.length ? roundTo(((total - groups.length) / total) * 100, 2) : 0,
    }
  }
}
