/**
 * on_call_schedules: PK SCHEDULE#<id>, SK METADATA
 * Name guard:        PK SCHEDULENAME#<name>, SK NAME, schedule_id
 */

import type { OnCallOverride, OnCallSchedule } from "../../../domain/oncall/OnCallSchedule"
import { InternalError } from "../../../shared/errors"
import {
  type Item,
  readBoolean,
  readDate,
  readItemArray,
  readNumber,
  readOptionalString,
  readString,
  readStringArray,
} from "../attributes"
import { NAME_GUARD_SK } from "./policyItems"

export const SCHEDULE_SK = "METADATA"

export function scheduleKey(scheduleId: string): Item {
  return { PK: `SCHEDULE#${scheduleId}`, SK: SCHEDULE_SK }
}

export function scheduleNameKey(name: string): Item {
  return { PK: `SCHEDULENAME#${name}`, SK: NAME_GUARD_SK }
}

export function mapScheduleToItem(schedule: OnCallSchedule): Item {
  return {
    ...scheduleKey(schedule.id),
    id: schedule.id,
    name: schedule.name,
    description: schedule.description,
    timezone: schedule.timezone,
    enabled: schedule.enabled,
    rotation_type: schedule.rotationType,
    rotation_start: schedule.rotationStart.toISOString(),
    users: schedule.users,
    overrides: schedule.overrides.map((o) => ({
      user_id: o.userId,
      start: o.start.toISOString(),
      end: o.end.toISOString(),
      reason: o.reason,
    })),
    version: schedule.version,
    created_at: schedule.createdAt.toISOString(),
    updated_at: schedule.updatedAt.toISOString(),
  }
}

export function mapScheduleNameGuardToItem(schedule: OnCallSchedule): Item {
  return { ...scheduleNameKey(schedule.name), schedule_id: schedule.id }
}

function mapItemToOverride(item: Item): OnCallOverride {
  return {
    userId: readString(item, "user_id"),
    start: readDate(item, "start"),
    end: readDate(item, "end"),
    reason: readString(item, "reason"),
  }
}

export function mapItemToSchedule(item: Item): OnCallSchedule {
  const rotationType = readString(item, "rotation_type")
  if (rotationType !== "weekly" && rotationType !== "daily") {
    throw new InternalError(`Malformed on-call schedule ${String(item.PK)}`)
  }

  return {
    id: readString(item, "id"),
    name: readString(item, "name"),
    description: readOptionalString(item, "description"),
    timezone: readString(item, "timezone"),
    enabled: readBoolean(item, "enabled"),
    rotationType,
    rotationStart: readDate(item, "rotation_start"),
    users: readStringArray(item, "users"),
    overrides: readItemArray(item, "overrides").map((o) => mapItemToOverride(o)),
    version: readNumber(item, "version"),
    createdAt: readDate(item, "created_at"),
    updatedAt: readDate(item, "updated_at"),
  }
}
