import type { OnCallAssignment, OnCallSchedule, RotationType } from "./OnCallSchedule"
import { fromWallTime, toWallTime } from "./timezone"
import { InvalidScheduleError } from "../../shared/errors"
import { MS_PER_DAY, MS_PER_SECOND } from "../../shared/time"

const ROTATION_PERIOD_MS: Record<RotationType, number> = {
  daily: MS_PER_DAY,
  weekly: 7 * MS_PER_DAY,
}

/**
 * Who is on call for `schedule` at `at`.
 *
 * Overrides are checked first, in stored order, with inclusive bounds; the
 * first match wins. Otherwise the rotation index is the number of whole
 * periods elapsed since `rotationStart`, counted on the schedule's wall
 * clock, modulo the number of users.
 */
export function resolveOnCall(schedule: OnCallSchedule, at: Date): OnCallAssignment {
  if (!schedule.enabled) {
    throw new InvalidScheduleError(`Schedule ${schedule.id} is disabled`, { scheduleId: schedule.id })
  }

  const instant = at.getTime()
  const override = schedule.overrides.find(
    (o) => o.start.getTime() <= instant && instant <= o.end.getTime()
  )
  if (override) {
    return {
      scheduleId: schedule.id,
      userId: override.userId,
      userOrder: null,
      shiftStart: override.start,
      shiftEnd: override.end,
      isOverride: true,
      overrideReason: override.reason,
    }
  }

  const users = schedule.users
  if (users.length === 0) {
    throw new InvalidScheduleError(`Schedule ${schedule.id} has no users in rotation`, {
      scheduleId: schedule.id,
    })
  }

  const periodMs = ROTATION_PERIOD_MS[schedule.rotationType]
  const startWall = toWallTime(schedule.rotationStart, schedule.timezone)
  const atWall = toWallTime(at, schedule.timezone)

  const periods = Math.floor((atWall - startWall) / periodMs)
  const index = ((periods % users.length) + users.length) % users.length

  const shiftStart = fromWallTime(startWall + periods * periodMs, schedule.timezone)
  const nextShiftStart = fromWallTime(startWall + (periods + 1) * periodMs, schedule.timezone)

  return {
    scheduleId: schedule.id,
    userId: users[index],
    userOrder: index + 1,
    shiftStart,
    shiftEnd: new Date(nextShiftStart.getTime() - MS_PER_SECOND),
    isOverride: false,
    overrideReason: null,
  }
}
