/**
 * On-Call Schedule Domain Entity
 *
 * A rotation of users over fixed daily or weekly shifts anchored at
 * `rotationStart`, with time-bounded overrides consulted first.
 */

export type RotationType = "weekly" | "daily"

export interface OnCallOverride {
  userId: string
  start: Date
  end: Date
  reason: string
}

export interface OnCallSchedule {
  id: string
  name: string
  description: string | null
  // IANA zone, e.g. "America/Bogota"
  timezone: string
  enabled: boolean
  rotationType: RotationType
  rotationStart: Date
  users: string[]
  overrides: OnCallOverride[]
  // Bumped on every update; updates are conditional on the version read
  version: number
  createdAt: Date
  updatedAt: Date
}

export interface OnCallAssignment {
  scheduleId: string
  userId: string
  // 1-based position in the rotation, null for overrides
  userOrder: number | null
  shiftStart: Date
  shiftEnd: Date
  isOverride: boolean
  overrideReason: string | null
}

export interface OnCallScheduleRepository {
  findById(id: string): Promise<OnCallSchedule | null>
  findByName(name: string): Promise<OnCallSchedule | null>
  findAll(): Promise<OnCallSchedule[]>
  /** ConflictError when the name is taken. */
  create(schedule: OnCallSchedule): Promise<OnCallSchedule>
  /** ConflictError when a rename collides or `previous.version` is stale. */
  update(previous: OnCallSchedule, updated: OnCallSchedule): Promise<OnCallSchedule>
  delete(schedule: OnCallSchedule): Promise<void>
}
