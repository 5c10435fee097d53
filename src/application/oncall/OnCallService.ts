/**
 * On-Call Service
 *
 * Schedule management and on-call resolution. Resolution itself is the pure
 * rotation arithmetic in domain/oncall/rotation.
 */

import type {
  OnCallAssignment,
  OnCallOverride,
  OnCallSchedule,
  OnCallScheduleRepository,
  RotationType,
} from "../../domain/oncall/OnCallSchedule"
import { resolveOnCall } from "../../domain/oncall/rotation"
import { isValidTimeZone } from "../../domain/oncall/timezone"
import type { Clock } from "../../shared/clock"
import type { IdGenerator } from "../../shared/ids"
import { InvalidScheduleError, NotFoundError, ValidationError } from "../../shared/errors"
import { retryOnConflict } from "../../shared/retry"

export interface CreateScheduleInput {
  name: string
  description?: string | null
  timezone: string
  enabled?: boolean
  rotationType: RotationType
  rotationStart: Date
  users: string[]
  overrides?: OnCallOverride[]
}

export type UpdateScheduleInput = Partial<CreateScheduleInput>

function validateOverride(override: OnCallOverride): void {
  if (!override.userId) {
    throw new ValidationError("override user_id is required", "user_id")
  }
  if (override.end.getTime() < override.start.getTime()) {
    throw new ValidationError("override end must not precede start", "end")
  }
}

function validateSchedule(schedule: OnCallSchedule): void {
  if (!schedule.name.trim()) {
    throw new ValidationError("name is required", "name")
  }
  if (!isValidTimeZone(schedule.timezone)) {
    throw new ValidationError(`Unknown timezone: ${schedule.timezone}`, "timezone")
  }
  if (schedule.users.length === 0) {
    throw new InvalidScheduleError("User list cannot be empty", { field: "users" })
  }
  if (schedule.users.some((user) => !user)) {
    throw new ValidationError("users must be non-empty user ids", "users")
  }
  schedule.overrides.forEach(validateOverride)
}

export class OnCallService {
  constructor(
    private scheduleRepository: OnCallScheduleRepository,
    private clock: Clock,
    private newId: IdGenerator
  ) {}

  async getOnCallAt(scheduleId: string, at: Date): Promise<OnCallAssignment> {
    const schedule = await this.getSchedule(scheduleId)
    return resolveOnCall(schedule, at)
  }

  /** Resolves against an already loaded schedule; `at` defaults to now. */
  assignmentFor(schedule: OnCallSchedule, at: Date = this.clock.now()): OnCallAssignment {
    return resolveOnCall(schedule, at)
  }

  async getCurrentOnCall(scheduleId: string): Promise<OnCallAssignment> {
    return this.getOnCallAt(scheduleId, this.clock.now())
  }

  async getOnCallByScheduleName(name: string, at: Date): Promise<OnCallAssignment> {
    const schedule = await this.getScheduleByName(name)
    return resolveOnCall(schedule, at)
  }

  async getSchedule(id: string): Promise<OnCallSchedule> {
    const schedule = await this.scheduleRepository.findById(id)
    if (!schedule) {
      throw new NotFoundError("On-call schedule")
    }
    return schedule
  }

  async getScheduleByName(name: string): Promise<OnCallSchedule> {
    const schedule = await this.scheduleRepository.findByName(name)
    if (!schedule) {
      throw new NotFoundError("On-call schedule")
    }
    return schedule
  }

  async listSchedules(enabledOnly: boolean = false): Promise<OnCallSchedule[]> {
    const schedules = await this.scheduleRepository.findAll()
    return enabledOnly ? schedules.filter((s) => s.enabled) : schedules
  }

  async createSchedule(input: CreateScheduleInput): Promise<OnCallSchedule> {
    const now = this.clock.now()
    const schedule: OnCallSchedule = {
      id: this.newId(),
      name: input.name.trim(),
      description: input.description ?? null,
      timezone: input.timezone,
      enabled: input.enabled ?? true,
      rotationType: input.rotationType,
      rotationStart: input.rotationStart,
      users: input.users,
      overrides: input.overrides ?? [],
      version: 1,
      createdAt: now,
      updatedAt: now,
    }
    validateSchedule(schedule)

    const created = await this.scheduleRepository.create(schedule)
    console.log(`[OnCall] Created schedule ${created.name} (${created.id}) with ${created.users.length} users`)
    return created
  }

  async updateSchedule(id: string, input: UpdateScheduleInput): Promise<OnCallSchedule> {
    return retryOnConflict("schedules.update", async () => {
      const existing = await this.getSchedule(id)
      const updated: OnCallSchedule = {
        ...existing,
        ...(input.name !== undefined && { name: input.name.trim() }),
        ...(input.description !== undefined && { description: input.description }),
        ...(input.timezone !== undefined && { timezone: input.timezone }),
        ...(input.enabled !== undefined && { enabled: input.enabled }),
        ...(input.rotationType !== undefined && { rotationType: input.rotationType }),
        ...(input.rotationStart !== undefined && { rotationStart: input.rotationStart }),
        ...(input.users !== undefined && { users: input.users }),
        ...(input.overrides !== undefined && { overrides: input.overrides }),
        version: existing.version + 1,
        updatedAt: this.clock.now(),
      }
      validateSchedule(updated)

      return this.scheduleRepository.update(existing, updated)
    })
  }

  /** Appended after existing overrides, so earlier overrides keep precedence. */
  async addOverride(id: string, override: OnCallOverride): Promise<OnCallSchedule> {
    validateOverride(override)
    const saved = await retryOnConflict("schedules.addOverride", async () => {
      const existing = await this.getSchedule(id)
      const updated: OnCallSchedule = {
        ...existing,
        overrides: [...existing.overrides, override],
        version: existing.version + 1,
        updatedAt: this.clock.now(),
      }
      return this.scheduleRepository.update(existing, updated)
    })

    console.log(
      `[OnCall] Override on ${saved.name}: ${override.userId} from ${override.start.toISOString()} ` +
        `to ${override.end.toISOString()}`
    )
    return saved
  }

  async deleteSchedule(id: string): Promise<void> {
    const existing = await this.getSchedule(id)
    await this.scheduleRepository.delete(existing)
    console.log(`[OnCall] Deleted schedule ${existing.name} (${id})`)
  }
}
