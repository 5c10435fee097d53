/**
 * On-Call API Handler
 *
 * GET   /on-call/current                  ?schedule_id= | ?schedule_name=
 * GET   /on-call/at                       same, plus ?at= (wall time in the schedule's zone unless offset given)
 * GET   /on-call/schedules
 * POST  /on-call/schedules
 * PATCH /on-call/schedules/{id}
 * POST  /on-call/schedules/{id}/overrides
 */

import { z } from "zod"
import type { APIGatewayProxyEvent } from "aws-lambda"
import type { OnCallSchedule } from "../../../domain/oncall/OnCallSchedule"
import type { UpdateScheduleInput } from "../../../application/oncall/OnCallService"
import { getContainer } from "../../container"
import { authorize, jsonResponse, parseBody, parseQuery, pathParam, route, zonedInstant } from "../http"
import { presentAssignment, presentSchedule } from "../presenters"

const scheduleRefSchema = z
  .object({
    schedule_id: z.string().min(1).optional(),
    schedule_name: z.string().min(1).optional(),
    at: z.string().min(1).optional(),
  })
  .refine((query) => query.schedule_id || query.schedule_name, {
    message: "schedule_id or schedule_name is required",
    path: ["schedule_id"],
  })

const overrideSchema = z.object({
  user_id: z.string().trim().min(1),
  start: z.string().min(1),
  end: z.string().min(1),
  reason: z.string().default(""),
})

const createScheduleSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().nullish(),
  timezone: z.string().min(1).default("UTC"),
  enabled: z.boolean().optional(),
  rotation_type: z.enum(["weekly", "daily"]),
  rotation_start: z.string().min(1),
  users: z.array(z.string().trim().min(1)),
  overrides: z.array(overrideSchema).optional(),
})

const updateScheduleSchema = createScheduleSchema.partial().extend({
  timezone: z.string().min(1).optional(),
})

const listSchedulesSchema = z.object({
  enabled_only: z.enum(["true", "false"]).optional(),
})

type OverrideBody = z.infer<typeof overrideSchema>

function toOverride(body: OverrideBody, timezone: string) {
  return {
    userId: body.user_id,
    start: zonedInstant(body.start, timezone, "start"),
    end: zonedInstant(body.end, timezone, "end"),
    reason: body.reason,
  }
}

async function scheduleFromQuery(event: APIGatewayProxyEvent): Promise<{ schedule: OnCallSchedule; at?: string }> {
  const query = parseQuery(event, scheduleRefSchema)
  const { onCall } = getContainer()
  const schedule = query.schedule_id
    ? await onCall.getSchedule(query.schedule_id)
    : await onCall.getScheduleByName(query.schedule_name ?? "")
  return { schedule, at: query.at }
}

export const currentOnCallHandler = route("OnCallAPI", async (event) => {
  authorize(event, "on_call", "read")
  const { schedule } = await scheduleFromQuery(event)

  const assignment = getContainer().onCall.assignmentFor(schedule)
  return jsonResponse(200, { on_call: presentAssignment(assignment), schedule_name: schedule.name })
})

export const onCallAtHandler = route("OnCallAPI", async (event) => {
  authorize(event, "on_call", "read")
  const { schedule, at } = await scheduleFromQuery(event)

  const instant = at ? zonedInstant(at, schedule.timezone, "at") : undefined
  const assignment = getContainer().onCall.assignmentFor(schedule, instant)
  return jsonResponse(200, { on_call: presentAssignment(assignment), schedule_name: schedule.name })
})

export const listSchedulesHandler = route("OnCallAPI", async (event) => {
  authorize(event, "on_call", "read")
  const query = parseQuery(event, listSchedulesSchema)

  const schedules = await getContainer().onCall.listSchedules(query.enabled_only === "true")
  return jsonResponse(200, { schedules: schedules.map(presentSchedule) })
})

export const createScheduleHandler = route("OnCallAPI", async (event) => {
  authorize(event, "on_call", "create")
  const body = parseBody(event, createScheduleSchema)

  const schedule = await getContainer().onCall.createSchedule({
    name: body.name,
    description: body.description,
    timezone: body.timezone,
    enabled: body.enabled,
    rotationType: body.rotation_type,
    rotationStart: zonedInstant(body.rotation_start, body.timezone, "rotation_start"),
    users: body.users,
    overrides: body.overrides?.map((o) => toOverride(o, body.timezone)),
  })
  return jsonResponse(201, { schedule: presentSchedule(schedule) })
})

export const updateScheduleHandler = route("OnCallAPI", async (event) => {
  authorize(event, "on_call", "update")
  const id = pathParam(event, "id")
  const body = parseBody(event, updateScheduleSchema)
  const { onCall } = getContainer()

  // Local instants in the body read in the zone the schedule ends up with
  const timezone = body.timezone ?? (await onCall.getSchedule(id)).timezone
  const input: UpdateScheduleInput = {
    name: body.name,
    description: body.description,
    timezone: body.timezone,
    enabled: body.enabled,
    rotationType: body.rotation_type,
    rotationStart: body.rotation_start ? zonedInstant(body.rotation_start, timezone, "rotation_start") : undefined,
    users: body.users,
    overrides: body.overrides?.map((o) => toOverride(o, timezone)),
  }

  const schedule = await onCall.updateSchedule(id, input)
  return jsonResponse(200, { schedule: presentSchedule(schedule) })
})

export const addOverrideHandler = route("OnCallAPI", async (event) => {
  authorize(event, "on_call", "update")
  const id = pathParam(event, "id")
  const body = parseBody(event, overrideSchema)
  const { onCall } = getContainer()

  const existing = await onCall.getSchedule(id)
  const schedule = await onCall.addOverride(id, toOverride(body, existing.timezone))
  return jsonResponse(201, { schedule: presentSchedule(schedule) })
})
