/**
 * Alert Groups API Handler
 *
 * GET   /groups
 * GET   /groups/stats
 * GET   /groups/{id}
 * GET   /groups/{id}/stats
 * POST  /groups/{id}/close
 * PATCH /groups/{id}/metadata
 */

import { z } from "zod"
import { getContainer } from "../../container"
import { authorize, jsonResponse, parseBody, parseQuery, pathParam, route } from "../http"
import { presentGroup, presentGroupStatistics, presentOverallStatistics } from "../presenters"

const DEFAULT_GROUP_LIMIT = 50
const MAX_GROUP_LIMIT = 200

const listGroupsSchema = z.object({
  status: z.enum(["active", "closed"]).optional(),
  device_id: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_GROUP_LIMIT).default(DEFAULT_GROUP_LIMIT),
})

const closeGroupSchema = z.object({
  reason: z.string().trim().min(1).nullish(),
})

const metadataSchema = z.record(z.unknown())

export const listGroupsHandler = route("GroupsAPI", async (event) => {
  authorize(event, "alert_groups", "read")
  const query = parseQuery(event, listGroupsSchema)

  const groups = await getContainer().grouping.listGroups({
    status: query.status,
    deviceId: query.device_id,
    limit: query.limit,
  })
  return jsonResponse(200, { groups: groups.map(presentGroup) })
})

export const overallGroupStatsHandler = route("GroupsAPI", async (event) => {
  authorize(event, "alert_groups", "read")
  const stats = await getContainer().grouping.overallStatistics()
  return jsonResponse(200, presentOverallStatistics(stats))
})

export const getGroupHandler = route("GroupsAPI", async (event) => {
  authorize(event, "alert_groups", "read")
  const group = await getContainer().grouping.getGroup(pathParam(event, "id"))
  return jsonResponse(200, { group: presentGroup(group) })
})

export const groupStatsHandler = route("GroupsAPI", async (event) => {
  authorize(event, "alert_groups", "read")
  const stats = await getContainer().grouping.groupStatistics(pathParam(event, "id"))
  return jsonResponse(200, presentGroupStatistics(stats))
})

export const closeGroupHandler = route("GroupsAPI", async (event) => {
  authorize(event, "alert_groups", "update")
  const body = parseBody(event, closeGroupSchema)

  const group = await getContainer().grouping.closeGroup(pathParam(event, "id"), body.reason ?? null)
  return jsonResponse(200, { group: presentGroup(group) })
})

export const updateGroupMetadataHandler = route("GroupsAPI", async (event) => {
  authorize(event, "alert_groups", "update")
  const patch = parseBody(event, metadataSchema)

  const group = await getContainer().grouping.updateGroupMetadata(pathParam(event, "id"), patch)
  return jsonResponse(200, { group: presentGroup(group) })
})
