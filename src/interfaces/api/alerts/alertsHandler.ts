/**
 * Alerts API Handler
 *
 * POST   /alerts                   ingest an alert
 * GET    /alerts                   list, newest first
 * GET    /alerts/{id}              alert with history, SLA and group
 * DELETE /alerts/{id}
 * POST   /alerts/{id}/transition   lifecycle change (force needs recovery rights)
 * POST   /alerts/{id}/notes        history note without a state change
 * POST   /alerts/{id}/escalate     advance one tier now
 * GET    /alerts/{id}/escalation   escalation status
 * GET    /alerts/{id}/intents      notification intents
 */

import { z } from "zod"
import { ALERT_SEVERITIES, ALERT_STATES } from "../../../domain/alert/Alert"
import { actorOf } from "../../../shared/auth/session"
import { requirePermission } from "../../../shared/rbac/rbac"
import { getContainer } from "../../container"
import { authorize, jsonResponse, noContent, parseBody, parseQuery, pathParam, route } from "../http"
import {
  presentAlertDetail,
  presentAlertPage,
  presentCreatedAlert,
  presentEntry,
  presentEscalationOutcome,
  presentEscalationStatus,
  presentIntent,
} from "../presenters"

const jsonObject = z.record(z.unknown())
const isoInstant = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value))

const createAlertSchema = z.object({
  device_id: z.string().trim().min(1),
  rule_id: z.string().trim().min(1),
  severity: z.enum(ALERT_SEVERITIES),
  message: z.string().trim().min(1),
  payload: jsonObject.optional(),
})

const listAlertsSchema = z.object({
  severity: z.enum(ALERT_SEVERITIES).optional(),
  state: z.enum(ALERT_STATES).optional(),
  device_id: z.string().min(1).optional(),
  rule_id: z.string().min(1).optional(),
  source: z.string().min(1).optional(),
  from: isoInstant.optional(),
  to: isoInstant.optional(),
  window_minutes: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().optional(),
  cursor: z.string().min(1).optional(),
})

const transitionSchema = z.object({
  target_state: z.enum(ALERT_STATES),
  notes: z.string().nullish(),
  metadata: jsonObject.optional(),
  force: z.boolean().optional(),
})

const noteSchema = z.object({
  notes: z.string(),
  metadata: jsonObject.optional(),
})

const escalateSchema = z.object({
  force: z.boolean().optional(),
})

export const createAlertHandler = route("AlertsAPI", async (event) => {
  authorize(event, "alerts", "create")
  const body = parseBody(event, createAlertSchema)

  const result = await getContainer().alerts.createAlert({
    deviceId: body.device_id,
    ruleId: body.rule_id,
    severity: body.severity,
    message: body.message,
    payload: body.payload,
  })
  return jsonResponse(201, presentCreatedAlert(result))
})

export const listAlertsHandler = route("AlertsAPI", async (event) => {
  authorize(event, "alerts", "read")
  const query = parseQuery(event, listAlertsSchema)

  const page = await getContainer().alerts.listAlerts({
    severity: query.severity,
    state: query.state,
    deviceId: query.device_id,
    ruleId: query.rule_id,
    source: query.source,
    from: query.from,
    to: query.to,
    windowMinutes: query.window_minutes,
    limit: query.limit,
    cursor: query.cursor,
  })
  return jsonResponse(200, presentAlertPage(page))
})

export const getAlertHandler = route("AlertsAPI", async (event) => {
  authorize(event, "alerts", "read")
  const detail = await getContainer().alerts.getAlertDetail(pathParam(event, "id"))
  return jsonResponse(200, presentAlertDetail(detail))
})

export const deleteAlertHandler = route("AlertsAPI", async (event) => {
  authorize(event, "alerts", "delete")
  await getContainer().alerts.deleteAlert(pathParam(event, "id"))
  return noContent()
})

export const transitionAlertHandler = route("AlertsAPI", async (event) => {
  const session = authorize(event, "alerts", "update")
  const body = parseBody(event, transitionSchema)
  if (body.force) {
    requirePermission(session.role, "alert_recovery", "update")
  }

  const entry = await getContainer().alerts.transition(pathParam(event, "id"), body.target_state, actorOf(session), {
    notes: body.notes,
    metadata: body.metadata,
    force: body.force,
  })
  return jsonResponse(200, { entry: presentEntry(entry) })
})

export const addNoteHandler = route("AlertsAPI", async (event) => {
  const session = authorize(event, "alerts", "update")
  const body = parseBody(event, noteSchema)

  const entry = await getContainer().alerts.addNote(pathParam(event, "id"), actorOf(session), body.notes, body.metadata)
  return jsonResponse(201, { entry: presentEntry(entry) })
})

export const escalateAlertHandler = route("AlertsAPI", async (event) => {
  const session = authorize(event, "alerts", "update")
  const body = parseBody(event, escalateSchema)
  if (body.force) {
    requirePermission(session.role, "alert_recovery", "update")
  }

  const outcome = await getContainer().escalation.advance(pathParam(event, "id"), {
    force: body.force,
    actor: actorOf(session),
  })
  return jsonResponse(200, presentEscalationOutcome(outcome))
})

export const getEscalationStatusHandler = route("AlertsAPI", async (event) => {
  authorize(event, "alerts", "read")
  const status = await getContainer().escalation.getStatus(pathParam(event, "id"))
  return jsonResponse(200, presentEscalationStatus(status))
})

export const listIntentsHandler = route("AlertsAPI", async (event) => {
  authorize(event, "alerts", "read")
  const intents = await getContainer().notifications.listIntents(pathParam(event, "id"))
  return jsonResponse(200, { intents: intents.map(presentIntent) })
})
