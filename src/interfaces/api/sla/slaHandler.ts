/**
 * SLA API Handler
 *
 * GET /sla/report      compliance over a window; `breakdown=true` adds one report per severity
 * GET /sla/breaches    breached SLA rows, newest first
 * GET /alerts/{id}/sla SLA row of one alert with remaining minutes
 */

import { z } from "zod"
import { ALERT_SEVERITIES } from "../../../domain/alert/Alert"
import { getContainer } from "../../container"
import { authorize, jsonResponse, parseQuery, pathParam, route } from "../http"
import { presentComplianceReport, presentSla, presentSlaStatus } from "../presenters"

const isoInstant = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value))

const reportSchema = z.object({
  severity: z.enum(ALERT_SEVERITIES).optional(),
  from: isoInstant.optional(),
  to: isoInstant.optional(),
  breakdown: z.enum(["true", "false"]).optional(),
})

const breachesSchema = z.object({
  type: z.enum(["tta", "ttr", "all"]).default("all"),
  severity: z.enum(ALERT_SEVERITIES).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
})

export const slaReportHandler = route("SlaAPI", async (event) => {
  authorize(event, "sla", "read")
  const query = parseQuery(event, reportSchema)
  const { sla } = getContainer()

  const report = await sla.complianceReport({ severity: query.severity, from: query.from, to: query.to })
  if (query.breakdown !== "true") {
    return jsonResponse(200, { report: presentComplianceReport(report) })
  }

  const bySeverity = await sla.complianceBreakdown({ from: report.periodStart, to: report.periodEnd })
  return jsonResponse(200, {
    report: presentComplianceReport(report),
    by_severity: bySeverity.map(presentComplianceReport),
  })
})

export const slaBreachesHandler = route("SlaAPI", async (event) => {
  authorize(event, "sla", "read")
  const query = parseQuery(event, breachesSchema)

  const breached = await getContainer().sla.getBreachedAlerts(query.type, query.severity, query.limit)
  return jsonResponse(200, { breaches: breached.map(presentSla) })
})

export const alertSlaHandler = route("SlaAPI", async (event) => {
  authorize(event, "sla", "read")
  const status = await getContainer().sla.getSlaStatus(pathParam(event, "id"))
  return jsonResponse(200, { sla: presentSlaStatus(status) })
})
