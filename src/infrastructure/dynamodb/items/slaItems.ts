/**
 * alert_slas: PK ALERT#<id>, SK SLA
 *   severity-created-index  GSI1PK SEVERITY#<severity>, GSI1SK <created_at>#<id>
 */

import type { AlertSla } from "../../../domain/sla/Sla"
import { isAlertSeverity } from "../../../domain/alert/Alert"
import { InternalError } from "../../../shared/errors"
import {
  type Item,
  readBoolean,
  readDate,
  readNumber,
  readOptionalDate,
  readOptionalNumber,
  readString,
} from "../attributes"
import { alertPk } from "./alertItems"

export const SLA_SK = "SLA"
export const SEVERITY_CREATED_INDEX = "severity-created-index"

export function slaKey(alertId: string): Item {
  return { PK: alertPk(alertId), SK: SLA_SK }
}

export function mapSlaToItem(sla: AlertSla): Item {
  const createdAt = sla.createdAt.toISOString()
  return {
    ...slaKey(sla.alertId),
    GSI1PK: `SEVERITY#${sla.severity}`,
    GSI1SK: `${createdAt}#${sla.alertId}`,
    alert_id: sla.alertId,
    severity: sla.severity,
    tta_target_min: sla.ttaTargetMin,
    ttr_target_min: sla.ttrTargetMin,
    // Actuals stay absent until measured so conditional writes can test them
    ...(sla.ttaActualMin !== null ? { tta_actual_min: sla.ttaActualMin } : {}),
    ...(sla.ttrActualMin !== null ? { ttr_actual_min: sla.ttrActualMin } : {}),
    acknowledged_at: sla.acknowledgedAt?.toISOString() ?? null,
    resolved_at: sla.resolvedAt?.toISOString() ?? null,
    tta_breached: sla.ttaBreached,
    ttr_breached: sla.ttrBreached,
    created_at: createdAt,
  }
}

export function mapItemToSla(item: Item): AlertSla {
  const severity = readString(item, "severity")
  if (!isAlertSeverity(severity)) {
    throw new InternalError(`Malformed SLA item ${String(item.PK)}`)
  }

  return {
    alertId: readString(item, "alert_id"),
    severity,
    ttaTargetMin: readNumber(item, "tta_target_min"),
    ttrTargetMin: readNumber(item, "ttr_target_min"),
    ttaActualMin: readOptionalNumber(item, "tta_actual_min"),
    ttrActualMin: readOptionalNumber(item, "ttr_actual_min"),
    acknowledgedAt: readOptionalDate(item, "acknowledged_at"),
    resolvedAt: readOptionalDate(item, "resolved_at"),
    ttaBreached: readBoolean(item, "tta_breached"),
    ttrBreached: readBoolean(item, "ttr_breached"),
    createdAt: readDate(item, "created_at"),
  }
}
