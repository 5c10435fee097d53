/**
 * notification_intents: PK INTENT#<id>, SK METADATA
 *   alert-intent-index  GSI1PK ALERT#<alert>, GSI1SK <created_at>#<tier>#<id>
 */

import type { IntentStatus, NotificationChannel, NotificationIntent } from "../../../domain/notification/Notification"
import { NOTIFICATION_CHANNELS } from "../../../domain/notification/Notification"
import { InternalError } from "../../../shared/errors"
import {
  type Item,
  readDate,
  readNumber,
  readOptionalDate,
  readOptionalRecord,
  readString,
} from "../attributes"
import { alertPk } from "./alertItems"

export const INTENT_SK = "METADATA"
export const ALERT_INTENT_INDEX = "alert-intent-index"

const INTENT_STATUSES: readonly IntentStatus[] = [
  "pending",
  "dispatched",
  "dispatch_failed",
  "delivered",
  "failed",
  "undeliverable",
]

function isChannel(value: string): value is NotificationChannel {
  return NOTIFICATION_CHANNELS.some((channel) => channel === value)
}

function isIntentStatus(value: string): value is IntentStatus {
  return INTENT_STATUSES.some((status) => status === value)
}

export function intentKey(intentId: string): Item {
  return { PK: `INTENT#${intentId}`, SK: INTENT_SK }
}

export function mapIntentToItem(intent: NotificationIntent): Item {
  const createdAt = intent.createdAt.toISOString()
  return {
    ...intentKey(intent.id),
    GSI1PK: alertPk(intent.alertId),
    GSI1SK: `${createdAt}#${intent.tier}#${intent.id}`,
    id: intent.id,
    alert_id: intent.alertId,
    tier: intent.tier,
    policy_id: intent.policyId,
    channel: intent.channel,
    recipient: intent.recipient,
    status: intent.status,
    created_at: createdAt,
    dispatched_at: intent.dispatchedAt?.toISOString() ?? null,
    acknowledged_at: intent.acknowledgedAt?.toISOString() ?? null,
    detail: intent.detail,
  }
}

export function mapItemToIntent(item: Item): NotificationIntent {
  const channel = readString(item, "channel")
  const status = readString(item, "status")
  if (!isChannel(channel) || !isIntentStatus(status)) {
    throw new InternalError(`Malformed notification intent ${String(item.PK)}`)
  }

  return {
    id: readString(item, "id"),
    alertId: readString(item, "alert_id"),
    tier: readNumber(item, "tier"),
    policyId: readString(item, "policy_id"),
    channel,
    recipient: readString(item, "recipient"),
    status,
    createdAt: readDate(item, "created_at"),
    dispatchedAt: readOptionalDate(item, "dispatched_at"),
    acknowledgedAt: readOptionalDate(item, "acknowledged_at"),
    detail: readOptionalRecord(item, "detail"),
  }
}
