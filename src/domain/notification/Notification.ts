/**
 * Notification Intent
 *
 * A request to notify one recipient over one channel for an escalation tier.
 * Intents are persisted together with the tier advance and handed to the
 * external dispatch collaborator after commit.
 */

import type { JsonRecord } from "../../shared/types"

export const NOTIFICATION_CHANNELS = ["email", "sms", "voice", "webhook"] as const
export type NotificationChannel = (typeof NOTIFICATION_CHANNELS)[number]

export type IntentStatus = "pending" | "dispatched" | "dispatch_failed" | "delivered" | "failed" | "undeliverable"

export type DeliveryStatus = "delivered" | "failed" | "undeliverable"

export interface NotificationIntent {
  id: string
  alertId: string
  tier: number
  policyId: string
  channel: NotificationChannel
  recipient: string
  status: IntentStatus
  createdAt: Date
  dispatchedAt: Date | null
  acknowledgedAt: Date | null
  detail: JsonRecord | null
}

export interface DeliveryAcknowledgement {
  intentId: string
  status: DeliveryStatus
  detail?: JsonRecord
}

export interface NotificationIntentRepository {
  findById(id: string): Promise<NotificationIntent | null>
  findByAlertId(alertId: string): Promise<NotificationIntent[]>
  update(intent: NotificationIntent): Promise<NotificationIntent>
}

/**
 * Outbound port to the external notification collaborator. Delivery is the
 * collaborator's concern; a resolved promise only means it accepted the intent.
 */
export interface NotificationDispatcher {
  dispatch(intent: NotificationIntent): Promise<void>
}
