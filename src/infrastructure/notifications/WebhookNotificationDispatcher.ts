/**
 * Webhook Notification Dispatcher
 *
 * Hands each intent to the external notification collaborator as a JSON POST.
 * Any 2xx means the collaborator accepted the intent; delivery is reported
 * back later through delivery acknowledgements.
 */

import type { NotificationDispatcher, NotificationIntent } from "../../domain/notification/Notification"
import { pooledFetch } from "../http/httpClient"

export interface WebhookDispatcherOptions {
  url: string
  timeoutMs: number
}

export function toIntentPayload(intent: NotificationIntent): Record<string, unknown> {
  return {
    intent_id: intent.id,
    alert_id: intent.alertId,
    tier: intent.tier,
    policy_id: intent.policyId,
    channel: intent.channel,
    recipient: intent.recipient,
    created_at: intent.createdAt.toISOString(),
  }
}

export class WebhookNotificationDispatcher implements NotificationDispatcher {
  constructor(private options: WebhookDispatcherOptions) {}

  async dispatch(intent: NotificationIntent): Promise<void> {
    const response = await pooledFetch(this.options.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(toIntentPayload(intent)),
      timeoutMs: this.options.timeoutMs,
    })

    if (!response.ok) {
      const text = await response.text()
      throw new Error(`Notification webhook returned ${response.status}: ${text.substring(0, 200)}`)
    }
  }
}
