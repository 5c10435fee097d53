/**
 * Dispatcher used when no notification webhook is configured: intents are
 * persisted as usual and only written to the log.
 */

import type { NotificationDispatcher, NotificationIntent } from "../../domain/notification/Notification"
import { toIntentPayload } from "./WebhookNotificationDispatcher"

export class LoggingNotificationDispatcher implements NotificationDispatcher {
  async dispatch(intent: NotificationIntent): Promise<void> {
    console.log("[Notifications] Intent (no webhook configured):", JSON.stringify(toIntentPayload(intent)))
  }
}
