/**
 * Notification Service
 *
 * Audit side of the dispatch interface: lists the intents raised for an
 * alert and records the collaborator's delivery acknowledgements.
 */

import type {
  DeliveryAcknowledgement,
  NotificationIntent,
  NotificationIntentRepository,
} from "../../domain/notification/Notification"
import type { AlertRepository } from "../../domain/alert/Alert"
import type { Clock } from "../../shared/clock"
import { NotFoundError } from "../../shared/errors"

export class NotificationService {
  constructor(
    private intentRepository: NotificationIntentRepository,
    private alertRepository: AlertRepository,
    private clock: Clock
  ) {}

  async listIntents(alertId: string): Promise<NotificationIntent[]> {
    const alert = await this.alertRepository.findById(alertId)
    if (!alert) {
      throw new NotFoundError("Alert")
    }
    return this.intentRepository.findByAlertId(alertId)
  }

  async recordDeliveryAck(ack: DeliveryAcknowledgement): Promise<NotificationIntent> {
    const intent = await this.intentRepository.findById(ack.intentId)
    if (!intent) {
      throw new NotFoundError("Notification intent")
    }

    const updated = await this.intentRepository.update({
      ...intent,
      status: ack.status,
      acknowledgedAt: this.clock.now(),
      detail: ack.detail ?? intent.detail,
    })

    const log = ack.status === "delivered" ? console.log : console.warn
    log(`[Notifications] Intent ${intent.id} for alert ${intent.alertId}: ${ack.status}`)
    return updated
  }
}
