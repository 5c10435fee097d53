/**
 * Notification Acknowledgements Lambda Handler
 *
 * EventBridge trigger: delivery outcomes reported by the notification
 * collaborator in `detail.acks`. Recording an outcome twice is harmless, so
 * the invocation fails (and is redelivered) when any ack could not be stored.
 * Acks for unknown intents are dropped.
 */

import type { EventBridgeEvent } from "aws-lambda"
import { z } from "zod"
import { getContainer } from "../../container"
import { NotFoundError, ValidationError } from "../../../shared/errors"

const ackSchema = z.object({
  intent_id: z.string().min(1),
  status: z.enum(["delivered", "failed", "undeliverable"]),
  detail: z.record(z.unknown()).optional(),
})

const detailSchema = z.object({
  acks: z.array(ackSchema),
})

export interface AckBatchSummary {
  received: number
  recorded: number
  unknown: number
  failed: number
}

export async function handler(
  event: EventBridgeEvent<"Notification Acks", unknown>
): Promise<AckBatchSummary> {
  const parsed = detailSchema.safeParse(event.detail)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    console.error("[NotificationAcks] Rejected malformed event:", JSON.stringify(issues))
    throw new ValidationError("Invalid notification acknowledgement event", undefined, { issues })
  }

  const { notifications } = getContainer()
  const summary: AckBatchSummary = { received: parsed.data.acks.length, recorded: 0, unknown: 0, failed: 0 }

  for (const ack of parsed.data.acks) {
    try {
      await notifications.recordDeliveryAck({ intentId: ack.intent_id, status: ack.status, detail: ack.detail })
      summary.recorded++
    } catch (error) {
      if (error instanceof NotFoundError) {
        summary.unknown++
        console.warn(`[NotificationAcks] Dropped ack for unknown intent ${ack.intent_id}`)
      } else {
        summary.failed++
        console.error(`[NotificationAcks] Failed to record ack for intent ${ack.intent_id}:`, error)
      }
    }
  }

  console.log("[NotificationAcks] Batch processed:", JSON.stringify(summary))
  if (summary.failed > 0) {
    throw new Error(`${summary.failed} notification acks could not be recorded. Check logs for details.`)
  }
  return summary
}
