/**
 * Anomaly Detections Lambda Handler
 *
 * EventBridge trigger: a batch of model detections in `detail.detections`.
 * Each detection is bridged on its own; a failed one is logged and counted
 * and does not fail the batch, since redelivery would duplicate the alerts
 * already created from it.
 */

import type { EventBridgeEvent } from "aws-lambda"
import { z } from "zod"
import { getContainer } from "../../container"
import { ValidationError } from "../../../shared/errors"

const detectionSchema = z.object({
  device_id: z.string().trim().min(1),
  metric: z.string().trim().min(1),
  value: z.number(),
  score: z.number(),
  confidence: z.number().min(0).max(1),
  model_id: z.string().min(1),
  is_anomaly: z.boolean().optional(),
})

const detailSchema = z.object({
  detections: z.array(detectionSchema),
})

export interface AnomalyBatchSummary {
  received: number
  created: number
  escalated: number
  ignored: number
  failed: number
  alertIds: string[]
}

export async function handler(
  event: EventBridgeEvent<"Anomaly Detections", unknown>
): Promise<AnomalyBatchSummary> {
  const parsed = detailSchema.safeParse(event.detail)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    console.error("[AnomalyDetections] Rejected malformed event:", JSON.stringify(issues))
    throw new ValidationError("Invalid anomaly detection event", undefined, { issues })
  }

  const { anomalyBridge } = getContainer()
  const summary: AnomalyBatchSummary = {
    received: parsed.data.detections.length,
    created: 0,
    escalated: 0,
    ignored: 0,
    failed: 0,
    alertIds: [],
  }

  for (const detection of parsed.data.detections) {
    try {
      const outcome = await anomalyBridge.processDetection({
        deviceId: detection.device_id,
        metric: detection.metric,
        value: detection.value,
        score: detection.score,
        confidence: detection.confidence,
        modelId: detection.model_id,
        isAnomaly: detection.is_anomaly,
      })
      if (outcome.created) {
        summary.created++
        summary.alertIds.push(outcome.alert.alertId)
        if (outcome.escalated) {
          summary.escalated++
        }
      } else {
        summary.ignored++
      }
    } catch (error) {
      summary.failed++
      console.error(`[AnomalyDetections] Failed to bridge ${detection.metric} on ${detection.device_id}:`, error)
    }
  }

  console.log("[AnomalyDetections] Batch processed:", JSON.stringify(summary))
  return summary
}
