/**
 * Anomaly-to-Alert Bridge
 *
 * Turns ML anomaly detections into alerts. Detections below the confidence
 * floor, or flagged as not anomalous, create nothing. Severity follows
 * confidence: >= 0.90 critical, >= 0.80 high, otherwise medium.
 */

import type { AlertPage, AlertSeverity } from "../../domain/alert/Alert"
import type { AlertService, CreateAlertResult } from "../alert/AlertService"
import type { EscalationService } from "../escalation/EscalationService"

export const ANOMALY_SOURCE = "ml_anomaly_detection"

export interface AnomalyDetection {
  deviceId: string
  metric: string
  value: number
  score: number
  confidence: number
  modelId: string
  // Defaults to true
  isAnomaly?: boolean
}

export type AnomalyOutcome =
  | { created: true; severity: AlertSeverity; alert: CreateAlertResult; escalated: boolean }
  | { created: false; reason: "not_anomalous" | "below_threshold" }

export interface AnomalyBridgeOptions {
  minConfidence: number
  autoEscalate: boolean
}

export interface MlAlertQuery {
  deviceId?: string
  metric?: string
  severity?: AlertSeverity
  limit?: number
  cursor?: string
}

const AUTO_ESCALATED: readonly AlertSeverity[] = ["critical", "high"]

export function severityForConfidence(confidence: number): AlertSeverity {
  if (confidence >= 0.9) {
    return "critical"
  }
  if (confidence >= 0.8) {
    return "high"
  }
  return "medium"
}

export function anomalyRuleId(metric: string): string {
  return `${ANOMALY_SOURCE}:${metric}`
}

export class AnomalyBridgeService {
  constructor(
    private alertService: AlertService,
    private escalationService: EscalationService,
    private options: AnomalyBridgeOptions
  ) {}

  async processDetection(detection: AnomalyDetection): Promise<AnomalyOutcome> {
    if (detection.isAnomaly === false) {
      return { created: false, reason: "not_anomalous" }
    }
    if (detection.confidence < this.options.minConfidence) {
      console.log(
        `[AnomalyBridge] Ignored ${detection.metric} on ${detection.deviceId}: confidence ` +
          `${detection.confidence} below ${this.options.minConfidence}`
      )
      return { created: false, reason: "below_threshold" }
    }

    const severity = severityForConfidence(detection.confidence)
    const alert = await this.alertService.createAlert({
      deviceId: detection.deviceId,
      ruleId: anomalyRuleId(detection.metric),
      severity,
      message:
        `${ANOMALY_SOURCE}: ${detection.metric}=${detection.value} ` +
        `score=${detection.score} confidence=${detection.confidence}`,
      payload: {
        model_id: detection.modelId,
        score: detection.score,
        confidence: detection.confidence,
        source: ANOMALY_SOURCE,
        metric: detection.metric,
        value: detection.value,
      },
    })

    console.log(
      `[AnomalyBridge] Created ${severity} alert ${alert.alertId} from model ${detection.modelId} ` +
        `(confidence ${detection.confidence})`
    )

    let escalated = false
    if (this.options.autoEscalate && AUTO_ESCALATED.includes(severity)) {
      try {
        const outcome = await this.escalationService.advance(alert.alertId)
        escalated = outcome.kind === "escalated"
      } catch (error) {
        console.error(`[AnomalyBridge] Auto-escalation failed for alert ${alert.alertId}:`, error)
      }
    }

    return { created: true, severity, alert, escalated }
  }

  async listMlAlerts(query: MlAlertQuery = {}): Promise<AlertPage> {
    return this.alertService.listAlerts({
      source: ANOMALY_SOURCE,
      deviceId: query.deviceId,
      ruleId: query.metric ? anomalyRuleId(query.metric) : undefined,
      severity: query.severity,
      limit: query.limit,
      cursor: query.cursor,
    })
  }
}
