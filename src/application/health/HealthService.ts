/**
 * Health Service
 *
 * Reports the configuration in effect and whether the store answers.
 */

import type { AlertingConfig } from "../../shared/config"

export interface StoreProbe {
  ping(): Promise<void>
}

export interface HealthReport {
  status: "ok" | "degraded"
  store: { reachable: boolean; error: string | null }
  config: {
    groupingWindowMinutes: number
    escalationTickIntervalSeconds: number
    acknowledgeSuppresses: boolean
    anomalyMinConfidence: number
    anomalyAutoEscalate: boolean
    slaReportWindowDays: number
    notificationWebhookConfigured: boolean
  }
}

export class HealthService {
  constructor(
    private probe: StoreProbe,
    private config: AlertingConfig
  ) {}

  async check(): Promise<HealthReport> {
    let error: string | null = null
    try {
      await this.probe.ping()
    } catch (cause) {
      console.error("[Health] Store probe failed:", cause)
      error = cause instanceof Error ? cause.message : String(cause)
    }

    return {
      status: error === null ? "ok" : "degraded",
      store: { reachable: error === null, error },
      config: {
        groupingWindowMinutes: this.config.grouping.windowMinutes,
        escalationTickIntervalSeconds: this.config.escalation.tickIntervalSeconds,
        acknowledgeSuppresses: this.config.escalation.acknowledgeSuppresses,
        anomalyMinConfidence: this.config.anomalyBridge.minConfidence,
        anomalyAutoEscalate: this.config.anomalyBridge.autoEscalate,
        slaReportWindowDays: this.config.sla.reportWindowDays,
        notificationWebhookConfigured: this.config.notifications.webhookUrl !== null,
      },
    }
  }
}
