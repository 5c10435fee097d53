/**
 * Configuration loading
 */

import { DEFAULT_SLA_TARGETS } from "../../../src/domain/sla/Sla"
import { loadConfig } from "../../../src/shared/config"
import { ValidationError } from "../../../src/shared/errors"

describe("loadConfig", () => {
  it("should fall back to defaults for an empty environment", () => {
    const config = loadConfig({})

    expect(config.grouping.windowMinutes).toBe(5)
    expect(config.escalation).toEqual({
      tickIntervalSeconds: 30,
      acknowledgeSuppresses: true,
      batchSize: 100,
      alertDeadlineMs: 5000,
    })
    expect(config.anomalyBridge).toEqual({ minConfidence: 0.7, autoEscalate: true })
    expect(config.sla).toEqual({ severityTargets: DEFAULT_SLA_TARGETS, reportWindowDays: 30 })
    expect(config.notifications).toEqual({ webhookUrl: null, timeoutMs: 5000 })
    expect(config.store.tables.alerts).toBe("alerts")
  })

  it("should read overrides from the environment", () => {
    const config = loadConfig({
      ALERTING_GROUPING_WINDOW_MINUTES: "10",
      ALERTING_ESCALATION_ACKNOWLEDGE_SUPPRESSES: "0",
      ALERTING_ANOMALY_MIN_CONFIDENCE: "0.85",
      ALERTING_NOTIFICATION_WEBHOOK_URL: "https://hooks.example.com/alerts",
      ALERTING_TABLE_ALERTS: "plant-a-alerts",
    })

    expect(config.grouping.windowMinutes).toBe(10)
    expect(config.escalation.acknowledgeSuppresses).toBe(false)
    expect(config.anomalyBridge.minConfidence).toBe(0.85)
    expect(config.notifications.webhookUrl).toBe("https://hooks.example.com/alerts")
    expect(config.store.tables.alerts).toBe("plant-a-alerts")
  })

  it("should merge per-severity SLA targets over the defaults", () => {
    const config = loadConfig({
      ALERTING_SLA_SEVERITY_TARGETS: JSON.stringify({ low: { ttaMinutes: 90, ttrMinutes: 600 } }),
    })

    expect(config.sla.severityTargets.low).toEqual({ ttaMinutes: 90, ttrMinutes: 600 })
    expect(config.sla.severityTargets.critical).toEqual(DEFAULT_SLA_TARGETS.critical)
  })

  it("should reject SLA targets that are not JSON", () => {
    expect(() => loadConfig({ ALERTING_SLA_SEVERITY_TARGETS: "critical=5" })).toThrow(
      "Invalid configuration ALERTING_SLA_SEVERITY_TARGETS: must be a JSON object"
    )
  })

  it("should reject a confidence outside 0..1", () => {
    expect(() => loadConfig({ ALERTING_ANOMALY_MIN_CONFIDENCE: "1.5" })).toThrow(ValidationError)
  })

  it("should reject a malformed boolean flag", () => {
    expect(() => loadConfig({ ALERTING_ANOMALY_AUTO_ESCALATE: "yes" })).toThrow(
      /^Invalid configuration ALERTING_ANOMALY_AUTO_ESCALATE/
    )
  })
})
