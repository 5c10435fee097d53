/**
 * NotificationService Unit Tests
 */

import { NotFoundError } from "../../../src/shared/errors"
import { createHarness, type TestHarness } from "../../support/testContainer"

describe("NotificationService", () => {
  let harness: TestHarness
  let alertId: string

  beforeEach(async () => {
    harness = createHarness()
    await harness.container.policies.createPolicy({
      name: "boilers",
      severities: ["high"],
      tiers: [{ level: 1, delayMinutes: 0, channels: ["email", "webhook"], recipients: ["shift-lead"] }],
    })
    const created = await harness.container.alerts.createAlert({
      deviceId: "boiler-2",
      ruleId: "steam-pressure",
      severity: "high",
      message: "Steam pressure above setpoint",
    })
    alertId = created.alertId
    await harness.container.escalation.advance(alertId)
  })

  it("should list the intents raised for an alert", async () => {
    const intents = await harness.container.notifications.listIntents(alertId)

    expect(intents.map((i) => [i.channel, i.recipient, i.status])).toEqual([
      ["email", "shift-lead", "dispatched"],
      ["webhook", "shift-lead", "dispatched"],
    ])
  })

  it("should throw NotFoundError when listing for an unknown alert", async () => {
    await expect(harness.container.notifications.listIntents("missing")).rejects.toThrow(NotFoundError)
  })

  it("should record a delivery acknowledgement", async () => {
    const [intent] = await harness.container.notifications.listIntents(alertId)
    harness.clock.advanceMinutes(2)

    const updated = await harness.container.notifications.recordDeliveryAck({
      intentId: intent.id,
      status: "delivered",
      detail: { provider_id: "msg-881" },
    })

    expect(updated).toMatchObject({
      status: "delivered",
      acknowledgedAt: new Date("2025-01-06T08:02:00.000Z"),
      detail: { provider_id: "msg-881" },
    })
  })

  it("should keep earlier detail when the acknowledgement has none", async () => {
    harness.dispatcher.failFor.add("email")
    await harness.container.policies.createPolicy({
      name: "boilers-low",
      severities: ["low"],
      tiers: [{ level: 1, delayMinutes: 0, channels: ["email"], recipients: ["shift-lead"] }],
    })
    const created = await harness.container.alerts.createAlert({
      deviceId: "boiler-2",
      ruleId: "steam-pressure",
      severity: "low",
      message: "Steam pressure drifting",
    })
    await harness.container.escalation.advance(created.alertId)
    const [intent] = await harness.container.notifications.listIntents(created.alertId)

    const updated = await harness.container.notifications.recordDeliveryAck({
      intentId: intent.id,
      status: "undeliverable",
    })

    expect(updated.status).toBe("undeliverable")
    expect(updated.detail).toEqual({ error: "email gateway rejected the intent" })
  })

  it("should throw NotFoundError for an unknown intent", async () => {
    await expect(
      harness.container.notifications.recordDeliveryAck({ intentId: "missing", status: "failed" })
    ).rejects.toThrow("Notification intent not found")
  })
})
