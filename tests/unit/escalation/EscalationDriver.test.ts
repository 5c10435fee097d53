/**
 * EscalationDriver Unit Tests
 */

import type { EscalationOutcome } from "../../../src/application/escalation/EscalationService"
import { createHarness, type TestHarness } from "../../support/testContainer"

describe("EscalationDriver", () => {
  let harness: TestHarness

  async function seed(devices: string[]): Promise<string[]> {
    await harness.container.policies.createPolicy({
      name: "page-ops",
      severities: ["high"],
      tiers: [{ level: 1, delayMinutes: 1, channels: ["webhook"], recipients: ["https://hooks.example.com/ops"] }],
    })

    const ids: string[] = []
    for (const deviceId of devices) {
      const result = await harness.container.alerts.createAlert({
        deviceId,
        ruleId: "flow-low",
        severity: "high",
        message: "Coolant flow below minimum",
      })
      ids.push(result.alertId)
      harness.clock.advanceSeconds(10)
    }
    return ids
  }

  afterEach(async () => {
    await harness.container.driver.stop()
  })

  it("should take at most one batch of due alerts, oldest first", async () => {
    harness = createHarness({ ALERTING_ESCALATION_BATCH_SIZE: "2" })
    const ids = await seed(["chiller-1", "chiller-2", "chiller-3"])
    harness.clock.set("2025-01-06T08:05:00.000Z")

    const summary = await harness.container.driver.tick()

    expect(summary).toMatchObject({ scanned: 2, escalated: 2, intents: 2 })
    expect(harness.dispatcher.dispatched.map((i) => i.alertId)).toEqual([ids[0], ids[1]])

    const next = await harness.container.driver.tick()
    expect(next.scanned).toBe(1)
  })

  it("should count a failed alert and carry on", async () => {
    harness = createHarness()
    const ids = await seed(["chiller-1", "chiller-2"])
    harness.clock.set("2025-01-06T08:05:00.000Z")
    const advance = harness.container.escalation.advance.bind(harness.container.escalation)
    jest.spyOn(harness.container.escalation, "advance").mockImplementation(async (alertId, options) => {
      if (alertId === ids[0]) {
        throw new Error("store timeout")
      }
      return advance(alertId, options)
    })

    const summary = await harness.container.driver.tick()

    expect(summary).toMatchObject({ scanned: 2, escalated: 1, failed: 1 })
    expect((await harness.container.alerts.getAlert(ids[0])).escalation.tier).toBe(0)
  })

  it("should give up on an alert that exceeds its deadline", async () => {
    harness = createHarness({ ALERTING_ESCALATION_ALERT_DEADLINE_MS: "20" })
    await seed(["chiller-1"])
    harness.clock.set("2025-01-06T08:05:00.000Z")
    jest
      .spyOn(harness.container.escalation, "advance")
      .mockImplementation(() => new Promise<EscalationOutcome>(() => undefined))

    const summary = await harness.container.driver.tick()

    expect(summary).toMatchObject({ scanned: 1, escalated: 0, timedOut: 1, failed: 0 })
  })

  it("should tally skips by reason", async () => {
    harness = createHarness()
    const [id] = await seed(["chiller-1"])
    harness.clock.set("2025-01-06T08:05:00.000Z")
    await harness.container.alerts.acknowledge(id, "op-1")

    const summary = await harness.container.driver.tick()

    expect(summary.skipped).toEqual({ suppressed: 1 })
    expect(summary.escalated).toBe(0)
  })

  it("should start and stop the interval loop", async () => {
    harness = createHarness()

    harness.container.driver.start()
    expect(harness.container.driver.isRunning()).toBe(true)

    await harness.container.driver.stop()
    expect(harness.container.driver.isRunning()).toBe(false)
  })
})
