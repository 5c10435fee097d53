/**
 * EscalationService Unit Tests
 */

import { NotFoundError, ValidationError } from "../../../src/shared/errors"
import { createHarness, type TestHarness } from "../../support/testContainer"

describe("EscalationService", () => {
  let harness: TestHarness
  let policyId: string
  let alertId: string

  async function createPolicy(acknowledgeSuppresses: boolean | null = null): Promise<string> {
    const policy = await harness.container.policies.createPolicy({
      name: "critical-path",
      severities: ["critical"],
      acknowledgeSuppresses,
      tiers: [
        { level: 1, delayMinutes: 0, channels: ["email"], recipients: ["ops@example.com"] },
        { level: 2, delayMinutes: 15, channels: ["sms", "voice"], recipients: ["oncall:primary"] },
        { level: 3, delayMinutes: 30, channels: ["voice"], recipients: ["manager-1"] },
      ],
    })
    return policy.id
  }

  async function createSchedule(): Promise<void> {
    await harness.container.onCall.createSchedule({
      name: "primary",
      timezone: "UTC",
      rotationType: "weekly",
      rotationStart: new Date("2025-01-06T00:00:00.000Z"),
      users: ["alice", "bob"],
    })
  }

  async function createAlert(): Promise<string> {
    const result = await harness.container.alerts.createAlert({
      deviceId: "compressor-3",
      ruleId: "oil-pressure-low",
      severity: "critical",
      message: "Oil pressure below 1.2 bar",
    })
    return result.alertId
  }

  beforeEach(async () => {
    harness = createHarness()
    policyId = await createPolicy()
    await createSchedule()
    alertId = await createAlert()
  })

  describe("driver ticks", () => {
    it("should walk every tier as it falls due", async () => {
      const first = await harness.container.driver.tick()
      expect(first).toMatchObject({ scanned: 1, escalated: 1, intents: 1, failed: 0, timedOut: 0, skipped: {} })
      expect((await harness.container.alerts.getAlert(alertId)).escalation).toEqual({
        tier: 1,
        policyId,
        nextEscalationAt: new Date("2025-01-06T08:15:00.000Z"),
        lastEscalatedAt: new Date("2025-01-06T08:00:00.000Z"),
      })

      harness.clock.set("2025-01-06T08:10:00.000Z")
      expect((await harness.container.driver.tick()).scanned).toBe(0)

      harness.clock.set("2025-01-06T08:15:00.000Z")
      const second = await harness.container.driver.tick()
      expect(second).toMatchObject({ escalated: 1, intents: 2 })

      harness.clock.set("2025-01-06T08:30:00.000Z")
      await harness.container.driver.tick()

      const alert = await harness.container.alerts.getAlert(alertId)
      expect(alert.escalation.tier).toBe(3)
      expect(alert.escalation.nextEscalationAt).toBeNull()
      expect(harness.dispatcher.dispatched.map((i) => [i.tier, i.channel, i.recipient])).toEqual([
        [1, "email", "ops@example.com"],
        [2, "sms", "alice"],
        [2, "voice", "alice"],
        [3, "voice", "manager-1"],
      ])

      harness.clock.set("2025-01-06T09:00:00.000Z")
      expect((await harness.container.driver.tick()).scanned).toBe(0)
    })

    it("should write the tier entry with its intent count", async () => {
      await harness.container.driver.tick()

      const history = await harness.container.alerts.getHistory(alertId)
      expect(history[1]).toEqual({
        alertId,
        sequence: 2,
        state: "new",
        actor: null,
        createdAt: new Date("2025-01-06T08:00:00.000Z"),
        notes: "Escalated to tier 1: email",
        metadata: { escalation_tier: 1, policy_id: policyId, intent_count: 1 },
      })
    })

    it("should record dispatched intents", async () => {
      await harness.container.driver.tick()

      const intents = await harness.container.notifications.listIntents(alertId)
      expect(intents).toHaveLength(1)
      expect(intents[0]).toMatchObject({
        alertId,
        tier: 1,
        policyId,
        channel: "email",
        recipient: "ops@example.com",
        status: "dispatched",
        dispatchedAt: new Date("2025-01-06T08:00:00.000Z"),
      })
    })
  })

  describe("advance", () => {
    it("should skip a tier that is not yet due", async () => {
      await harness.container.escalation.advance(alertId)
      harness.clock.set("2025-01-06T08:10:00.000Z")

      const outcome = await harness.container.escalation.advance(alertId)

      expect(outcome).toEqual({ kind: "skipped", alertId, reason: "not_due" })
      expect((await harness.container.alerts.getAlert(alertId)).escalation.tier).toBe(1)
    })

    it("should skip once every tier has run", async () => {
      harness.clock.set("2025-01-06T08:30:00.000Z")
      await harness.container.escalation.advance(alertId)
      await harness.container.escalation.advance(alertId)
      await harness.container.escalation.advance(alertId)

      const outcome = await harness.container.escalation.advance(alertId)

      expect(outcome).toEqual({ kind: "skipped", alertId, reason: "complete" })
    })

    it("should skip alerts without a matching policy and park them", async () => {
      const result = await harness.container.alerts.createAlert({
        deviceId: "compressor-3",
        ruleId: "oil-pressure-low",
        severity: "low",
        message: "Oil pressure trending down",
      })

      const outcome = await harness.container.escalation.advance(result.alertId)

      expect(outcome).toEqual({ kind: "skipped", alertId: result.alertId, reason: "no_policy" })
      expect((await harness.container.alerts.getAlert(result.alertId)).escalation.nextEscalationAt).toBeNull()
    })

    it("should throw NotFoundError for an unknown alert", async () => {
      await expect(harness.container.escalation.advance("missing")).rejects.toThrow(NotFoundError)
    })

    it("should drop an on-call recipient whose schedule does not exist", async () => {
      await harness.container.onCall.deleteSchedule("id-2")
      harness.clock.set("2025-01-06T08:15:00.000Z")
      await harness.container.escalation.advance(alertId)

      const outcome = await harness.container.escalation.advance(alertId)

      expect(outcome.kind).toBe("escalated")
      if (outcome.kind === "escalated") {
        expect(outcome.result.tier).toBe(2)
        expect(outcome.result.intents).toEqual([])
      }
    })

    it("should mark intents the dispatcher rejects and keep the tier", async () => {
      harness.dispatcher.failFor.add("email")

      const outcome = await harness.container.escalation.advance(alertId)

      expect(outcome.kind).toBe("escalated")
      const [intent] = await harness.container.notifications.listIntents(alertId)
      expect(intent.status).toBe("dispatch_failed")
      expect(intent.dispatchedAt).toBeNull()
      expect(intent.detail).toEqual({ error: "email gateway rejected the intent" })
      expect((await harness.container.alerts.getAlert(alertId)).escalation.tier).toBe(1)
    })
  })

  describe("acknowledgement", () => {
    beforeEach(async () => {
      await harness.container.driver.tick()
      harness.clock.set("2025-01-06T08:05:00.000Z")
      await harness.container.alerts.acknowledge(alertId, "op-1")
    })

    it("should park an acknowledged alert when its tier falls due", async () => {
      harness.clock.set("2025-01-06T08:15:00.000Z")

      const summary = await harness.container.driver.tick()

      expect(summary.skipped).toEqual({ suppressed: 1 })
      const alert = await harness.container.alerts.getAlert(alertId)
      expect(alert.escalation.tier).toBe(1)
      expect(alert.escalation.nextEscalationAt).toBeNull()
    })

    it("should re-arm the alert when it moves on to investigating", async () => {
      harness.clock.set("2025-01-06T08:15:00.000Z")
      await harness.container.driver.tick()
      harness.clock.set("2025-01-06T08:20:00.000Z")

      await harness.container.alerts.startInvestigation(alertId, "op-1")

      expect((await harness.container.alerts.getAlert(alertId)).escalation.nextEscalationAt).toEqual(
        new Date("2025-01-06T08:15:00.000Z")
      )
      const summary = await harness.container.driver.tick()
      expect(summary.escalated).toBe(1)
      const intents = await harness.container.notifications.listIntents(alertId)
      expect(intents.filter((i) => i.tier === 2).map((i) => i.createdAt)).toEqual([
        new Date("2025-01-06T08:20:00.000Z"),
        new Date("2025-01-06T08:20:00.000Z"),
      ])
    })

    it("should report the paused status", async () => {
      const status = await harness.container.escalation.getStatus(alertId)

      expect(status).toMatchObject({
        currentTier: 1,
        totalTiers: 3,
        nextEscalationAt: new Date("2025-01-06T08:15:00.000Z"),
        escalationComplete: false,
        currentState: "acknowledged",
        paused: true,
      })
    })
  })

  describe("policies that keep escalating acknowledged alerts", () => {
    it("should escalate an acknowledged alert", async () => {
      harness = createHarness()
      await harness.container.policies.createPolicy({
        name: "always-page",
        severities: ["critical"],
        acknowledgeSuppresses: false,
        tiers: [
          { level: 1, delayMinutes: 0, channels: ["email"], recipients: ["ops@example.com"] },
          { level: 2, delayMinutes: 10, channels: ["sms"], recipients: ["manager-1"] },
        ],
      })
      const id = await createAlert()
      await harness.container.escalation.advance(id)
      await harness.container.alerts.acknowledge(id, "op-1")
      harness.clock.set("2025-01-06T08:10:00.000Z")

      const outcome = await harness.container.escalation.advance(id)

      expect(outcome.kind).toBe("escalated")
    })
  })

  describe("concurrent resolution", () => {
    it("should abort the advance without writing intents", async () => {
      const repository = harness.store.alertRepository
      const append = repository.appendEntry.bind(repository)
      let raced = false
      jest.spyOn(repository, "appendEntry").mockImplementation(async (change) => {
        if (!raced) {
          raced = true
          await harness.container.alerts.resolve(alertId, "op-2")
        }
        return append(change)
      })

      const outcome = await harness.container.escalation.advance(alertId)

      expect(outcome).toEqual({ kind: "skipped", alertId, reason: "resolved" })
      expect(harness.store.intents.size).toBe(0)
      expect(harness.dispatcher.dispatched).toEqual([])
      const history = await harness.container.alerts.getHistory(alertId)
      expect(history.map((e) => e.state)).toEqual(["new", "resolved"])
    })
  })

  describe("forced escalation", () => {
    it("should advance ahead of the delay and mark the entry", async () => {
      await harness.container.escalation.advance(alertId)
      harness.clock.set("2025-01-06T08:01:00.000Z")

      const outcome = await harness.container.escalation.advance(alertId, { force: true, actor: "admin-1" })

      expect(outcome.kind).toBe("escalated")
      const history = await harness.container.alerts.getHistory(alertId)
      const last = history[history.length - 1]
      expect(last.actor).toBe("admin-1")
      expect(last.metadata).toEqual({ escalation_tier: 2, policy_id: policyId, intent_count: 2, forced: true })
    })

    it("should advance an acknowledged alert", async () => {
      await harness.container.escalation.advance(alertId)
      await harness.container.alerts.acknowledge(alertId, "op-1")

      const outcome = await harness.container.escalation.advance(alertId, { force: true })

      expect(outcome.kind).toBe("escalated")
    })

    it("should refuse a resolved alert", async () => {
      await harness.container.alerts.resolve(alertId, "op-1")

      await expect(harness.container.escalation.advance(alertId, { force: true })).rejects.toThrow(
        `Alert ${alertId} cannot be escalated: resolved`
      )
    })

    it("should refuse an alert with no policy", async () => {
      await harness.container.policies.updatePolicy(policyId, { enabled: false })

      await expect(harness.container.escalation.advance(alertId, { force: true })).rejects.toThrow(ValidationError)
    })
  })

  describe("getStatus", () => {
    it("should describe progress through the policy", async () => {
      await harness.container.escalation.advance(alertId)

      const status = await harness.container.escalation.getStatus(alertId)

      expect(status.policy?.name).toBe("critical-path")
      expect(status).toMatchObject({
        currentTier: 1,
        totalTiers: 3,
        nextEscalationAt: new Date("2025-01-06T08:15:00.000Z"),
        escalationComplete: false,
        paused: false,
      })
    })

    it("should report completion when no policy applies", async () => {
      await harness.container.policies.deletePolicy(policyId)

      const status = await harness.container.escalation.getStatus(alertId)

      expect(status).toMatchObject({ policy: null, totalTiers: 0, escalationComplete: true })
    })
  })
})
