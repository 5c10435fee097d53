/**
 * AlertService Unit Tests
 */

import { NotFoundError, ValidationError } from "../../../src/shared/errors"
import { createHarness, type TestHarness } from "../../support/testContainer"

const PUMP_ALERT = {
  deviceId: "pump-7",
  ruleId: "pressure-high",
  severity: "critical" as const,
  message: "Discharge pressure above 9 bar",
}

describe("AlertService", () => {
  let harness: TestHarness

  beforeEach(() => {
    harness = createHarness()
  })

  describe("createAlert", () => {
    it("should write the alert, its new entry, its SLA row and a new group together", async () => {
      const result = await harness.container.alerts.createAlert({ ...PUMP_ALERT, payload: { bar: 9.4 } })

      expect(result.alertId).toBe("id-1")
      expect(result.groupId).toBe("id-2")
      expect(result.initialState).toBe("new")
      expect(result.grouped).toBe(false)
      expect(result.slaTargets).toEqual({ ttaMinutes: 5, ttrMinutes: 30 })

      expect(harness.store.entries.get("id-1")).toEqual([
        {
          alertId: "id-1",
          sequence: 1,
          state: "new",
          actor: null,
          createdAt: new Date("2025-01-06T08:00:00.000Z"),
          notes: null,
          metadata: { escalation_tier: 0, policy_id: null },
        },
      ])
      expect(harness.store.slas.get("id-1")).toMatchObject({
        severity: "critical",
        ttaTargetMin: 5,
        ttrTargetMin: 30,
        ttaActualMin: null,
        ttrActualMin: null,
      })
      expect(harness.store.groups.get("id-2")).toMatchObject({
        groupKey: "pump-7:pressure-high:critical",
        occurrenceCount: 1,
        status: "active",
        representativeAlertId: "id-1",
      })
    })

    it("should trim text fields", async () => {
      const result = await harness.container.alerts.createAlert({ ...PUMP_ALERT, deviceId: "  pump-7 " })

      expect(result.alert.deviceId).toBe("pump-7")
    })

    it("should throw ValidationError when the message is blank", async () => {
      await expect(harness.container.alerts.createAlert({ ...PUMP_ALERT, message: " " })).rejects.toThrow(
        ValidationError
      )
      expect(harness.store.alerts.size).toBe(0)
    })

    it("should take SLA targets from configuration overrides", async () => {
      harness = createHarness({
        ALERTING_SLA_SEVERITY_TARGETS: JSON.stringify({ critical: { ttaMinutes: 2, ttrMinutes: 20 } }),
      })

      const result = await harness.container.alerts.createAlert(PUMP_ALERT)

      expect(result.slaTargets).toEqual({ ttaMinutes: 2, ttrMinutes: 20 })
    })

    it("should bind the enabled policy for the severity and schedule its first tier", async () => {
      const policy = await harness.container.policies.createPolicy({
        name: "critical-path",
        severities: ["critical"],
        tiers: [{ level: 1, delayMinutes: 2, channels: ["email"], recipients: ["ops@example.com"] }],
      })

      const result = await harness.container.alerts.createAlert(PUMP_ALERT)

      expect(result.alert.escalation).toEqual({
        tier: 0,
        policyId: policy.id,
        nextEscalationAt: new Date("2025-01-06T08:02:00.000Z"),
        lastEscalatedAt: null,
      })
    })
  })

  describe("grouping on ingest", () => {
    it("should absorb a repeat within the window", async () => {
      const first = await harness.container.alerts.createAlert(PUMP_ALERT)
      harness.clock.advanceMinutes(3)

      const second = await harness.container.alerts.createAlert(PUMP_ALERT)

      expect(second.grouped).toBe(true)
      expect(second.groupId).toBe(first.groupId)
      const group = await harness.container.grouping.getGroup(first.groupId)
      expect(group.occurrenceCount).toBe(2)
      expect(group.firstOccurrence).toEqual(new Date("2025-01-06T08:00:00.000Z"))
      expect(group.lastOccurrence).toEqual(new Date("2025-01-06T08:03:00.000Z"))
      expect(group.representativeAlertId).toBe(first.alertId)
    })

    it("should absorb at exactly the window length", async () => {
      const first = await harness.container.alerts.createAlert(PUMP_ALERT)
      harness.clock.advanceMinutes(5)

      const second = await harness.container.alerts.createAlert(PUMP_ALERT)

      expect(second.groupId).toBe(first.groupId)
    })

    it("should roll over to a new group one millisecond past the window", async () => {
      const first = await harness.container.alerts.createAlert(PUMP_ALERT)
      harness.clock.set("2025-01-06T08:05:00.001Z")

      const second = await harness.container.alerts.createAlert(PUMP_ALERT)

      expect(second.grouped).toBe(false)
      expect(second.groupId).not.toBe(first.groupId)
      const stale = await harness.container.grouping.getGroup(first.groupId)
      expect(stale.status).toBe("closed")
      expect(stale.closedAt).toEqual(new Date("2025-01-06T08:05:00.001Z"))
      const active = await harness.container.grouping.listGroups({ status: "active", limit: 10 })
      expect(active.map((g) => g.id)).toEqual([second.groupId])
    })

    it("should keep severities in separate groups", async () => {
      const critical = await harness.container.alerts.createAlert(PUMP_ALERT)
      const high = await harness.container.alerts.createAlert({ ...PUMP_ALERT, severity: "high" })

      expect(high.groupId).not.toBe(critical.groupId)
    })

    it("should place concurrent alerts for one key into a single group", async () => {
      const results = await Promise.all([
        harness.container.alerts.createAlert(PUMP_ALERT),
        harness.container.alerts.createAlert(PUMP_ALERT),
        harness.container.alerts.createAlert(PUMP_ALERT),
      ])

      const groupIds = new Set(results.map((r) => r.groupId))
      expect(groupIds.size).toBe(1)
      expect(harness.store.groups.size).toBe(1)
      const [groupId] = [...groupIds]
      expect(harness.store.groups.get(groupId)?.occurrenceCount).toBe(3)
    })
  })

  describe("getAlertDetail", () => {
    it("should return the alert with history, SLA row and group", async () => {
      const created = await harness.container.alerts.createAlert(PUMP_ALERT)
      await harness.container.alerts.acknowledge(created.alertId, "op-1")

      const detail = await harness.container.alerts.getAlertDetail(created.alertId)

      expect(detail.alert.currentState).toBe("acknowledged")
      expect(detail.history.map((e) => e.state)).toEqual(["new", "acknowledged"])
      expect(detail.sla?.ttaActualMin).toBe(0)
      expect(detail.group?.id).toBe(created.groupId)
    })

    it("should throw NotFoundError for an unknown alert", async () => {
      await expect(harness.container.alerts.getAlertDetail("missing")).rejects.toThrow(NotFoundError)
    })
  })

  describe("listAlerts", () => {
    it("should list newest first and filter by state", async () => {
      const older = await harness.container.alerts.createAlert(PUMP_ALERT)
      harness.clock.advanceMinutes(1)
      const newer = await harness.container.alerts.createAlert({ ...PUMP_ALERT, deviceId: "pump-8" })
      await harness.container.alerts.resolve(older.alertId, "op-1")

      const all = await harness.container.alerts.listAlerts()
      const open = await harness.container.alerts.listAlerts({ state: "new" })

      expect(all.alerts.map((a) => a.id)).toEqual([newer.alertId, older.alertId])
      expect(open.alerts.map((a) => a.id)).toEqual([newer.alertId])
    })

    it("should apply a trailing window in minutes", async () => {
      await harness.container.alerts.createAlert(PUMP_ALERT)
      harness.clock.advanceMinutes(30)
      const recent = await harness.container.alerts.createAlert({ ...PUMP_ALERT, deviceId: "pump-8" })

      const page = await harness.container.alerts.listAlerts({ windowMinutes: 10 })

      expect(page.alerts.map((a) => a.id)).toEqual([recent.alertId])
    })

    it("should reject limits outside 1..200", async () => {
      await expect(harness.container.alerts.listAlerts({ limit: 0 })).rejects.toThrow(ValidationError)
      await expect(harness.container.alerts.listAlerts({ limit: 201 })).rejects.toThrow(ValidationError)
    })

    it("should reject a window whose start is after its end", async () => {
      await expect(
        harness.container.alerts.listAlerts({
          from: new Date("2025-01-06T09:00:00.000Z"),
          to: new Date("2025-01-06T08:00:00.000Z"),
        })
      ).rejects.toThrow("from must not be after to")
    })
  })

  describe("deleteAlert", () => {
    it("should remove history and SLA row and shrink the group", async () => {
      const first = await harness.container.alerts.createAlert(PUMP_ALERT)
      const second = await harness.container.alerts.createAlert(PUMP_ALERT)

      await harness.container.alerts.deleteAlert(second.alertId)

      expect(harness.store.entries.has(second.alertId)).toBe(false)
      expect(harness.store.slas.has(second.alertId)).toBe(false)
      expect((await harness.container.grouping.getGroup(first.groupId)).occurrenceCount).toBe(1)
    })
  })
})
