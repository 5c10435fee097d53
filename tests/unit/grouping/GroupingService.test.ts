/**
 * GroupingService Unit Tests
 */

import { noiseReductionPct } from "../../../src/application/grouping/GroupingService"
import { NotFoundError } from "../../../src/shared/errors"
import { createHarness, type TestHarness } from "../../support/testContainer"

describe("GroupingService", () => {
  let harness: TestHarness

  async function ingest(deviceId: string, count: number): Promise<string> {
    let groupId = ""
    for (let i = 0; i < count; i++) {
      const result = await harness.container.alerts.createAlert({
        deviceId,
        ruleId: "vibration",
        severity: "medium",
        message: "Vibration above baseline",
      })
      groupId = result.groupId
    }
    return groupId
  }

  beforeEach(() => {
    harness = createHarness()
  })

  describe("noiseReductionPct", () => {
    it("should be zero for a single occurrence", () => {
      expect(noiseReductionPct(1)).toBe(0)
    })

    it("should round to two decimals", () => {
      expect(noiseReductionPct(4)).toBe(75)
      expect(noiseReductionPct(3)).toBe(66.67)
    })
  })

  describe("planLinkage", () => {
    it("should use the configured window", async () => {
      harness = createHarness({ ALERTING_GROUPING_WINDOW_MINUTES: "1" })
      const first = await ingest("motor-1", 1)
      harness.clock.advanceMinutes(2)

      const second = await ingest("motor-1", 1)

      expect(second).not.toBe(first)
    })
  })

  describe("closeGroup", () => {
    it("should close the group, record the reason and free the key", async () => {
      const groupId = await ingest("motor-1", 2)
      harness.clock.advanceMinutes(1)

      const closed = await harness.container.grouping.closeGroup(groupId, "maintenance done")
      const next = await ingest("motor-1", 1)

      expect(closed.status).toBe("closed")
      expect(closed.closedAt).toEqual(new Date("2025-01-06T08:01:00.000Z"))
      expect(closed.metadata).toEqual({ close_reason: "maintenance done" })
      expect(next).not.toBe(groupId)
    })

    it("should return an already closed group unchanged", async () => {
      const groupId = await ingest("motor-1", 1)
      const closed = await harness.container.grouping.closeGroup(groupId)
      harness.clock.advanceMinutes(5)

      const again = await harness.container.grouping.closeGroup(groupId)

      expect(again.closedAt).toEqual(closed.closedAt)
    })

    it("should throw NotFoundError for an unknown group", async () => {
      await expect(harness.container.grouping.closeGroup("missing")).rejects.toThrow(NotFoundError)
    })
  })

  describe("updateGroupMetadata", () => {
    it("should merge onto the existing metadata", async () => {
      const groupId = await ingest("motor-1", 1)
      await harness.container.grouping.updateGroupMetadata(groupId, { owner: "line-2", shift: "a" })

      const updated = await harness.container.grouping.updateGroupMetadata(groupId, { shift: "b" })

      expect(updated.metadata).toEqual({ owner: "line-2", shift: "b" })
    })
  })

  describe("statistics", () => {
    it("should report one group's age and noise reduction", async () => {
      const groupId = await ingest("motor-1", 4)
      harness.clock.set("2025-01-06T08:07:30.000Z")

      const stats = await harness.container.grouping.groupStatistics(groupId)

      expect(stats).toMatchObject({
        occurrenceCount: 4,
        ageMinutes: 7.5,
        noiseReductionPct: 75,
        status: "active",
      })
    })

    it("should aggregate over every group", async () => {
      await ingest("motor-1", 3)
      await ingest("motor-2", 1)

      const stats = await harness.container.grouping.overallStatistics()

      expect(stats).toEqual({
        totalGroups: 2,
        activeGroups: 2,
        closedGroups: 0,
        totalAlertsGrouped: 4,
        avgAlertsPerGroup: 2,
        maxAlertsInGroup: 3,
        overallNoiseReductionPct: 50,
      })
    })

    it("should report zeros with no groups", async () => {
      const stats = await harness.container.grouping.overallStatistics()

      expect(stats.avgAlertsPerGroup).toBe(0)
      expect(stats.overallNoiseReductionPct).toBe(0)
    })
  })

  describe("getGroupsForDevice", () => {
    it("should return only active groups by default", async () => {
      const stale = await ingest("motor-1", 1)
      await harness.container.grouping.closeGroup(stale)
      const live = await ingest("motor-1", 1)

      const active = await harness.container.grouping.getGroupsForDevice("motor-1")
      const all = await harness.container.grouping.getGroupsForDevice("motor-1", false)

      expect(active.map((g) => g.id)).toEqual([live])
      expect(all.map((g) => g.id)).toEqual([live, stale])
    })
  })

  describe("deleteGroup", () => {
    it("should leave member alerts without a group", async () => {
      const groupId = await ingest("motor-1", 1)
      const [alert] = [...harness.store.alerts.values()]

      await harness.container.grouping.deleteGroup(groupId)

      expect((await harness.container.alerts.getAlert(alert.id)).groupId).toBeNull()
    })
  })
})
