/**
 * AlertStateMachine Unit Tests
 */

import { InvalidTransitionError, NotFoundError, ValidationError } from "../../../src/shared/errors"
import { createHarness, type TestHarness } from "../../support/testContainer"

describe("AlertStateMachine", () => {
  let harness: TestHarness
  let alertId: string

  beforeEach(async () => {
    harness = createHarness()
    const created = await harness.container.alerts.createAlert({
      deviceId: "pump-7",
      ruleId: "pressure-high",
      severity: "high",
      message: "Discharge pressure above 9 bar",
    })
    alertId = created.alertId
  })

  describe("transition", () => {
    it("should append an entry and move the current state", async () => {
      harness.clock.advanceMinutes(4)

      const entry = await harness.container.stateMachine.transition({
        alertId,
        targetState: "acknowledged",
        actor: "op-1",
        notes: "Looking at it",
      })

      expect(entry).toEqual({
        alertId,
        sequence: 2,
        state: "acknowledged",
        actor: "op-1",
        createdAt: new Date("2025-01-06T08:04:00.000Z"),
        notes: "Looking at it",
        metadata: { escalation_tier: 0, policy_id: null },
      })
      const alert = await harness.container.alerts.getAlert(alertId)
      expect(alert.currentState).toBe("acknowledged")
      expect(alert.version).toBe(2)
      expect(alert.stateChangedAt).toEqual(new Date("2025-01-06T08:04:00.000Z"))
    })

    it("should allow every forward edge of the lifecycle", async () => {
      await harness.container.alerts.startInvestigation(alertId, "op-1")
      await harness.container.alerts.resolve(alertId, "op-1")

      const history = await harness.container.alerts.getHistory(alertId)
      expect(history.map((e) => e.state)).toEqual(["new", "investigating", "resolved"])
      expect(history.map((e) => e.sequence)).toEqual([1, 2, 3])
    })

    it("should reject a transition out of resolved and leave history unchanged", async () => {
      await harness.container.alerts.resolve(alertId, "op-1")

      await expect(harness.container.alerts.acknowledge(alertId, "op-1")).rejects.toThrow(InvalidTransitionError)

      const history = await harness.container.alerts.getHistory(alertId)
      expect(history).toHaveLength(2)
    })

    it("should reject a self transition", async () => {
      await expect(harness.container.alerts.transition(alertId, "new", "op-1")).rejects.toThrow(
        "Invalid state transition: new -> new"
      )
    })

    it("should reject moving back from investigating to acknowledged", async () => {
      await harness.container.alerts.startInvestigation(alertId, "op-1")

      await expect(harness.container.alerts.acknowledge(alertId, "op-1")).rejects.toThrow(InvalidTransitionError)
    })

    it("should allow a forced transition and mark the entry", async () => {
      await harness.container.alerts.resolve(alertId, "op-1")

      const entry = await harness.container.alerts.transition(alertId, "investigating", "admin-1", { force: true })

      expect(entry.state).toBe("investigating")
      expect(entry.metadata.forced).toBe(true)
    })

    it("should throw NotFoundError for an unknown alert", async () => {
      await expect(harness.container.alerts.acknowledge("missing", "op-1")).rejects.toThrow(NotFoundError)
    })

    it("should never date an entry before the previous one", async () => {
      harness.clock.advanceMinutes(10)
      await harness.container.alerts.acknowledge(alertId, "op-1")
      harness.clock.set("2025-01-06T08:02:00.000Z")

      const entry = await harness.container.alerts.resolve(alertId, "op-1")

      expect(entry.createdAt).toEqual(new Date("2025-01-06T08:10:00.000Z"))
    })

    it("should clear the pending escalation when resolving", async () => {
      harness.store.alerts.set(alertId, {
        ...(await harness.container.alerts.getAlert(alertId)),
        escalation: { tier: 0, policyId: null, nextEscalationAt: new Date("2025-01-06T08:15:00.000Z"), lastEscalatedAt: null },
      })

      await harness.container.alerts.resolve(alertId, "op-1")

      const alert = await harness.container.alerts.getAlert(alertId)
      expect(alert.escalation.nextEscalationAt).toBeNull()
    })

    it("should validate a losing concurrent transition against the winner's state", async () => {
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

      await expect(harness.container.alerts.acknowledge(alertId, "op-1")).rejects.toThrow(
        "Invalid state transition: resolved -> acknowledged"
      )

      const history = await harness.container.alerts.getHistory(alertId)
      expect(history.map((e) => [e.state, e.actor])).toEqual([
        ["new", null],
        ["resolved", "op-2"],
      ])
    })

    it("should publish the transition to subscribers after commit", async () => {
      const seen: string[] = []
      harness.container.events.subscribe("probe", async (event) => {
        seen.push(`${event.fromState}->${event.toState}:${event.actor}`)
      })

      await harness.container.alerts.acknowledge(alertId, "op-1")

      expect(seen).toEqual(["new->acknowledged:op-1"])
    })

    it("should keep the transition when a subscriber fails", async () => {
      harness.container.events.subscribe("broken", async () => {
        throw new Error("listener down")
      })

      await harness.container.alerts.acknowledge(alertId, "op-1")

      expect(await harness.container.alerts.getCurrentState(alertId)).toBe("acknowledged")
    })
  })

  describe("addNote", () => {
    it("should append an entry in the current state", async () => {
      const entry = await harness.container.alerts.addNote(alertId, "op-1", "Valve replaced", { ticket: "WO-12" })

      expect(entry.state).toBe("new")
      expect(entry.sequence).toBe(2)
      expect(entry.metadata).toEqual({ ticket: "WO-12", escalation_tier: 0, policy_id: null })
      expect(await harness.container.alerts.getCurrentState(alertId)).toBe("new")
    })

    it("should throw ValidationError for a blank note", async () => {
      await expect(harness.container.alerts.addNote(alertId, "op-1", "   ")).rejects.toThrow(ValidationError)
    })
  })
})
