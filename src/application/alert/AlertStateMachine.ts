/**
 * Alert State Machine
 *
 * Validates lifecycle transitions against ALERT_TRANSITIONS and appends the
 * history entry. The append is conditional on the alert version that was
 * validated, so two concurrent transitions cannot both succeed against the
 * same state: the loser re-reads and is validated against the newer state.
 */

import type { Alert, AlertRepository, AlertState, AlertStateEntry } from "../../domain/alert/Alert"
import { isValidTransition } from "../../domain/alert/AlertLifecycle"
import type { JsonRecord } from "../../shared/types"
import type { Clock } from "../../shared/clock"
import { InvalidTransitionError, NotFoundError, ValidationError } from "../../shared/errors"
import { laterOf } from "../../shared/time"
import { retryOnConflict } from "../../shared/retry"
import type { TransitionEventBus } from "./TransitionEventBus"

export interface TransitionRequest {
  alertId: string
  targetState: AlertState
  // null for system
  actor: string | null
  notes?: string | null
  metadata?: JsonRecord
  // Recovery only: skips the transition table
  force?: boolean
}

export interface NoteRequest {
  alertId: string
  actor: string | null
  notes: string
  metadata?: JsonRecord
}

export class AlertStateMachine {
  constructor(
    private alertRepository: AlertRepository,
    private events: TransitionEventBus,
    private clock: Clock
  ) {}

  async transition(request: TransitionRequest): Promise<AlertStateEntry> {
    const force = request.force ?? false

    const { entry, fromState } = await retryOnConflict("alerts.transition", async () => {
      const alert = await this.loadAlert(request.alertId)
      if (!force && !isValidTransition(alert.currentState, request.targetState)) {
        throw new InvalidTransitionError(alert.currentState, request.targetState)
      }

      const entry = this.buildEntry(alert, request.targetState, request.actor, request.notes ?? null, {
        ...request.metadata,
        ...(force && { forced: true }),
      })

      await this.alertRepository.appendEntry({
        alertId: alert.id,
        expectedVersion: alert.version,
        entry,
        currentState: request.targetState,
        escalation:
          request.targetState === "resolved"
            ? { ...alert.escalation, nextEscalationAt: null }
            : alert.escalation,
      })

      return { entry, fromState: alert.currentState }
    })

    console.log(
      `[StateMachine] Alert ${request.alertId}: ${fromState} -> ${entry.state}` +
        `${force ? " (forced)" : ""} by ${request.actor ?? "system"}`
    )

    await this.events.publish({
      alertId: request.alertId,
      fromState,
      toState: entry.state,
      actor: request.actor,
      occurredAt: entry.createdAt,
      forced: force,
    })

    return entry
  }

  /**
   * Appends an entry that keeps the current state. No transition event.
   */
  async addNote(request: NoteRequest): Promise<AlertStateEntry> {
    if (!request.notes.trim()) {
      throw new ValidationError("notes must not be empty", "notes")
    }

    return retryOnConflict("alerts.addNote", async () => {
      const alert = await this.loadAlert(request.alertId)
      const entry = this.buildEntry(alert, alert.currentState, request.actor, request.notes, request.metadata ?? {})

      await this.alertRepository.appendEntry({
        alertId: alert.id,
        expectedVersion: alert.version,
        entry,
        currentState: alert.currentState,
        escalation: alert.escalation,
      })

      return entry
    })
  }

  private async loadAlert(alertId: string): Promise<Alert> {
    const alert = await this.alertRepository.findById(alertId)
    if (!alert) {
      throw new NotFoundError("Alert")
    }
    return alert
  }

  /**
   * Every entry carries the escalation tier forward so the latest entry
   * alone tells where escalation stands.
   */
  private buildEntry(
    alert: Alert,
    state: AlertState,
    actor: string | null,
    notes: string | null,
    metadata: JsonRecord
  ): AlertStateEntry {
    return {
      alertId: alert.id,
      sequence: alert.version + 1,
      state,
      actor,
      // Never earlier than the previous entry
      createdAt: laterOf(this.clock.now(), alert.stateChangedAt),
      notes,
      metadata: {
        ...metadata,
        escalation_tier: alert.escalation.tier,
        policy_id: alert.escalation.policyId,
      },
    }
  }
}
