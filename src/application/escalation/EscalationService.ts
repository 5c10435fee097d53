/**
 * Escalation Service
 *
 * Advances one alert by one tier. The advance re-reads the alert, re-checks
 * eligibility and writes the history entry together with its notification
 * intents, conditional on the alert version it checked; a concurrent
 * resolution therefore aborts the advance before any intent exists. Intents
 * are handed to the dispatcher only after that write commits.
 *
 * Tier delays count from alert creation. The tier reached is carried on the
 * alert and on every history entry as `escalation_tier`.
 */

import type { Alert, AlertRepository, AlertState, EscalationTracking } from "../../domain/alert/Alert"
import type { AlertTransitionEvent } from "../../domain/alert/AlertLifecycle"
import {
  ON_CALL_RECIPIENT_PREFIX,
  nextTierDueAt,
  selectPolicy,
  type EscalationPolicy,
  type EscalationPolicyRepository,
  type EscalationTier,
} from "../../domain/escalation/EscalationPolicy"
import type {
  NotificationDispatcher,
  NotificationIntent,
  NotificationIntentRepository,
} from "../../domain/notification/Notification"
import type { Clock } from "../../shared/clock"
import type { IdGenerator } from "../../shared/ids"
import { AppError, NotFoundError, ValidationError } from "../../shared/errors"
import { addMinutes, laterOf } from "../../shared/time"
import { retryOnConflict } from "../../shared/retry"
import type { OnCallService } from "../oncall/OnCallService"

export type SkipReason = "no_policy" | "complete" | "resolved" | "suppressed" | "not_due"

export interface EscalationResult {
  alertId: string
  tier: number
  policyId: string
  policyName: string
  forced: boolean
  intents: NotificationIntent[]
}

export type EscalationOutcome =
  | { kind: "escalated"; result: EscalationResult }
  | { kind: "skipped"; alertId: string; reason: SkipReason }

export interface EscalationStatus {
  alertId: string
  policy: EscalationPolicy | null
  currentTier: number
  totalTiers: number
  nextEscalationAt: Date | null
  escalationComplete: boolean
  currentState: AlertState
  paused: boolean
}

export interface AdvanceOptions {
  // Skips the delay and state checks (recovery)
  force?: boolean
  actor?: string | null
}

export interface EscalationOptions {
  // Default for policies whose acknowledgeSuppresses is null
  acknowledgeSuppresses: boolean
}

type Attempt =
  | { kind: "escalated"; result: EscalationResult }
  | { kind: "skipped"; reason: SkipReason }

export class EscalationService {
  constructor(
    private alertRepository: AlertRepository,
    private policyRepository: EscalationPolicyRepository,
    private intentRepository: NotificationIntentRepository,
    private onCallService: OnCallService,
    private dispatcher: NotificationDispatcher,
    private clock: Clock,
    private newId: IdGenerator,
    private options: EscalationOptions
  ) {}

  /**
   * Moves the alert to its next tier when eligible. A forced advance throws
   * instead of skipping when no tier can be reached.
   */
  async advance(alertId: string, options: AdvanceOptions = {}): Promise<EscalationOutcome> {
    const attempt = await retryOnConflict("escalation.advance", () => this.tryAdvance(alertId, options))

    if (attempt.kind === "skipped") {
      return { kind: "skipped", alertId, reason: attempt.reason }
    }

    const { result } = attempt
    console.log(
      `[Escalation] Alert ${alertId} escalated to tier ${result.tier} (policy: ${result.policyName})` +
        `${result.forced ? " (forced)" : ""}, ${result.intents.length} intents`
    )

    result.intents = await this.dispatchAll(result.intents)
    return { kind: "escalated", result }
  }

  async getStatus(alertId: string): Promise<EscalationStatus> {
    const alert = await this.alertRepository.findById(alertId)
    if (!alert) {
      throw new NotFoundError("Alert")
    }

    const policy = await this.resolvePolicy(alert)
    if (!policy) {
      return {
        alertId,
        policy: null,
        currentTier: alert.escalation.tier,
        totalTiers: 0,
        nextEscalationAt: null,
        escalationComplete: true,
        currentState: alert.currentState,
        paused: false,
      }
    }

    const complete = alert.escalation.tier >= policy.tiers.length
    return {
      alertId,
      policy,
      currentTier: alert.escalation.tier,
      totalTiers: policy.tiers.length,
      nextEscalationAt: complete ? null : nextTierDueAt(policy, alert.escalation.tier, alert.createdAt),
      escalationComplete: complete,
      currentState: alert.currentState,
      paused: !complete && this.isPaused(alert, policy),
    }
  }

  /**
   * Transition listener: an alert leaving a paused state re-enters the
   * escalation schedule. Parking itself happens lazily at advance time.
   */
  async handleTransition(event: AlertTransitionEvent): Promise<void> {
    if (event.toState === "resolved") {
      return
    }

    await retryOnConflict("escalation.rearm", async () => {
      const alert = await this.alertRepository.findById(event.alertId)
      if (!alert || alert.escalation.nextEscalationAt || alert.currentState === "resolved") {
        return
      }

      const policy = await this.resolvePolicy(alert)
      if (!policy || this.isPaused(alert, policy)) {
        return
      }

      const dueAt = nextTierDueAt(policy, alert.escalation.tier, alert.createdAt)
      if (dueAt) {
        await this.alertRepository.reschedule(alert.id, dueAt, alert.version)
        console.log(`[Escalation] Alert ${alert.id} re-armed at tier ${alert.escalation.tier}, next due ${dueAt.toISOString()}`)
      }
    })
  }

  /**
   * The policy recorded at ingest while it still applies, otherwise the
   * current selection for the alert's severity.
   */
  async resolvePolicy(alert: Alert): Promise<EscalationPolicy | null> {
    if (alert.escalation.policyId) {
      const bound = await this.policyRepository.findById(alert.escalation.policyId)
      if (bound && bound.enabled && bound.severities.includes(alert.severity)) {
        return bound
      }
    }
    return selectPolicy(await this.policyRepository.findAll(), alert.severity)
  }

  private isPaused(alert: Alert, policy: EscalationPolicy): boolean {
    return alert.currentState === "acknowledged" && (policy.acknowledgeSuppresses ?? this.options.acknowledgeSuppresses)
  }

  private async tryAdvance(alertId: string, options: AdvanceOptions): Promise<Attempt> {
    const force = options.force ?? false
    const alert = await this.alertRepository.findById(alertId)
    if (!alert) {
      throw new NotFoundError("Alert")
    }

    const policy = await this.resolvePolicy(alert)
    if (!policy) {
      return this.skip(alert, "no_policy", force, null)
    }

    const currentTier = alert.escalation.tier
    if (currentTier >= policy.tiers.length) {
      return this.skip(alert, "complete", force, null)
    }
    if (alert.currentState === "resolved") {
      return this.skip(alert, "resolved", force, null)
    }
    if (!force && this.isPaused(alert, policy)) {
      return this.skip(alert, "suppressed", force, null)
    }

    const now = laterOf(this.clock.now(), alert.stateChangedAt)
    const tier = policy.tiers[currentTier]
    const dueAt = addMinutes(alert.createdAt, tier.delayMinutes)
    if (!force && now.getTime() < dueAt.getTime()) {
      return this.skip(alert, "not_due", force, dueAt)
    }

    const level = currentTier + 1
    const intents = await this.buildIntents(alert, policy, tier, level, now)
    const escalation: EscalationTracking = {
      tier: level,
      policyId: policy.id,
      nextEscalationAt: nextTierDueAt(policy, level, alert.createdAt),
      lastEscalatedAt: now,
    }

    await this.alertRepository.appendEntry({
      alertId: alert.id,
      expectedVersion: alert.version,
      currentState: alert.currentState,
      escalation,
      intents,
      entry: {
        alertId: alert.id,
        sequence: alert.version + 1,
        state: alert.currentState,
        actor: options.actor ?? null,
        createdAt: now,
        notes: `Escalated to tier ${level}: ${tier.channels.join(", ")}`,
        metadata: {
          escalation_tier: level,
          policy_id: policy.id,
          intent_count: intents.length,
          ...(force && { forced: true }),
        },
      },
    })

    return {
      kind: "escalated",
      result: { alertId: alert.id, tier: level, policyId: policy.id, policyName: policy.name, forced: force, intents },
    }
  }

  /**
   * Skipping also fixes the alert's place in the escalation scan: parked
   * (null) when nothing is pending, or moved to the actual due instant.
   */
  private async skip(alert: Alert, reason: SkipReason, force: boolean, dueAt: Date | null): Promise<Attempt> {
    if (force) {
      throw new ValidationError(`Alert ${alert.id} cannot be escalated: ${reason.replace("_", " ")}`, undefined, {
        reason,
      })
    }

    const current = alert.escalation.nextEscalationAt
    if ((current?.getTime() ?? null) !== (dueAt?.getTime() ?? null)) {
      await this.alertRepository.reschedule(alert.id, dueAt, alert.version)
    }
    return { kind: "skipped", reason }
  }

  private async buildIntents(
    alert: Alert,
    policy: EscalationPolicy,
    tier: EscalationTier,
    level: number,
    now: Date
  ): Promise<NotificationIntent[]> {
    const recipients = await this.resolveRecipients(alert.id, tier.recipients, now)
    return tier.channels.flatMap((channel) =>
      recipients.map((recipient) => ({
        id: this.newId(),
        alertId: alert.id,
        tier: level,
        policyId: policy.id,
        channel,
        recipient,
        status: "pending" as const,
        createdAt: now,
        dispatchedAt: null,
        acknowledgedAt: null,
        detail: null,
      }))
    )
  }

  /**
   * Replaces `oncall:<schedule name>` with the user on call at `at`.
   * References that cannot be resolved are logged and dropped.
   */
  private async resolveRecipients(alertId: string, recipients: string[], at: Date): Promise<string[]> {
    const resolved: string[] = []

    for (const recipient of recipients) {
      if (!recipient.startsWith(ON_CALL_RECIPIENT_PREFIX)) {
        resolved.push(recipient)
        continue
      }

      const scheduleName = recipient.slice(ON_CALL_RECIPIENT_PREFIX.length)
      try {
        const assignment = await this.onCallService.getOnCallByScheduleName(scheduleName, at)
        resolved.push(assignment.userId)
      } catch (error) {
        // Store failures abort the advance; only lookup failures are skipped
        if (!(error instanceof AppError) || error.code === "STORE_UNAVAILABLE") {
          throw error
        }
        console.warn(`[Escalation] Skipping recipient ${recipient} for alert ${alertId}: ${error.message}`)
      }
    }

    return [...new Set(resolved)]
  }

  private async dispatchAll(intents: NotificationIntent[]): Promise<NotificationIntent[]> {
    const outcomes: NotificationIntent[] = []

    for (const intent of intents) {
      let outcome: NotificationIntent
      try {
        await this.dispatcher.dispatch(intent)
        outcome = { ...intent, status: "dispatched", dispatchedAt: this.clock.now() }
      } catch (error) {
        console.error(`[Escalation] Dispatch failed for intent ${intent.id} (${intent.channel} -> ${intent.recipient}):`, error)
        outcome = {
          ...intent,
          status: "dispatch_failed",
          detail: { error: error instanceof Error ? error.message : String(error) },
        }
      }

      try {
        outcomes.push(await this.intentRepository.update(outcome))
      } catch (error) {
        console.error(`[Escalation] Could not record dispatch outcome for intent ${intent.id}:`, error)
        outcomes.push(outcome)
      }
    }

    return outcomes
  }
}
