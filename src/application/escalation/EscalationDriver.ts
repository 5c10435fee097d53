/**
 * Escalation Driver
 *
 * One tick scans the alerts whose next tier is due, oldest first, up to the
 * batch size, and advances each by at most one tier under a per-alert
 * deadline. Alerts left over, timed out or failed are picked up again by a
 * later tick.
 */

import type { AlertRepository } from "../../domain/alert/Alert"
import type { Clock } from "../../shared/clock"
import { DeadlineExceededError, withDeadline } from "../../shared/deadline"
import type { EscalationService, SkipReason } from "./EscalationService"

export interface EscalationTickSummary {
  startedAt: Date
  scanned: number
  escalated: number
  skipped: Partial<Record<SkipReason, number>>
  failed: number
  timedOut: number
  intents: number
  duration: number
}

export interface EscalationDriverOptions {
  tickIntervalSeconds: number
  batchSize: number
  alertDeadlineMs: number
}

export class EscalationDriver {
  private timer: NodeJS.Timeout | null = null
  private inFlight: Promise<void> | null = null

  constructor(
    private alertRepository: AlertRepository,
    private escalationService: EscalationService,
    private clock: Clock,
    private options: EscalationDriverOptions
  ) {}

  async tick(): Promise<EscalationTickSummary> {
    const startTime = Date.now()
    const startedAt = this.clock.now()
    const due = await this.alertRepository.findDueForEscalation(startedAt, this.options.batchSize)

    const summary: EscalationTickSummary = {
      startedAt,
      scanned: due.length,
      escalated: 0,
      skipped: {},
      failed: 0,
      timedOut: 0,
      intents: 0,
      duration: 0,
    }

    for (const alert of due) {
      try {
        const outcome = await withDeadline(
          this.escalationService.advance(alert.id),
          this.options.alertDeadlineMs,
          `escalation of alert ${alert.id}`
        )
        if (outcome.kind === "escalated") {
          summary.escalated++
          summary.intents += outcome.result.intents.length
        } else {
          summary.skipped[outcome.reason] = (summary.skipped[outcome.reason] ?? 0) + 1
        }
      } catch (error) {
        if (error instanceof DeadlineExceededError) {
          summary.timedOut++
          console.warn(`[Escalation] ${error.message}; retrying next tick`)
        } else {
          summary.failed++
          console.error(`[Escalation] Failed to advance alert ${alert.id}:`, error)
        }
      }
    }

    summary.duration = Date.now() - startTime
    return summary
  }

  /**
   * Runs ticks on a fixed interval. A tick still running when the next is
   * due is not overlapped; that interval is skipped.
   */
  start(): void {
    if (this.timer) {
      return
    }

    console.log(`[Escalation] Driver started, interval ${this.options.tickIntervalSeconds}s`)
    this.timer = setInterval(() => {
      if (this.inFlight) {
        return
      }
      this.inFlight = this.runTick().finally(() => {
        this.inFlight = null
      })
    }, this.options.tickIntervalSeconds * 1000)
  }

  /** Stops scheduling and waits for a running tick to finish. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
      console.log("[Escalation] Driver stopped")
    }
    if (this.inFlight) {
      await this.inFlight
    }
  }

  isRunning(): boolean {
    return this.timer !== null
  }

  private async runTick(): Promise<void> {
    try {
      const summary = await this.tick()
      if (summary.scanned > 0) {
        console.log("[Escalation] Tick completed:", JSON.stringify(summary))
      }
    } catch (error) {
      console.error("[Escalation] Tick failed:", error)
    }
  }
}
