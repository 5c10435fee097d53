/**
 * Alert Service
 *
 * Single entry point for new alerts and lifecycle changes, plus the alert
 * read side. Creation writes the alert, its initial `new` entry, its SLA row
 * and its group linkage atomically; a lost race on the group is re-planned
 * against the newer group state.
 */

import {
  isAlertSeverity,
  type Alert,
  type AlertFilter,
  type AlertPage,
  type AlertRepository,
  type AlertState,
  type AlertStateEntry,
  type CreateAlertInput,
} from "../../domain/alert/Alert"
import type { AlertSla, SlaTargets } from "../../domain/sla/Sla"
import type { AlertGroup, AlertGroupRepository } from "../../domain/group/AlertGroup"
import { initialEscalation } from "../../domain/escalation/EscalationPolicy"
import type { JsonRecord } from "../../shared/types"
import type { Clock } from "../../shared/clock"
import type { IdGenerator } from "../../shared/ids"
import { NotFoundError, ValidationError } from "../../shared/errors"
import { addMinutes } from "../../shared/time"
import { retryOnConflict } from "../../shared/retry"
import type { AlertStateMachine } from "./AlertStateMachine"
import type { GroupingService } from "../grouping/GroupingService"
import type { SlaTrackerService } from "../sla/SlaTrackerService"
import type { EscalationPolicyService } from "../escalation/EscalationPolicyService"

export const DEFAULT_LIST_LIMIT = 50
export const MAX_LIST_LIMIT = 200

export interface CreateAlertResult {
  alertId: string
  initialState: AlertState
  slaTargets: SlaTargets
  groupId: string
  // true when the alert joined an existing group
  grouped: boolean
  alert: Alert
}

export interface TransitionOptions {
  notes?: string | null
  metadata?: JsonRecord
  force?: boolean
}

export interface AlertDetail {
  alert: Alert
  history: AlertStateEntry[]
  sla: AlertSla | null
  group: AlertGroup | null
}

export interface AlertQuery extends Omit<AlertFilter, "limit"> {
  limit?: number
  // Minutes back from now; ignored when `from` is given
  windowMinutes?: number
}

function requireText(value: unknown, field: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new ValidationError(`${field} is required`, field)
  }
  return value.trim()
}

export class AlertService {
  constructor(
    private alertRepository: AlertRepository,
    private groupRepository: AlertGroupRepository,
    private stateMachine: AlertStateMachine,
    private grouping: GroupingService,
    private slaTracker: SlaTrackerService,
    private policyService: EscalationPolicyService,
    private clock: Clock,
    private newId: IdGenerator
  ) {}

  async createAlert(input: CreateAlertInput): Promise<CreateAlertResult> {
    const deviceId = requireText(input.deviceId, "device_id")
    const ruleId = requireText(input.ruleId, "rule_id")
    const message = requireText(input.message, "message")
    if (!isAlertSeverity(input.severity)) {
      throw new ValidationError(`Unknown severity: ${String(input.severity)}`, "severity")
    }
    const severity = input.severity
    const payload = input.payload ?? {}

    const result = await retryOnConflict("alerts.create", async () => {
      const now = this.clock.now()
      const id = this.newId()
      const policy = await this.policyService.policyForSeverity(severity)
      const linkage = await this.grouping.planLinkage({ id, deviceId, ruleId, severity }, now)
      const escalation = initialEscalation(policy, now)

      const alert: Alert = {
        id,
        deviceId,
        ruleId,
        severity,
        message,
        payload,
        createdAt: now,
        currentState: "new",
        stateChangedAt: now,
        groupId: linkage.group.id,
        escalation,
        version: 1,
      }
      const sla = this.slaTracker.materialize(id, severity, now)

      await this.alertRepository.create({
        alert,
        sla,
        linkage,
        initialEntry: {
          alertId: id,
          sequence: 1,
          state: "new",
          actor: null,
          createdAt: now,
          notes: null,
          metadata: { escalation_tier: 0, policy_id: escalation.policyId },
        },
      })

      return {
        alertId: id,
        initialState: alert.currentState,
        slaTargets: { ttaMinutes: sla.ttaTargetMin, ttrMinutes: sla.ttrTargetMin },
        groupId: linkage.group.id,
        grouped: linkage.kind === "absorb",
        alert,
      }
    })

    console.log(
      `[AlertIngress] Created ${severity} alert ${result.alertId} for ${deviceId}/${ruleId}, ` +
        `group ${result.groupId} (${result.grouped ? "grouped" : "new group"})`
    )
    return result
  }

  async transition(
    alertId: string,
    targetState: AlertState,
    actor: string | null,
    options: TransitionOptions = {}
  ): Promise<AlertStateEntry> {
    return this.stateMachine.transition({ alertId, targetState, actor, ...options })
  }

  async acknowledge(alertId: string, actor: string | null, notes?: string | null): Promise<AlertStateEntry> {
    return this.transition(alertId, "acknowledged", actor, { notes })
  }

  async startInvestigation(alertId: string, actor: string | null, notes?: string | null): Promise<AlertStateEntry> {
    return this.transition(alertId, "investigating", actor, { notes })
  }

  async resolve(alertId: string, actor: string | null, notes?: string | null): Promise<AlertStateEntry> {
    return this.transition(alertId, "resolved", actor, { notes })
  }

  async addNote(alertId: string, actor: string | null, notes: string, metadata?: JsonRecord): Promise<AlertStateEntry> {
    return this.stateMachine.addNote({ alertId, actor, notes, metadata })
  }

  async getAlert(id: string): Promise<Alert> {
    const alert = await this.alertRepository.findById(id)
    if (!alert) {
      throw new NotFoundError("Alert")
    }
    return alert
  }

  async getAlertDetail(id: string): Promise<AlertDetail> {
    const alert = await this.getAlert(id)
    const [history, sla, group] = await Promise.all([
      this.alertRepository.findHistory(id),
      this.slaTracker.getSla(id).catch((error: unknown) => {
        if (error instanceof NotFoundError) {
          return null
        }
        throw error
      }),
      alert.groupId ? this.groupRepository.findById(alert.groupId) : Promise.resolve(null),
    ])

    return { alert, history, sla, group }
  }

  async getCurrentState(id: string): Promise<AlertState> {
    const alert = await this.getAlert(id)
    return alert.currentState
  }

  async getHistory(id: string): Promise<AlertStateEntry[]> {
    await this.getAlert(id)
    return this.alertRepository.findHistory(id)
  }

  async listAlerts(query: AlertQuery = {}): Promise<AlertPage> {
    const limit = query.limit ?? DEFAULT_LIST_LIMIT
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
      throw new ValidationError(`limit must be between 1 and ${MAX_LIST_LIMIT}`, "limit")
    }

    const { windowMinutes, ...filter } = query
    const from =
      filter.from ?? (windowMinutes !== undefined ? addMinutes(this.clock.now(), -windowMinutes) : undefined)
    if (from && filter.to && from.getTime() > filter.to.getTime()) {
      throw new ValidationError("from must not be after to", "from")
    }

    return this.alertRepository.list({ ...filter, from, limit })
  }

  async deleteAlert(id: string): Promise<void> {
    await retryOnConflict("alerts.delete", () => this.alertRepository.delete(id))
    console.log(`[AlertIngress] Deleted alert ${id} with its history, SLA row and intents`)
  }
}
