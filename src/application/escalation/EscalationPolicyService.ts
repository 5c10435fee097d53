/**
 * Escalation Policy Service
 *
 * Policy CRUD and validation. Tier levels run 1..n in order, delays never
 * decrease from one tier to the next, and every tier names at least one
 * channel and one recipient.
 */

import {
  selectPolicy,
  type CreateEscalationPolicyInput,
  type EscalationPolicy,
  type EscalationPolicyRepository,
  type EscalationTier,
  type UpdateEscalationPolicyInput,
} from "../../domain/escalation/EscalationPolicy"
import { isAlertSeverity, type AlertSeverity } from "../../domain/alert/Alert"
import { NOTIFICATION_CHANNELS } from "../../domain/notification/Notification"
import type { Clock } from "../../shared/clock"
import type { IdGenerator } from "../../shared/ids"
import { retryOnConflict } from "../../shared/retry"
import { NotFoundError, ValidationError } from "../../shared/errors"

export function validateTiers(tiers: EscalationTier[]): void {
  if (tiers.length === 0) {
    throw new ValidationError("A policy needs at least one tier", "tiers")
  }

  tiers.forEach((tier, index) => {
    if (tier.level !== index + 1) {
      throw new ValidationError(
        `Tier levels must increase by one from 1: expected ${index + 1}, got ${tier.level}`,
        "tiers",
        { index }
      )
    }
    if (!Number.isInteger(tier.delayMinutes) || tier.delayMinutes < 0) {
      throw new ValidationError(`Tier ${tier.level} delay must be a non-negative integer`, "tiers", { index })
    }
    if (index > 0 && tier.delayMinutes < tiers[index - 1].delayMinutes) {
      throw new ValidationError(`Tier ${tier.level} delay is shorter than tier ${tier.level - 1}`, "tiers", {
        index,
      })
    }
    if (tier.channels.length === 0 || !tier.channels.every((c) => NOTIFICATION_CHANNELS.includes(c))) {
      throw new ValidationError(
        `Tier ${tier.level} channels must be a non-empty subset of ${NOTIFICATION_CHANNELS.join(", ")}`,
        "tiers",
        { index }
      )
    }
    if (tier.recipients.length === 0 || tier.recipients.some((r) => !r.trim())) {
      throw new ValidationError(`Tier ${tier.level} needs at least one recipient`, "tiers", { index })
    }
  })
}

function validatePolicy(policy: EscalationPolicy): void {
  if (!policy.name.trim()) {
    throw new ValidationError("name is required", "name")
  }
  if (policy.severities.length === 0 || !policy.severities.every(isAlertSeverity)) {
    throw new ValidationError("severities must be a non-empty list of alert severities", "severities")
  }
  validateTiers(policy.tiers)
}

export class EscalationPolicyService {
  constructor(
    private policyRepository: EscalationPolicyRepository,
    private clock: Clock,
    private newId: IdGenerator
  ) {}

  async getPolicy(id: string): Promise<EscalationPolicy> {
    const policy = await this.policyRepository.findById(id)
    if (!policy) {
      throw new NotFoundError("Escalation policy")
    }
    return policy
  }

  async getPolicyByName(name: string): Promise<EscalationPolicy> {
    const policy = await this.policyRepository.findByName(name)
    if (!policy) {
      throw new NotFoundError("Escalation policy")
    }
    return policy
  }

  async listPolicies(enabledOnly: boolean = false): Promise<EscalationPolicy[]> {
    const policies = await this.policyRepository.findAll()
    return enabledOnly ? policies.filter((p) => p.enabled) : policies
  }

  async policyForSeverity(severity: AlertSeverity): Promise<EscalationPolicy | null> {
    return selectPolicy(await this.policyRepository.findAll(), severity)
  }

  async createPolicy(input: CreateEscalationPolicyInput): Promise<EscalationPolicy> {
    const now = this.clock.now()
    const policy: EscalationPolicy = {
      id: this.newId(),
      name: input.name.trim(),
      description: input.description ?? null,
      severities: [...new Set(input.severities)],
      enabled: input.enabled ?? true,
      acknowledgeSuppresses: input.acknowledgeSuppresses ?? null,
      tiers: input.tiers,
      version: 1,
      createdAt: now,
      updatedAt: now,
    }
    validatePolicy(policy)

    const created = await this.policyRepository.create(policy)
    console.log(
      `[Escalation] Created policy ${created.name} (${created.id}) for ${created.severities.join(", ")} ` +
        `with ${created.tiers.length} tiers`
    )
    return created
  }

  async updatePolicy(id: string, input: UpdateEscalationPolicyInput): Promise<EscalationPolicy> {
    return retryOnConflict("policies.update", async () => {
      const existing = await this.getPolicy(id)
      const updated: EscalationPolicy = {
        ...existing,
        ...(input.name !== undefined && { name: input.name.trim() }),
        ...(input.description !== undefined && { description: input.description }),
        ...(input.severities !== undefined && { severities: [...new Set(input.severities)] }),
        ...(input.enabled !== undefined && { enabled: input.enabled }),
        ...(input.acknowledgeSuppresses !== undefined && { acknowledgeSuppresses: input.acknowledgeSuppresses }),
        ...(input.tiers !== undefined && { tiers: input.tiers }),
        version: existing.version + 1,
        updatedAt: this.clock.now(),
      }
      validatePolicy(updated)

      return this.policyRepository.update(existing, updated)
    })
  }

  async deletePolicy(id: string): Promise<void> {
    const existing = await this.getPolicy(id)
    await this.policyRepository.delete(existing)
    console.log(`[Escalation] Deleted policy ${existing.name} (${id})`)
  }
}
