/**
 * Escalation Policy Domain Entity
 *
 * Ordered notification tiers for alerts of the listed severities. Tier delays
 * are measured from alert creation, not from the previous tier.
 */

import type { AlertSeverity, EscalationTracking } from "../alert/Alert"
import type { NotificationChannel } from "../notification/Notification"
import { addMinutes } from "../../shared/time"

export interface EscalationTier {
  level: number
  delayMinutes: number
  channels: NotificationChannel[]
  recipients: string[]
}

export interface EscalationPolicy {
  id: string
  name: string
  description: string | null
  severities: AlertSeverity[]
  enabled: boolean
  // null defers to escalation.acknowledge_suppresses
  acknowledgeSuppresses: boolean | null
  tiers: EscalationTier[]
  version: number
  createdAt: Date
  updatedAt: Date
}

export interface CreateEscalationPolicyInput {
  name: string
  description?: string | null
  severities: AlertSeverity[]
  enabled?: boolean
  acknowledgeSuppresses?: boolean | null
  tiers: EscalationTier[]
}

export type UpdateEscalationPolicyInput = Partial<CreateEscalationPolicyInput>

/** Recipients written `oncall:<schedule name>` resolve through the on-call rotation. */
export const ON_CALL_RECIPIENT_PREFIX = "oncall:"

/**
 * The alphabetically first enabled policy covering the severity.
 */
export function selectPolicy(
  policies: EscalationPolicy[],
  severity: AlertSeverity
): EscalationPolicy | null {
  const candidates = policies
    .filter((p) => p.enabled && p.severities.includes(severity))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  return candidates[0] ?? null
}

/**
 * When the tier after `currentTier` becomes due, or null once every tier ran.
 */
export function nextTierDueAt(
  policy: EscalationPolicy,
  currentTier: number,
  createdAt: Date
): Date | null {
  const next = policy.tiers[currentTier]
  return next ? addMinutes(createdAt, next.delayMinutes) : null
}

export function initialEscalation(policy: EscalationPolicy | null, createdAt: Date): EscalationTracking {
  return {
    tier: 0,
    policyId: policy?.id ?? null,
    nextEscalationAt: policy ? nextTierDueAt(policy, 0, createdAt) : null,
    lastEscalatedAt: null,
  }
}

export interface EscalationPolicyRepository {
  findById(id: string): Promise<EscalationPolicy | null>
  findByName(name: string): Promise<EscalationPolicy | null>
  findAll(): Promise<EscalationPolicy[]>
  /** ConflictError when the name is taken. */
  create(policy: EscalationPolicy): Promise<EscalationPolicy>
  /** ConflictError when a rename collides or `previous.version` is stale. */
  update(previous: EscalationPolicy, updated: EscalationPolicy): Promise<EscalationPolicy>
  delete(policy: EscalationPolicy): Promise<void>
}
