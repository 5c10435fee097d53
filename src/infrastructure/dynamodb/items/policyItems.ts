/**
 * escalation_policies: PK POLICY#<id>, SK METADATA
 * Name guard:          PK POLICYNAME#<name>, SK NAME, policy_id
 */

import type { EscalationPolicy, EscalationTier } from "../../../domain/escalation/EscalationPolicy"
import { isAlertSeverity, type AlertSeverity } from "../../../domain/alert/Alert"
import { NOTIFICATION_CHANNELS, type NotificationChannel } from "../../../domain/notification/Notification"
import { InternalError } from "../../../shared/errors"
import {
  type Item,
  readBoolean,
  readDate,
  readItemArray,
  readNumber,
  readOptionalBoolean,
  readOptionalString,
  readString,
  readStringArray,
} from "../attributes"

export const POLICY_SK = "METADATA"
export const NAME_GUARD_SK = "NAME"

export function policyKey(policyId: string): Item {
  return { PK: `POLICY#${policyId}`, SK: POLICY_SK }
}

export function policyNameKey(name: string): Item {
  return { PK: `POLICYNAME#${name}`, SK: NAME_GUARD_SK }
}

function isChannel(value: string): value is NotificationChannel {
  return NOTIFICATION_CHANNELS.some((channel) => channel === value)
}

export function mapPolicyToItem(policy: EscalationPolicy): Item {
  return {
    ...policyKey(policy.id),
    id: policy.id,
    name: policy.name,
    description: policy.description,
    severities: policy.severities,
    enabled: policy.enabled,
    acknowledge_suppresses: policy.acknowledgeSuppresses,
    tiers: policy.tiers.map((tier) => ({
      level: tier.level,
      delay_minutes: tier.delayMinutes,
      channels: tier.channels,
      recipients: tier.recipients,
    })),
    version: policy.version,
    created_at: policy.createdAt.toISOString(),
    updated_at: policy.updatedAt.toISOString(),
  }
}

export function mapPolicyNameGuardToItem(policy: EscalationPolicy): Item {
  return { ...policyNameKey(policy.name), policy_id: policy.id }
}

function mapItemToTier(item: Item): EscalationTier {
  const channels = readStringArray(item, "channels")
  return {
    level: readNumber(item, "level"),
    delayMinutes: readNumber(item, "delay_minutes"),
    channels: channels.filter(isChannel),
    recipients: readStringArray(item, "recipients"),
  }
}

export function mapItemToPolicy(item: Item): EscalationPolicy {
  const severities: AlertSeverity[] = []
  for (const severity of readStringArray(item, "severities")) {
    if (!isAlertSeverity(severity)) {
      throw new InternalError(`Malformed escalation policy ${String(item.PK)}`)
    }
    severities.push(severity)
  }

  return {
    id: readString(item, "id"),
    name: readString(item, "name"),
    description: readOptionalString(item, "description"),
    severities,
    enabled: readBoolean(item, "enabled"),
    acknowledgeSuppresses: readOptionalBoolean(item, "acknowledge_suppresses"),
    tiers: readItemArray(item, "tiers").map((tier) => mapItemToTier(tier)),
    version: readNumber(item, "version"),
    createdAt: readDate(item, "created_at"),
    updatedAt: readDate(item, "updated_at"),
  }
}
