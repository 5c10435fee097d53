/**
 * Escalation Policies API Handler
 *
 * GET    /escalation/policies
 * POST   /escalation/policies
 * PATCH  /escalation/policies/{id}
 * DELETE /escalation/policies/{id}
 */

import { z } from "zod"
import { ALERT_SEVERITIES } from "../../../domain/alert/Alert"
import { NOTIFICATION_CHANNELS } from "../../../domain/notification/Notification"
import type { EscalationTier } from "../../../domain/escalation/EscalationPolicy"
import { getContainer } from "../../container"
import { authorize, jsonResponse, noContent, parseBody, parseQuery, pathParam, route } from "../http"
import { presentPolicy } from "../presenters"

const tierSchema = z.object({
  level: z.number().int(),
  delay_minutes: z.number().int().nonnegative(),
  channels: z.array(z.enum(NOTIFICATION_CHANNELS)).min(1),
  recipients: z.array(z.string().trim().min(1)).min(1),
})

const createPolicySchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().nullish(),
  severities: z.array(z.enum(ALERT_SEVERITIES)).min(1),
  enabled: z.boolean().optional(),
  acknowledge_suppresses: z.boolean().nullish(),
  tiers: z.array(tierSchema).min(1),
})

const updatePolicySchema = createPolicySchema.partial()

const listPoliciesSchema = z.object({
  enabled_only: z.enum(["true", "false"]).optional(),
})

function toTiers(tiers: z.infer<typeof tierSchema>[]): EscalationTier[] {
  return tiers.map((tier) => ({
    level: tier.level,
    delayMinutes: tier.delay_minutes,
    channels: tier.channels,
    recipients: tier.recipients,
  }))
}

export const listPoliciesHandler = route("EscalationAPI", async (event) => {
  authorize(event, "escalation_policies", "read")
  const query = parseQuery(event, listPoliciesSchema)

  const policies = await getContainer().policies.listPolicies(query.enabled_only === "true")
  return jsonResponse(200, { policies: policies.map(presentPolicy) })
})

export const createPolicyHandler = route("EscalationAPI", async (event) => {
  authorize(event, "escalation_policies", "create")
  const body = parseBody(event, createPolicySchema)

  const policy = await getContainer().policies.createPolicy({
    name: body.name,
    description: body.description,
    severities: body.severities,
    enabled: body.enabled,
    acknowledgeSuppresses: body.acknowledge_suppresses,
    tiers: toTiers(body.tiers),
  })
  return jsonResponse(201, { policy: presentPolicy(policy) })
})

export const updatePolicyHandler = route("EscalationAPI", async (event) => {
  authorize(event, "escalation_policies", "update")
  const body = parseBody(event, updatePolicySchema)

  const policy = await getContainer().policies.updatePolicy(pathParam(event, "id"), {
    name: body.name,
    description: body.description,
    severities: body.severities,
    enabled: body.enabled,
    acknowledgeSuppresses: body.acknowledge_suppresses,
    tiers: body.tiers ? toTiers(body.tiers) : undefined,
  })
  return jsonResponse(200, { policy: presentPolicy(policy) })
})

export const deletePolicyHandler = route("EscalationAPI", async (event) => {
  authorize(event, "escalation_policies", "delete")
  await getContainer().policies.deletePolicy(pathParam(event, "id"))
  return noContent()
})
