/**
 * DynamoDB Escalation Policy Repository Implementation
 */

import type { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import type { EscalationPolicy, EscalationPolicyRepository } from "../../../domain/escalation/EscalationPolicy"
import { DEFAULT_TABLES, type AlertingTables } from "../../../shared/config"
import { NamedItemTable } from "./NamedItemTable"
import {
  POLICY_SK,
  mapItemToPolicy,
  mapPolicyNameGuardToItem,
  mapPolicyToItem,
  policyKey,
  policyNameKey,
} from "../items/policyItems"

export class DynamoDBEscalationPolicyRepository implements EscalationPolicyRepository {
  private table: NamedItemTable<EscalationPolicy>

  constructor(client: DynamoDBDocumentClient, tables: AlertingTables = DEFAULT_TABLES) {
    this.table = new NamedItemTable(client, tables.policies, {
      label: "Escalation policy",
      key: policyKey,
      nameKey: policyNameKey,
      nameGuardAttribute: "policy_id",
      sortKey: POLICY_SK,
      toItem: mapPolicyToItem,
      toGuardItem: mapPolicyNameGuardToItem,
      fromItem: mapItemToPolicy,
    })
  }

  findById(id: string): Promise<EscalationPolicy | null> {
    return this.table.findById(id)
  }

  findByName(name: string): Promise<EscalationPolicy | null> {
    return this.table.findByName(name)
  }

  findAll(): Promise<EscalationPolicy[]> {
    return this.table.findAll()
  }

  create(policy: EscalationPolicy): Promise<EscalationPolicy> {
    return this.table.create(policy)
  }

  update(previous: EscalationPolicy, updated: EscalationPolicy): Promise<EscalationPolicy> {
    return this.table.update(previous, updated)
  }

  delete(policy: EscalationPolicy): Promise<void> {
    return this.table.delete(policy)
  }
}
