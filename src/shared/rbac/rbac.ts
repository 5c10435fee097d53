/**
 * Role-Based Access Control (RBAC)
 */

import type { Role } from "../types"
import { AuthorizationError } from "../errors"

export type Resource =
  | "alerts"
  | "alert_recovery"
  | "alert_groups"
  | "sla"
  | "on_call"
  | "escalation_policies"
  | "notifications"

export interface Permission {
  resource: Resource
  action: "create" | "read" | "update" | "delete"
}

const READ_ALL: Permission[] = [
  { resource: "alerts", action: "read" },
  { resource: "alert_groups", action: "read" },
  { resource: "sla", action: "read" },
  { resource: "on_call", action: "read" },
  { resource: "escalation_policies", action: "read" },
]

const ROLE_PERMISSIONS: Record<Role, Permission[]> = {
  ADMIN: [
    ...READ_ALL,
    { resource: "alerts", action: "create" },
    { resource: "alerts", action: "update" },
    { resource: "alerts", action: "delete" },
    { resource: "alert_recovery", action: "update" },
    { resource: "alert_groups", action: "update" },
    { resource: "on_call", action: "create" },
    { resource: "on_call", action: "update" },
    { resource: "on_call", action: "delete" },
    { resource: "escalation_policies", action: "create" },
    { resource: "escalation_policies", action: "update" },
    { resource: "escalation_policies", action: "delete" },
    { resource: "notifications", action: "update" },
  ],
  OPERATOR: [
    ...READ_ALL,
    { resource: "alerts", action: "create" },
    { resource: "alerts", action: "update" },
    { resource: "alert_groups", action: "update" },
  ],
  VIEWER: [...READ_ALL],
  SYSTEM: [
    ...READ_ALL,
    { resource: "alerts", action: "create" },
    { resource: "alerts", action: "update" },
    { resource: "notifications", action: "update" },
  ],
}

export function hasPermission(
  role: Role,
  resource: Resource,
  action: Permission["action"]
): boolean {
  const permissions = ROLE_PERMISSIONS[role] || []
  return permissions.some(
    (p) => p.resource === resource && p.action === action
  )
}

export function requirePermission(
  role: Role,
  resource: Resource,
  action: Permission["action"]
): void {
  if (!hasPermission(role, resource, action)) {
    throw new AuthorizationError(
      `Role ${role} does not have permission to ${action} ${resource}`
    )
  }
}
