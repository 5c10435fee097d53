/**
 * Alerting Configuration
 *
 * Read once from environment variables. Every value has a default so a bare
 * environment yields the documented behaviour.
 */

import { z } from "zod"
import { ALERT_SEVERITIES, type AlertSeverity } from "../../domain/alert/Alert"
import { DEFAULT_SLA_TARGETS, type SeverityTargets } from "../../domain/sla/Sla"
import { ValidationError } from "../errors"

export interface AlertingTables {
  alerts: string
  stateEntries: string
  slas: string
  groups: string
  policies: string
  schedules: string
  intents: string
}

export interface AlertingConfig {
  grouping: {
    windowMinutes: number
  }
  escalation: {
    tickIntervalSeconds: number
    acknowledgeSuppresses: boolean
    batchSize: number
    alertDeadlineMs: number
  }
  anomalyBridge: {
    minConfidence: number
    autoEscalate: boolean
  }
  sla: {
    severityTargets: SeverityTargets
    reportWindowDays: number
  }
  notifications: {
    webhookUrl: string | null
    timeoutMs: number
  }
  store: {
    requestTimeoutMs: number
    tables: AlertingTables
  }
}

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1")

const positiveInt = z.coerce.number().int().positive()

const targetsSchema = z.object({
  ttaMinutes: positiveInt,
  ttrMinutes: positiveInt,
})

const severityTargetsSchema = z
  .string()
  .transform((raw, ctx) => {
    try {
      const value: unknown = JSON.parse(raw)
      return value
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON object" })
      return z.NEVER
    }
  })
  .pipe(z.record(z.enum(ALERT_SEVERITIES), targetsSchema))

const envSchema = z.object({
  ALERTING_GROUPING_WINDOW_MINUTES: z.coerce.number().nonnegative().default(5),
  ALERTING_ESCALATION_TICK_INTERVAL_SECONDS: positiveInt.default(30),
  ALERTING_ESCALATION_ACKNOWLEDGE_SUPPRESSES: booleanFlag.default("true"),
  ALERTING_ESCALATION_BATCH_SIZE: positiveInt.default(100),
  ALERTING_ESCALATION_ALERT_DEADLINE_MS: positiveInt.default(5000),
  ALERTING_ANOMALY_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.7),
  ALERTING_ANOMALY_AUTO_ESCALATE: booleanFlag.default("true"),
  ALERTING_SLA_SEVERITY_TARGETS: severityTargetsSchema.optional(),
  ALERTING_SLA_REPORT_WINDOW_DAYS: positiveInt.default(30),
  ALERTING_NOTIFICATION_WEBHOOK_URL: z.string().url().optional(),
  ALERTING_NOTIFICATION_TIMEOUT_MS: positiveInt.default(5000),
  ALERTING_STORE_REQUEST_TIMEOUT_MS: positiveInt.default(3000),
  ALERTING_TABLE_ALERTS: z.string().min(1).default("alerts"),
  ALERTING_TABLE_STATE_ENTRIES: z.string().min(1).default("alert_state_entries"),
  ALERTING_TABLE_SLAS: z.string().min(1).default("alert_slas"),
  ALERTING_TABLE_GROUPS: z.string().min(1).default("alert_groups"),
  ALERTING_TABLE_POLICIES: z.string().min(1).default("escalation_policies"),
  ALERTING_TABLE_SCHEDULES: z.string().min(1).default("on_call_schedules"),
  ALERTING_TABLE_INTENTS: z.string().min(1).default("notification_intents"),
})

function mergeTargets(overrides: Partial<Record<AlertSeverity, { ttaMinutes: number; ttrMinutes: number }>> | undefined): SeverityTargets {
  const merged: SeverityTargets = { ...DEFAULT_SLA_TARGETS }
  for (const severity of ALERT_SEVERITIES) {
    const override = overrides?.[severity]
    if (override) {
      merged[severity] = override
    }
  }
  return merged
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AlertingConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const variable = issue.path.join(".")
    throw new ValidationError(`Invalid configuration ${variable}: ${issue.message}`, variable)
  }

  const vars = parsed.data
  return {
    grouping: {
      windowMinutes: vars.ALERTING_GROUPING_WINDOW_MINUTES,
    },
    escalation: {
      tickIntervalSeconds: vars.ALERTING_ESCALATION_TICK_INTERVAL_SECONDS,
      acknowledgeSuppresses: vars.ALERTING_ESCALATION_ACKNOWLEDGE_SUPPRESSES,
      batchSize: vars.ALERTING_ESCALATION_BATCH_SIZE,
      alertDeadlineMs: vars.ALERTING_ESCALATION_ALERT_DEADLINE_MS,
    },
    anomalyBridge: {
      minConfidence: vars.ALERTING_ANOMALY_MIN_CONFIDENCE,
      autoEscalate: vars.ALERTING_ANOMALY_AUTO_ESCALATE,
    },
    sla: {
      severityTargets: mergeTargets(vars.ALERTING_SLA_SEVERITY_TARGETS),
      reportWindowDays: vars.ALERTING_SLA_REPORT_WINDOW_DAYS,
    },
    notifications: {
      webhookUrl: vars.ALERTING_NOTIFICATION_WEBHOOK_URL ?? null,
      timeoutMs: vars.ALERTING_NOTIFICATION_TIMEOUT_MS,
    },
    store: {
      requestTimeoutMs: vars.ALERTING_STORE_REQUEST_TIMEOUT_MS,
      tables: {
        alerts: vars.ALERTING_TABLE_ALERTS,
        stateEntries: vars.ALERTING_TABLE_STATE_ENTRIES,
        slas: vars.ALERTING_TABLE_SLAS,
        groups: vars.ALERTING_TABLE_GROUPS,
        policies: vars.ALERTING_TABLE_POLICIES,
        schedules: vars.ALERTING_TABLE_SCHEDULES,
        intents: vars.ALERTING_TABLE_INTENTS,
      },
    },
  }
}

export const DEFAULT_TABLES: AlertingTables = loadConfig({}).store.tables
