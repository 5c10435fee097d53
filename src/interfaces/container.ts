/**
 * Composition root
 *
 * Wires services over a set of repository ports. Lambda handlers use the
 * DynamoDB-backed default container, built once per runtime on first use.
 */

import type { AlertRepository } from "../domain/alert/Alert"
import type { SlaRepository } from "../domain/sla/Sla"
import type { AlertGroupRepository } from "../domain/group/AlertGroup"
import type { EscalationPolicyRepository } from "../domain/escalation/EscalationPolicy"
import type { OnCallScheduleRepository } from "../domain/oncall/OnCallSchedule"
import type { NotificationDispatcher, NotificationIntentRepository } from "../domain/notification/Notification"
import { loadConfig, type AlertingConfig } from "../shared/config"
import { systemClock, type Clock } from "../shared/clock"
import { uuidGenerator, type IdGenerator } from "../shared/ids"
import { TransitionEventBus } from "../application/alert/TransitionEventBus"
import { AlertStateMachine } from "../application/alert/AlertStateMachine"
import { AlertService } from "../application/alert/AlertService"
import { SlaTrackerService } from "../application/sla/SlaTrackerService"
import { GroupingService } from "../application/grouping/GroupingService"
import { OnCallService } from "../application/oncall/OnCallService"
import { EscalationPolicyService } from "../application/escalation/EscalationPolicyService"
import { EscalationService } from "../application/escalation/EscalationService"
import { EscalationDriver } from "../application/escalation/EscalationDriver"
import { NotificationService } from "../application/notification/NotificationService"
import { AnomalyBridgeService } from "../application/anomaly/AnomalyBridgeService"
import { HealthService, type StoreProbe } from "../application/health/HealthService"
import { createDocumentClient } from "../infrastructure/dynamodb/client"
import { DynamoDBAlertRepository } from "../infrastructure/dynamodb/repositories/AlertRepository"
import { DynamoDBSlaRepository } from "../infrastructure/dynamodb/repositories/SlaRepository"
import { DynamoDBAlertGroupRepository } from "../infrastructure/dynamodb/repositories/AlertGroupRepository"
import { DynamoDBEscalationPolicyRepository } from "../infrastructure/dynamodb/repositories/EscalationPolicyRepository"
import { DynamoDBOnCallScheduleRepository } from "../infrastructure/dynamodb/repositories/OnCallScheduleRepository"
import { DynamoDBNotificationIntentRepository } from "../infrastructure/dynamodb/repositories/NotificationIntentRepository"
import { DynamoDBStoreProbe } from "../infrastructure/dynamodb/DynamoDBStoreProbe"
import { WebhookNotificationDispatcher } from "../infrastructure/notifications/WebhookNotificationDispatcher"
import { LoggingNotificationDispatcher } from "../infrastructure/notifications/LoggingNotificationDispatcher"

export interface AlertingPorts {
  alerts: AlertRepository
  slas: SlaRepository
  groups: AlertGroupRepository
  policies: EscalationPolicyRepository
  schedules: OnCallScheduleRepository
  intents: NotificationIntentRepository
  dispatcher: NotificationDispatcher
  probe: StoreProbe
  clock?: Clock
  newId?: IdGenerator
}

export interface AlertingContainer {
  config: AlertingConfig
  events: TransitionEventBus
  alerts: AlertService
  stateMachine: AlertStateMachine
  sla: SlaTrackerService
  grouping: GroupingService
  onCall: OnCallService
  policies: EscalationPolicyService
  escalation: EscalationService
  driver: EscalationDriver
  notifications: NotificationService
  anomalyBridge: AnomalyBridgeService
  health: HealthService
}

export function buildContainer(config: AlertingConfig, ports: AlertingPorts): AlertingContainer {
  const clock = ports.clock ?? systemClock
  const newId = ports.newId ?? uuidGenerator

  const events = new TransitionEventBus()
  const stateMachine = new AlertStateMachine(ports.alerts, events, clock)
  const sla = new SlaTrackerService(ports.slas, clock, config.sla)
  const grouping = new GroupingService(ports.groups, clock, newId, config.grouping)
  const onCall = new OnCallService(ports.schedules, clock, newId)
  const policies = new EscalationPolicyService(ports.policies, clock, newId)
  const escalation = new EscalationService(
    ports.alerts,
    ports.policies,
    ports.intents,
    onCall,
    ports.dispatcher,
    clock,
    newId,
    { acknowledgeSuppresses: config.escalation.acknowledgeSuppresses }
  )
  const alerts = new AlertService(ports.alerts, ports.groups, stateMachine, grouping, sla, policies, clock, newId)

  // SLA first: it only records, escalation may write
  events.subscribe("sla", (event) => sla.handleTransition(event))
  events.subscribe("escalation", (event) => escalation.handleTransition(event))

  return {
    config,
    events,
    alerts,
    stateMachine,
    sla,
    grouping,
    onCall,
    policies,
    escalation,
    driver: new EscalationDriver(ports.alerts, escalation, clock, config.escalation),
    notifications: new NotificationService(ports.intents, ports.alerts, clock),
    anomalyBridge: new AnomalyBridgeService(alerts, escalation, config.anomalyBridge),
    health: new HealthService(ports.probe, config),
  }
}

export function createDynamoDBPorts(config: AlertingConfig): AlertingPorts {
  const client = createDocumentClient(config)
  const tables = config.store.tables
  const webhookUrl = config.notifications.webhookUrl

  return {
    alerts: new DynamoDBAlertRepository(client, tables),
    slas: new DynamoDBSlaRepository(client, tables),
    groups: new DynamoDBAlertGroupRepository(client, tables),
    policies: new DynamoDBEscalationPolicyRepository(client, tables),
    schedules: new DynamoDBOnCallScheduleRepository(client, tables),
    intents: new DynamoDBNotificationIntentRepository(client, tables),
    dispatcher: webhookUrl
      ? new WebhookNotificationDispatcher({ url: webhookUrl, timeoutMs: config.notifications.timeoutMs })
      : new LoggingNotificationDispatcher(),
    probe: new DynamoDBStoreProbe(client, tables),
  }
}

let defaultContainer: AlertingContainer | null = null

export function getContainer(): AlertingContainer {
  if (!defaultContainer) {
    const config = loadConfig()
    defaultContainer = buildContainer(config, createDynamoDBPorts(config))
  }
  return defaultContainer
}

/** Replaces the default container; tests install one over in-memory ports. */
export function setContainer(container: AlertingContainer | null): void {
  defaultContainer = container
}
