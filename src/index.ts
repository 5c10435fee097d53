/**
 * Package entry: the composition root plus every Lambda handler, so a
 * deployment can point each function at `dist/index.<name>`.
 */

export { buildContainer, createDynamoDBPorts, getContainer, setContainer } from "./interfaces/container"
export type { AlertingContainer, AlertingPorts } from "./interfaces/container"
export { loadConfig } from "./shared/config"
export type { AlertingConfig } from "./shared/config"

export {
  addNoteHandler,
  createAlertHandler,
  deleteAlertHandler,
  escalateAlertHandler,
  getAlertHandler,
  getEscalationStatusHandler,
  listAlertsHandler,
  listIntentsHandler,
  transitionAlertHandler,
} from "./interfaces/api/alerts/alertsHandler"
export {
  closeGroupHandler,
  getGroupHandler,
  groupStatsHandler,
  listGroupsHandler,
  overallGroupStatsHandler,
  updateGroupMetadataHandler,
} from "./interfaces/api/groups/groupsHandler"
export { alertSlaHandler, slaBreachesHandler, slaReportHandler } from "./interfaces/api/sla/slaHandler"
export {
  addOverrideHandler,
  createScheduleHandler,
  currentOnCallHandler,
  listSchedulesHandler,
  onCallAtHandler,
  updateScheduleHandler,
} from "./interfaces/api/oncall/onCallHandler"
export {
  createPolicyHandler,
  deletePolicyHandler,
  listPoliciesHandler,
  updatePolicyHandler,
} from "./interfaces/api/escalation/escalationPoliciesHandler"
export { healthHandler } from "./interfaces/api/health/healthHandler"
export { handler as escalationTickHandler } from "./interfaces/events/escalation-tick/escalationTickHandler"
export { handler as anomalyDetectionsHandler } from "./interfaces/events/anomaly-detections/anomalyDetectionsHandler"
export { handler as notificationAcksHandler } from "./interfaces/events/notification-acks/notificationAcksHandler"
