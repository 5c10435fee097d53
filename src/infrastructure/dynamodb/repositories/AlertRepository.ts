/**
 * DynamoDB Alert Repository Implementation
 *
 * Owns the alert lifecycle writes. Alert creation writes the alert, its
 * initial history entry, its SLA row and its group linkage in a single
 * TransactWriteItems call; every later history append is conditional on the
 * alert version read by the caller, which serializes writers per alert.
 */

import {
  BatchWriteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  QueryCommand,
  TransactWriteCommand,
  UpdateCommand,
  type QueryCommandInput,
  type TransactWriteCommandInput,
} from "@aws-sdk/lib-dynamodb"
import type {
  Alert,
  AlertFilter,
  AlertPage,
  AlertRepository,
  AlertStateChange,
  AlertStateEntry,
  GroupLinkage,
  NewAlertRecord,
} from "../../../domain/alert/Alert"
import { NotFoundError, ValidationError } from "../../../shared/errors"
import { DEFAULT_TABLES, type AlertingTables } from "../../../shared/config"
import { executeStoreOperation } from "../storeErrors"
import { SORT_KEY_MAX, decodeCursor, encodeCursor, type Item } from "../attributes"
import {
  ALL_ALERTS_PARTITION,
  CREATED_INDEX,
  DEVICE_CREATED_INDEX,
  ESCALATION_DUE_INDEX,
  ESCALATION_PENDING_PARTITION,
  alertKey,
  alertPk,
  escalationUpdateClauses,
  mapAlertToItem,
  mapItemToAlert,
  mapItemToStateEntry,
  mapStateEntryToItem,
  updateExpression,
} from "../items/alertItems"
import { mapSlaToItem, slaKey } from "../items/slaItems"
import { groupKey, mapActiveGuardToItem, mapGroupToItem } from "../items/groupItems"
import { ALERT_INTENT_INDEX, mapIntentToItem } from "../items/intentItems"

type TransactItems = NonNullable<TransactWriteCommandInput["TransactItems"]>

// BatchWriteItem accepts up to 25 requests per call
const BATCH_WRITE_LIMIT = 25
const MAX_UNPROCESSED_RETRIES = 3

interface DeleteRequest {
  DeleteRequest: { Key: Item }
}

export class DynamoDBAlertRepository implements AlertRepository {
  private client: DynamoDBDocumentClient
  private tables: AlertingTables

  constructor(client: DynamoDBDocumentClient, tables: AlertingTables = DEFAULT_TABLES) {
    this.client = client
    this.tables = tables
  }

  async findById(id: string): Promise<Alert | null> {
    const response = await executeStoreOperation("alerts.findById", () =>
      this.client.send(
        new GetCommand({
          TableName: this.tables.alerts,
          Key: alertKey(id),
          ConsistentRead: true,
        })
      )
    )

    if (!response.Item) {
      return null
    }

    return mapItemToAlert(response.Item)
  }

  async findHistory(alertId: string): Promise<AlertStateEntry[]> {
    const items = await this.queryAll("alerts.findHistory", {
      TableName: this.tables.stateEntries,
      KeyConditionExpression: "PK = :pk AND begins_with(SK, :prefix)",
      ExpressionAttributeValues: {
        ":pk": alertPk(alertId),
        ":prefix": "STATE#",
      },
      ConsistentRead: true,
    })

    return items.map((item) => mapItemToStateEntry(item))
  }

  async findLatestEntry(alertId: string): Promise<AlertStateEntry | null> {
    const response = await executeStoreOperation("alerts.findLatestEntry", () =>
      this.client.send(
        new QueryCommand({
          TableName: this.tables.stateEntries,
          KeyConditionExpression: "PK = :pk AND begins_with(SK, :prefix)",
          ExpressionAttributeValues: {
            ":pk": alertPk(alertId),
            ":prefix": "STATE#",
          },
          ScanIndexForward: false, // DESC order (latest first)
          Limit: 1,
          ConsistentRead: true,
        })
      )
    )

    const item = response.Items?.[0]
    return item ? mapItemToStateEntry(item) : null
  }

  async list(filter: AlertFilter): Promise<AlertPage> {
    const useDeviceIndex = Boolean(filter.deviceId)
    const partitionKey = useDeviceIndex ? "GSI2PK" : "GSI1PK"
    const sortKey = useDeviceIndex ? "GSI2SK" : "GSI1SK"

    const values: Item = {
      ":pk": useDeviceIndex ? `DEVICE#${filter.deviceId}` : ALL_ALERTS_PARTITION,
      ":from": filter.from ? filter.from.toISOString() : "0000",
      ":to": `${(filter.to ?? new Date("9999-12-31T23:59:59.999Z")).toISOString()}#${SORT_KEY_MAX}`,
    }
    const names: Record<string, string> = {}
    const filters: string[] = []

    if (filter.severity) {
      filters.push("severity = :severity")
      values[":severity"] = filter.severity
    }
    if (filter.state) {
      filters.push("current_state = :state")
      values[":state"] = filter.state
    }
    if (filter.ruleId) {
      filters.push("rule_id = :ruleId")
      values[":ruleId"] = filter.ruleId
    }
    if (filter.source) {
      filters.push("#payload.#source = :source")
      names["#payload"] = "payload"
      names["#source"] = "source"
      values[":source"] = filter.source
    }

    const alerts: Alert[] = []
    let startKey = filter.cursor ? this.startKeyFrom(filter.cursor) : undefined

    do {
      const response = await executeStoreOperation("alerts.list", () =>
        this.client.send(
          new QueryCommand({
            TableName: this.tables.alerts,
            IndexName: useDeviceIndex ? DEVICE_CREATED_INDEX : CREATED_INDEX,
            KeyConditionExpression: `${partitionKey} = :pk AND ${sortKey} BETWEEN :from AND :to`,
            ExpressionAttributeValues: values,
            ...(Object.keys(names).length > 0 && { ExpressionAttributeNames: names }),
            ...(filters.length > 0 && { FilterExpression: filters.join(" AND ") }),
            ScanIndexForward: false, // newest first
            Limit: filter.limit,
            ExclusiveStartKey: startKey,
          })
        )
      )

      for (const item of response.Items ?? []) {
        alerts.push(mapItemToAlert(item))
        if (alerts.length === filter.limit) {
          return {
            alerts,
            nextCursor: encodeCursor({
              PK: item.PK,
              SK: item.SK,
              [partitionKey]: item[partitionKey],
              [sortKey]: item[sortKey],
            }),
          }
        }
      }

      startKey = response.LastEvaluatedKey
    } while (startKey)

    return { alerts, nextCursor: null }
  }

  async create(record: NewAlertRecord): Promise<void> {
    const { alert, initialEntry, sla, linkage } = record

    const transactItems: TransactItems = [
      {
        Put: {
          TableName: this.tables.alerts,
          Item: mapAlertToItem(alert),
          ConditionExpression: "attribute_not_exists(PK)",
        },
      },
      {
        Put: {
          TableName: this.tables.stateEntries,
          Item: mapStateEntryToItem(initialEntry),
          ConditionExpression: "attribute_not_exists(PK)",
        },
      },
      {
        Put: {
          TableName: this.tables.slas,
          Item: mapSlaToItem(sla),
          ConditionExpression: "attribute_not_exists(PK)",
        },
      },
      ...this.groupWrites(linkage),
    ]

    await executeStoreOperation("alerts.create", () =>
      this.client.send(new TransactWriteCommand({ TransactItems: transactItems }))
    )
  }

  async appendEntry(change: AlertStateChange): Promise<Alert> {
    const escalation = escalationUpdateClauses(change.alertId, change.escalation)
    const set = [
      "current_state = :state",
      "state_changed_at = :changedAt",
      "version = :nextVersion",
      ...escalation.set,
    ]

    const transactItems: TransactItems = [
      {
        Update: {
          TableName: this.tables.alerts,
          Key: alertKey(change.alertId),
          UpdateExpression: updateExpression(set, escalation.remove),
          ConditionExpression: "version = :expectedVersion",
          ExpressionAttributeValues: {
            ":state": change.currentState,
            ":changedAt": change.entry.createdAt.toISOString(),
            ":nextVersion": change.expectedVersion + 1,
            ":expectedVersion": change.expectedVersion,
            ...escalation.values,
          },
        },
      },
      {
        Put: {
          TableName: this.tables.stateEntries,
          Item: mapStateEntryToItem(change.entry),
          ConditionExpression: "attribute_not_exists(PK)",
        },
      },
      ...(change.intents ?? []).map((intent) => ({
        Put: {
          TableName: this.tables.intents,
          Item: mapIntentToItem(intent),
          ConditionExpression: "attribute_not_exists(PK)",
        },
      })),
    ]

    await executeStoreOperation("alerts.appendEntry", () =>
      this.client.send(new TransactWriteCommand({ TransactItems: transactItems }))
    )

    const updated = await this.findById(change.alertId)
    if (!updated) {
      throw new NotFoundError("Alert")
    }
    return updated
  }

  async reschedule(alertId: string, nextEscalationAt: Date | null, expectedVersion: number): Promise<Alert> {
    const set: string[] = []
    const remove: string[] = []
    const values: Item = { ":expectedVersion": expectedVersion }

    if (nextEscalationAt) {
      set.push("ESC_PK = :escPk", "ESC_SK = :escSk", "next_escalation_at = :nextAt")
      values[":escPk"] = ESCALATION_PENDING_PARTITION
      values[":escSk"] = `${nextEscalationAt.toISOString()}#${alertId}`
      values[":nextAt"] = nextEscalationAt.toISOString()
    } else {
      remove.push("ESC_PK", "ESC_SK", "next_escalation_at")
    }

    const response = await executeStoreOperation("alerts.reschedule", () =>
      this.client.send(
        new UpdateCommand({
          TableName: this.tables.alerts,
          Key: alertKey(alertId),
          UpdateExpression: updateExpression(set, remove),
          ConditionExpression: "version = :expectedVersion",
          ExpressionAttributeValues: values,
          ReturnValues: "ALL_NEW",
        })
      )
    )

    if (!response.Attributes) {
      throw new NotFoundError("Alert")
    }
    return mapItemToAlert(response.Attributes)
  }

  async findDueForEscalation(now: Date, limit: number): Promise<Alert[]> {
    const response = await executeStoreOperation("alerts.findDueForEscalation", () =>
      this.client.send(
        new QueryCommand({
          TableName: this.tables.alerts,
          IndexName: ESCALATION_DUE_INDEX,
          KeyConditionExpression: "ESC_PK = :pk AND ESC_SK <= :upper",
          ExpressionAttributeValues: {
            ":pk": ESCALATION_PENDING_PARTITION,
            ":upper": `${now.toISOString()}#${SORT_KEY_MAX}`,
          },
          ScanIndexForward: true, // longest overdue first
          Limit: limit,
        })
      )
    )

    return (response.Items ?? []).map((item) => mapItemToAlert(item))
  }

  /**
   * The alert, its SLA row and its group count go first, conditional on the
   * version read, so a concurrent append either lands before (and the delete
   * retries) or fails against the missing alert. History and intents are
   * removed afterwards; until then they hang off an alert that no longer
   * exists and are unreachable.
   */
  async delete(id: string): Promise<void> {
    const alert = await this.findById(id)
    if (!alert) {
      throw new NotFoundError("Alert")
    }

    const transactItems: TransactItems = [
      {
        Delete: {
          TableName: this.tables.alerts,
          Key: alertKey(id),
          ConditionExpression: "version = :expectedVersion",
          ExpressionAttributeValues: { ":expectedVersion": alert.version },
        },
      },
      { Delete: { TableName: this.tables.slas, Key: slaKey(id) } },
    ]

    if (alert.groupId) {
      const group = await executeStoreOperation("alerts.delete.group", () =>
        this.client.send(new GetCommand({ TableName: this.tables.groups, Key: groupKey(alert.groupId ?? "") }))
      )
      if (group.Item) {
        transactItems.push({
          Update: {
            TableName: this.tables.groups,
            Key: groupKey(alert.groupId),
            UpdateExpression: "ADD occurrence_count :minusOne",
            ConditionExpression: "attribute_exists(PK)",
            ExpressionAttributeValues: { ":minusOne": -1 },
          },
        })
      }
    }

    await executeStoreOperation("alerts.delete", () =>
      this.client.send(new TransactWriteCommand({ TransactItems: transactItems }))
    )

    const historyKeys = await this.queryAll("alerts.delete.history", {
      TableName: this.tables.stateEntries,
      KeyConditionExpression: "PK = :pk AND begins_with(SK, :prefix)",
      ExpressionAttributeValues: { ":pk": alertPk(id), ":prefix": "STATE#" },
      ProjectionExpression: "PK, SK",
    })
    const intentKeys = await this.queryAll("alerts.delete.intents", {
      TableName: this.tables.intents,
      IndexName: ALERT_INTENT_INDEX,
      KeyConditionExpression: "GSI1PK = :pk",
      ExpressionAttributeValues: { ":pk": alertPk(id) },
      ProjectionExpression: "PK, SK",
    })

    await this.batchDelete(this.tables.stateEntries, historyKeys)
    await this.batchDelete(this.tables.intents, intentKeys)
  }

  private groupWrites(linkage: GroupLinkage): TransactItems {
    const { group } = linkage

    if (linkage.kind === "absorb") {
      const lastOccurrence = group.lastOccurrence.toISOString()
      return [
        {
          Update: {
            TableName: this.tables.groups,
            Key: groupKey(group.id),
            UpdateExpression:
              "SET occurrence_count = :count, first_occurrence = :first, last_occurrence = :last, " +
              "updated_at = :updatedAt, GSI1SK = :sortKey, GSI2SK = :sortKey",
            ConditionExpression: "#status = :active AND occurrence_count = :previousCount",
            ExpressionAttributeNames: { "#status": "status" },
            ExpressionAttributeValues: {
              ":count": group.occurrenceCount,
              ":first": group.firstOccurrence.toISOString(),
              ":last": lastOccurrence,
              ":updatedAt": group.updatedAt.toISOString(),
              ":sortKey": `${lastOccurrence}#${group.id}`,
              ":active": "active",
              ":previousCount": linkage.previousCount,
            },
          },
        },
      ]
    }

    const writes: TransactItems = [
      {
        Put: {
          TableName: this.tables.groups,
          Item: mapGroupToItem(group),
          ConditionExpression: "attribute_not_exists(PK)",
        },
      },
    ]

    const stale = linkage.supersedes
    if (!stale) {
      writes.push({
        Put: {
          TableName: this.tables.groups,
          Item: mapActiveGuardToItem(group),
          ConditionExpression: "attribute_not_exists(PK)",
        },
      })
      return writes
    }

    writes.push(
      {
        Update: {
          TableName: this.tables.groups,
          Key: groupKey(stale.id),
          UpdateExpression:
            "SET #status = :closed, closed_at = :closedAt, updated_at = :closedAt, GSI1PK = :closedPartition",
          ConditionExpression: "#status = :active AND occurrence_count = :count",
          ExpressionAttributeNames: { "#status": "status" },
          ExpressionAttributeValues: {
            ":closed": "closed",
            ":closedAt": group.createdAt.toISOString(),
            ":closedPartition": "STATUS#closed",
            ":active": "active",
            ":count": stale.occurrenceCount,
          },
        },
      },
      {
        Put: {
          TableName: this.tables.groups,
          Item: mapActiveGuardToItem(group),
          ConditionExpression: "group_id = :staleGroupId",
          ExpressionAttributeValues: { ":staleGroupId": stale.id },
        },
      }
    )
    return writes
  }

  private startKeyFrom(cursor: string): Item {
    const key = decodeCursor(cursor)
    if (!key) {
      throw new ValidationError("cursor is invalid", "cursor")
    }
    return key
  }

  private async queryAll(operation: string, input: QueryCommandInput): Promise<Item[]> {
    const items: Item[] = []
    let startKey: Item | undefined

    do {
      const response = await executeStoreOperation(operation, () =>
        this.client.send(new QueryCommand({ ...input, ExclusiveStartKey: startKey }))
      )
      items.push(...(response.Items ?? []))
      startKey = response.LastEvaluatedKey
    } while (startKey)

    return items
  }

  private async batchDelete(tableName: string, keys: Item[]): Promise<void> {
    for (let i = 0; i < keys.length; i += BATCH_WRITE_LIMIT) {
      let requests: DeleteRequest[] = keys
        .slice(i, i + BATCH_WRITE_LIMIT)
        .map((key) => ({ DeleteRequest: { Key: { PK: key.PK, SK: key.SK } } }))

      for (let attempt = 0; requests.length > 0; attempt++) {
        if (attempt > MAX_UNPROCESSED_RETRIES) {
          throw new Error(`BatchWrite left ${requests.length} unprocessed deletes on ${tableName}`)
        }
        const response = await executeStoreOperation("alerts.batchDelete", () =>
          this.client.send(new BatchWriteCommand({ RequestItems: { [tableName]: requests } }))
        )
        requests = (response.UnprocessedItems?.[tableName] ?? []).flatMap((request): DeleteRequest[] =>
          request.DeleteRequest?.Key ? [{ DeleteRequest: { Key: request.DeleteRequest.Key } }] : []
        )
      }
    }
  }
}
