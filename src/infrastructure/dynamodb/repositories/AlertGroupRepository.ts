/**
 * DynamoDB Alert Group Repository Implementation
 *
 * Group creation and absorption happen inside the alert creation
 * transaction. This repository resolves the active group for a key through
 * its guard item and handles closure, metadata and deletion.
 */

import {
  DynamoDBDocumentClient,
  GetCommand,
  QueryCommand,
  ScanCommand,
  TransactWriteCommand,
  UpdateCommand,
  type QueryCommandInput,
} from "@aws-sdk/lib-dynamodb"
import type { AlertGroup, AlertGroupFilter, AlertGroupRepository } from "../../../domain/group/AlertGroup"
import type { JsonRecord } from "../../../shared/types"
import { NotFoundError } from "../../../shared/errors"
import { DEFAULT_TABLES, type AlertingTables } from "../../../shared/config"
import { executeStoreOperation } from "../storeErrors"
import { readOptionalString, type Item } from "../attributes"
import { GROUP_INDEX, alertKey, groupPk } from "../items/alertItems"
import {
  DEVICE_GROUP_INDEX,
  GROUP_SK,
  STATUS_INDEX,
  activeGuardKey,
  groupKey,
  mapItemToGroup,
} from "../items/groupItems"

export class DynamoDBAlertGroupRepository implements AlertGroupRepository {
  private client: DynamoDBDocumentClient
  private tables: AlertingTables

  constructor(client: DynamoDBDocumentClient, tables: AlertingTables = DEFAULT_TABLES) {
    this.client = client
    this.tables = tables
  }

  async findById(id: string): Promise<AlertGroup | null> {
    const response = await executeStoreOperation("groups.findById", () =>
      this.client.send(
        new GetCommand({
          TableName: this.tables.groups,
          Key: groupKey(id),
          ConsistentRead: true,
        })
      )
    )

    return response.Item ? mapItemToGroup(response.Item) : null
  }

  async findActiveByKey(compositeKey: string): Promise<AlertGroup | null> {
    const guard = await executeStoreOperation("groups.findActiveByKey", () =>
      this.client.send(
        new GetCommand({
          TableName: this.tables.groups,
          Key: activeGuardKey(compositeKey),
          ConsistentRead: true,
        })
      )
    )

    const groupId = guard.Item ? readOptionalString(guard.Item, "group_id") : null
    if (!groupId) {
      return null
    }

    const group = await this.findById(groupId)
    return group && group.status === "active" ? group : null
  }

  async list(filter: AlertGroupFilter): Promise<AlertGroup[]> {
    const input: QueryCommandInput = filter.deviceId
      ? {
          TableName: this.tables.groups,
          IndexName: DEVICE_GROUP_INDEX,
          KeyConditionExpression: "GSI2PK = :pk",
          ExpressionAttributeValues: {
            ":pk": `DEVICE#${filter.deviceId}`,
            ...(filter.status && { ":status": filter.status }),
          },
          ...(filter.status && {
            FilterExpression: "#status = :status",
            ExpressionAttributeNames: { "#status": "status" },
          }),
        }
      : {
          TableName: this.tables.groups,
          IndexName: STATUS_INDEX,
          KeyConditionExpression: "GSI1PK = :pk",
          ExpressionAttributeValues: { ":pk": `STATUS#${filter.status ?? "active"}` },
        }

    // Without a status the listing covers active then closed groups
    if (!filter.deviceId && !filter.status) {
      const active = await this.queryLimited("groups.list", input, filter.limit)
      if (active.length >= filter.limit) {
        return active
      }
      const closed = await this.queryLimited(
        "groups.list",
        { ...input, ExpressionAttributeValues: { ":pk": "STATUS#closed" } },
        filter.limit - active.length
      )
      return [...active, ...closed]
    }

    return this.queryLimited("groups.list", input, filter.limit)
  }

  async findAll(): Promise<AlertGroup[]> {
    const groups: AlertGroup[] = []
    let startKey: Item | undefined

    do {
      const response = await executeStoreOperation("groups.findAll", () =>
        this.client.send(
          new ScanCommand({
            TableName: this.tables.groups,
            FilterExpression: "SK = :sk",
            ExpressionAttributeValues: { ":sk": GROUP_SK },
            ExclusiveStartKey: startKey,
          })
        )
      )
      groups.push(...(response.Items ?? []).map((item) => mapItemToGroup(item)))
      startKey = response.LastEvaluatedKey
    } while (startKey)

    return groups
  }

  async close(group: AlertGroup, closedAt: Date, reason: string | null): Promise<AlertGroup> {
    const closed: AlertGroup = {
      ...group,
      status: "closed",
      closedAt,
      updatedAt: closedAt,
      metadata: reason ? { ...group.metadata, close_reason: reason } : group.metadata,
    }

    await executeStoreOperation("groups.close", () =>
      this.client.send(
        new TransactWriteCommand({
          TransactItems: [
            {
              Update: {
                TableName: this.tables.groups,
                Key: groupKey(group.id),
                UpdateExpression:
                  "SET #status = :closed, closed_at = :closedAt, updated_at = :closedAt, " +
                  "metadata = :metadata, GSI1PK = :closedPartition",
                ConditionExpression: "#status = :active AND occurrence_count = :count",
                ExpressionAttributeNames: { "#status": "status" },
                ExpressionAttributeValues: {
                  ":closed": "closed",
                  ":closedAt": closedAt.toISOString(),
                  ":metadata": closed.metadata,
                  ":closedPartition": "STATUS#closed",
                  ":active": "active",
                  ":count": group.occurrenceCount,
                },
              },
            },
            {
              Delete: {
                TableName: this.tables.groups,
                Key: activeGuardKey(group.groupKey),
                ConditionExpression: "group_id = :groupId",
                ExpressionAttributeValues: { ":groupId": group.id },
              },
            },
          ],
        })
      )
    )

    return closed
  }

  async updateMetadata(id: string, metadata: JsonRecord, updatedAt: Date): Promise<AlertGroup> {
    const response = await executeStoreOperation("groups.updateMetadata", () =>
      this.client.send(
        new UpdateCommand({
          TableName: this.tables.groups,
          Key: groupKey(id),
          UpdateExpression: "SET metadata = :metadata, updated_at = :updatedAt",
          ConditionExpression: "attribute_exists(PK)",
          ExpressionAttributeValues: {
            ":metadata": metadata,
            ":updatedAt": updatedAt.toISOString(),
          },
          ReturnValues: "ALL_NEW",
        })
      )
    )

    if (!response.Attributes) {
      throw new NotFoundError("Alert group")
    }
    return mapItemToGroup(response.Attributes)
  }

  async delete(id: string): Promise<void> {
    const group = await this.findById(id)
    if (!group) {
      throw new NotFoundError("Alert group")
    }

    // Orphan the member alerts first; they keep existing with no group link
    const members = await this.queryAll("groups.delete.members", {
      TableName: this.tables.alerts,
      IndexName: GROUP_INDEX,
      KeyConditionExpression: "GROUP_PK = :pk",
      ExpressionAttributeValues: { ":pk": groupPk(id) },
      ProjectionExpression: "id",
    })

    for (const member of members) {
      const alertId = readOptionalString(member, "id")
      if (!alertId) {
        continue
      }
      await executeStoreOperation("groups.delete.unlink", () =>
        this.client.send(
          new UpdateCommand({
            TableName: this.tables.alerts,
            Key: alertKey(alertId),
            UpdateExpression: "REMOVE group_id, GROUP_PK, GROUP_SK",
            ConditionExpression: "group_id = :groupId",
            ExpressionAttributeValues: { ":groupId": id },
          })
        )
      )
    }

    await executeStoreOperation("groups.delete", () =>
      this.client.send(
        new TransactWriteCommand({
          TransactItems: [
            { Delete: { TableName: this.tables.groups, Key: groupKey(id) } },
            ...(group.status === "active"
              ? [
                  {
                    Delete: {
                      TableName: this.tables.groups,
                      Key: activeGuardKey(group.groupKey),
                      ConditionExpression: "group_id = :groupId",
                      ExpressionAttributeValues: { ":groupId": id },
                    },
                  },
                ]
              : []),
          ],
        })
      )
    )
  }

  private async queryLimited(operation: string, input: QueryCommandInput, limit: number): Promise<AlertGroup[]> {
    const groups: AlertGroup[] = []
    let startKey: Item | undefined

    do {
      const response = await executeStoreOperation(operation, () =>
        this.client.send(
          new QueryCommand({
            ...input,
            ScanIndexForward: false, // most recent activity first
            Limit: limit,
            ExclusiveStartKey: startKey,
          })
        )
      )
      for (const item of response.Items ?? []) {
        groups.push(mapItemToGroup(item))
        if (groups.length === limit) {
          return groups
        }
      }
      startKey = response.LastEvaluatedKey
    } while (startKey)

    return groups
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
}
