/**
 * DynamoDB Notification Intent Repository Implementation
 *
 * Intents are inserted by DynamoDBAlertRepository.appendEntry together with
 * the tier advance; this repository reads them and records dispatch and
 * delivery outcomes.
 */

import { DynamoDBDocumentClient, GetCommand, PutCommand, QueryCommand } from "@aws-sdk/lib-dynamodb"
import type { NotificationIntent, NotificationIntentRepository } from "../../../domain/notification/Notification"
import { DEFAULT_TABLES, type AlertingTables } from "../../../shared/config"
import { executeStoreOperation } from "../storeErrors"
import type { Item } from "../attributes"
import { alertPk } from "../items/alertItems"
import { ALERT_INTENT_INDEX, intentKey, mapIntentToItem, mapItemToIntent } from "../items/intentItems"

export class DynamoDBNotificationIntentRepository implements NotificationIntentRepository {
  private client: DynamoDBDocumentClient
  private tables: AlertingTables

  constructor(client: DynamoDBDocumentClient, tables: AlertingTables = DEFAULT_TABLES) {
    this.client = client
    this.tables = tables
  }

  async findById(id: string): Promise<NotificationIntent | null> {
    const response = await executeStoreOperation("intents.findById", () =>
      this.client.send(
        new GetCommand({
          TableName: this.tables.intents,
          Key: intentKey(id),
          ConsistentRead: true,
        })
      )
    )

    return response.Item ? mapItemToIntent(response.Item) : null
  }

  async findByAlertId(alertId: string): Promise<NotificationIntent[]> {
    const intents: NotificationIntent[] = []
    let startKey: Item | undefined

    do {
      const response = await executeStoreOperation("intents.findByAlertId", () =>
        this.client.send(
          new QueryCommand({
            TableName: this.tables.intents,
            IndexName: ALERT_INTENT_INDEX,
            KeyConditionExpression: "GSI1PK = :pk",
            ExpressionAttributeValues: { ":pk": alertPk(alertId) },
            ExclusiveStartKey: startKey,
          })
        )
      )
      intents.push(...(response.Items ?? []).map((item) => mapItemToIntent(item)))
      startKey = response.LastEvaluatedKey
    } while (startKey)

    return intents
  }

  async update(intent: NotificationIntent): Promise<NotificationIntent> {
    await executeStoreOperation("intents.update", () =>
      this.client.send(
        new PutCommand({
          TableName: this.tables.intents,
          Item: mapIntentToItem(intent),
          ConditionExpression: "attribute_exists(PK)",
        })
      )
    )
    return intent
  }
}
