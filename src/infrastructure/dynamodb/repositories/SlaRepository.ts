/**
 * DynamoDB SLA Repository Implementation
 *
 * SLA rows are created inside the alert creation transaction (see
 * DynamoDBAlertRepository.create); this repository only records the two
 * measurements and answers report queries. Each measurement is written with
 * `attribute_not_exists` on its actual so it lands at most once.
 */

import { DynamoDBDocumentClient, GetCommand, QueryCommand, UpdateCommand } from "@aws-sdk/lib-dynamodb"
import { ALERT_SEVERITIES, type AlertSeverity } from "../../../domain/alert/Alert"
import type { AlertSla, BreachType, SlaMeasurement, SlaRepository } from "../../../domain/sla/Sla"
import { ConflictError } from "../../../shared/errors"
import { DEFAULT_TABLES, type AlertingTables } from "../../../shared/config"
import { executeStoreOperation } from "../storeErrors"
import { SORT_KEY_MAX, type Item } from "../attributes"
import { SEVERITY_CREATED_INDEX, mapItemToSla, slaKey } from "../items/slaItems"

export class DynamoDBSlaRepository implements SlaRepository {
  private client: DynamoDBDocumentClient
  private tables: AlertingTables

  constructor(client: DynamoDBDocumentClient, tables: AlertingTables = DEFAULT_TABLES) {
    this.client = client
    this.tables = tables
  }

  async findByAlertId(alertId: string): Promise<AlertSla | null> {
    const response = await executeStoreOperation("slas.findByAlertId", () =>
      this.client.send(
        new GetCommand({
          TableName: this.tables.slas,
          Key: slaKey(alertId),
          ConsistentRead: true,
        })
      )
    )

    return response.Item ? mapItemToSla(response.Item) : null
  }

  async recordAcknowledgement(alertId: string, measurement: SlaMeasurement): Promise<AlertSla | null> {
    return this.recordOnce("slas.recordAcknowledgement", alertId, {
      actual: "tta_actual_min",
      at: "acknowledged_at",
      breached: "tta_breached",
    }, measurement)
  }

  async recordResolution(alertId: string, measurement: SlaMeasurement): Promise<AlertSla | null> {
    return this.recordOnce("slas.recordResolution", alertId, {
      actual: "ttr_actual_min",
      at: "resolved_at",
      breached: "ttr_breached",
    }, measurement)
  }

  async findCreatedBetween(from: Date, to: Date, severity?: AlertSeverity): Promise<AlertSla[]> {
    const severities = severity ? [severity] : ALERT_SEVERITIES
    const rows: AlertSla[] = []

    for (const s of severities) {
      const items = await this.queryAll("slas.findCreatedBetween", {
        ":pk": `SEVERITY#${s}`,
        ":from": from.toISOString(),
        ":to": `${to.toISOString()}#${SORT_KEY_MAX}`,
      }, "GSI1PK = :pk AND GSI1SK BETWEEN :from AND :to")
      rows.push(...items.map((item) => mapItemToSla(item)))
    }

    return rows
  }

  async findBreached(
    type: BreachType,
    severity: AlertSeverity | undefined,
    limit: number
  ): Promise<AlertSla[]> {
    const filter =
      type === "tta"
        ? "tta_breached = :yes"
        : type === "ttr"
          ? "ttr_breached = :yes"
          : "tta_breached = :yes OR ttr_breached = :yes"
    const severities = severity ? [severity] : ALERT_SEVERITIES
    const breached: AlertSla[] = []

    for (const s of severities) {
      const items = await this.queryAll(
        "slas.findBreached",
        { ":pk": `SEVERITY#${s}`, ":yes": true },
        "GSI1PK = :pk",
        filter
      )
      breached.push(...items.map((item) => mapItemToSla(item)))
    }

    // Newest first across severities
    return breached
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
  }

  private async recordOnce(
    operation: string,
    alertId: string,
    attributes: { actual: string; at: string; breached: string },
    measurement: SlaMeasurement
  ): Promise<AlertSla | null> {
    try {
      const response = await executeStoreOperation(operation, () =>
        this.client.send(
          new UpdateCommand({
            TableName: this.tables.slas,
            Key: slaKey(alertId),
            UpdateExpression: "SET #actual = :actual, #at = :at, #breached = :breached",
            ConditionExpression: "attribute_exists(PK) AND attribute_not_exists(#actual)",
            ExpressionAttributeNames: {
              "#actual": attributes.actual,
              "#at": attributes.at,
              "#breached": attributes.breached,
            },
            ExpressionAttributeValues: {
              ":actual": measurement.actualMin,
              ":at": measurement.at.toISOString(),
              ":breached": measurement.breached,
            },
            ReturnValues: "ALL_NEW",
          })
        )
      )
      return response.Attributes ? mapItemToSla(response.Attributes) : null
    } catch (error) {
      // Already measured, or no SLA row
      if (error instanceof ConflictError) {
        return null
      }
      throw error
    }
  }

  private async queryAll(
    operation: string,
    values: Item,
    keyCondition: string,
    filter?: string
  ): Promise<Item[]> {
    const items: Item[] = []
    let startKey: Item | undefined

    do {
      const response = await executeStoreOperation(operation, () =>
        this.client.send(
          new QueryCommand({
            TableName: this.tables.slas,
            IndexName: SEVERITY_CREATED_INDEX,
            KeyConditionExpression: keyCondition,
            ExpressionAttributeValues: values,
            ...(filter && { FilterExpression: filter }),
            ScanIndexForward: false,
            ExclusiveStartKey: startKey,
          })
        )
      )
      items.push(...(response.Items ?? []))
      startKey = response.LastEvaluatedKey
    } while (startKey)

    return items
  }
}
