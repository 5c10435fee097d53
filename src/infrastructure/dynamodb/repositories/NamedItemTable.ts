/**
 * Shared persistence for uniquely named configuration items (escalation
 * policies, on-call schedules). Name uniqueness is held by a guard item
 * written in the same transaction as the entity. Updates are conditional on
 * the version read, so callers re-read and retry on ConflictError.
 */

import {
  DynamoDBDocumentClient,
  GetCommand,
  ScanCommand,
  TransactWriteCommand,
  type TransactWriteCommandInput,
} from "@aws-sdk/lib-dynamodb"
import { ConflictError } from "../../../shared/errors"
import { executeStoreOperation, failedConditionAt } from "../storeErrors"
import { readOptionalString, type Item } from "../attributes"

type TransactItems = NonNullable<TransactWriteCommandInput["TransactItems"]>

export interface NamedEntity {
  id: string
  name: string
  version: number
}

export interface NamedItemLayout<T extends NamedEntity> {
  // Used in conflict messages, e.g. "Escalation policy"
  label: string
  key(id: string): Item
  nameKey(name: string): Item
  nameGuardAttribute: string
  sortKey: string
  toItem(entity: T): Item
  toGuardItem(entity: T): Item
  fromItem(item: Item): T
}

export class NamedItemTable<T extends NamedEntity> {
  constructor(
    private client: DynamoDBDocumentClient,
    private tableName: string,
    private layout: NamedItemLayout<T>
  ) {}

  async findById(id: string): Promise<T | null> {
    const response = await executeStoreOperation(`${this.tableName}.findById`, () =>
      this.client.send(
        new GetCommand({
          TableName: this.tableName,
          Key: this.layout.key(id),
          ConsistentRead: true,
        })
      )
    )

    return response.Item ? this.layout.fromItem(response.Item) : null
  }

  async findByName(name: string): Promise<T | null> {
    const guard = await executeStoreOperation(`${this.tableName}.findByName`, () =>
      this.client.send(
        new GetCommand({
          TableName: this.tableName,
          Key: this.layout.nameKey(name),
          ConsistentRead: true,
        })
      )
    )

    const id = guard.Item ? readOptionalString(guard.Item, this.layout.nameGuardAttribute) : null
    return id ? this.findById(id) : null
  }

  async findAll(): Promise<T[]> {
    const entities: T[] = []
    let startKey: Item | undefined

    do {
      const response = await executeStoreOperation(`${this.tableName}.findAll`, () =>
        this.client.send(
          new ScanCommand({
            TableName: this.tableName,
            FilterExpression: "SK = :sk",
            ExpressionAttributeValues: { ":sk": this.layout.sortKey },
            ExclusiveStartKey: startKey,
          })
        )
      )
      entities.push(...(response.Items ?? []).map((item) => this.layout.fromItem(item)))
      startKey = response.LastEvaluatedKey
    } while (startKey)

    return entities.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  async create(entity: T): Promise<T> {
    await this.transact(`${this.tableName}.create`, entity.name, 1, [
      {
        Put: {
          TableName: this.tableName,
          Item: this.layout.toItem(entity),
          ConditionExpression: "attribute_not_exists(PK)",
        },
      },
      {
        Put: {
          TableName: this.tableName,
          Item: this.layout.toGuardItem(entity),
          ConditionExpression: "attribute_not_exists(PK)",
        },
      },
    ])
    return entity
  }

  async update(previous: T, updated: T): Promise<T> {
    const writes: TransactItems = [
      {
        Put: {
          TableName: this.tableName,
          Item: this.layout.toItem(updated),
          ConditionExpression: "version = :expectedVersion",
          ExpressionAttributeValues: { ":expectedVersion": previous.version },
        },
      },
    ]

    const renamed = previous.name !== updated.name
    if (renamed) {
      writes.push(
        {
          Delete: {
            TableName: this.tableName,
            Key: this.layout.nameKey(previous.name),
          },
        },
        {
          Put: {
            TableName: this.tableName,
            Item: this.layout.toGuardItem(updated),
            ConditionExpression: "attribute_not_exists(PK)",
          },
        }
      )
    }

    await this.transact(`${this.tableName}.update`, updated.name, renamed ? 2 : null, writes)
    return updated
  }

  async delete(entity: T): Promise<void> {
    await executeStoreOperation(`${this.tableName}.delete`, () =>
      this.client.send(
        new TransactWriteCommand({
          TransactItems: [
            { Delete: { TableName: this.tableName, Key: this.layout.key(entity.id) } },
            { Delete: { TableName: this.tableName, Key: this.layout.nameKey(entity.name) } },
          ],
        })
      )
    )
  }

  private async transact(
    operation: string,
    name: string,
    guardIndex: number | null,
    writes: TransactItems
  ): Promise<void> {
    await executeStoreOperation(operation, async () => {
      try {
        return await this.client.send(new TransactWriteCommand({ TransactItems: writes }))
      } catch (error) {
        if (guardIndex !== null && failedConditionAt(error, guardIndex)) {
          throw new ConflictError(`${this.layout.label} name "${name}" already exists`, { name })
        }
        throw error
      }
    })
  }
}
