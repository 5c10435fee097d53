/**
 * DynamoDBAlertGroupRepository Unit Tests
 */

import { TransactionCanceledException } from "@aws-sdk/client-dynamodb"
import { GetCommand, QueryCommand, TransactWriteCommand, UpdateCommand } from "@aws-sdk/lib-dynamodb"
import type { AlertGroup } from "../../../src/domain/group/AlertGroup"
import { DynamoDBAlertGroupRepository } from "../../../src/infrastructure/dynamodb/repositories/AlertGroupRepository"
import { mapGroupToItem } from "../../../src/infrastructure/dynamodb/items/groupItems"
import { ConflictError, NotFoundError } from "../../../src/shared/errors"
import { stubDocumentClient, type Responder } from "../../support/documentClient"

const FIRST = new Date("2025-01-06T08:00:00.000Z")

const GROUP: AlertGroup = {
  id: "g-1",
  deviceId: "pump-7",
  ruleId: "pressure-high",
  severity: "critical",
  groupKey: "pump-7:pressure-high:critical",
  firstOccurrence: FIRST,
  lastOccurrence: new Date("2025-01-06T08:03:00.000Z"),
  occurrenceCount: 2,
  status: "active",
  representativeAlertId: "a-1",
  metadata: { shift: "night" },
  createdAt: FIRST,
  updatedAt: new Date("2025-01-06T08:03:00.000Z"),
  closedAt: null,
}

function transactItems(command: unknown) {
  if (!(command instanceof TransactWriteCommand)) {
    throw new Error("expected a TransactWriteCommand")
  }
  return command.input.TransactItems ?? []
}

function updateInput(command: unknown) {
  if (!(command instanceof UpdateCommand)) {
    throw new Error("expected an UpdateCommand")
  }
  return command.input
}

function groupWithMembers(group: AlertGroup, memberIds: string[]): Responder {
  return (command) => {
    if (command instanceof GetCommand) {
      return { Item: mapGroupToItem(group) }
    }
    if (command instanceof QueryCommand) {
      return { Items: memberIds.map((id) => ({ id })) }
    }
    return {}
  }
}

describe("DynamoDBAlertGroupRepository", () => {
  describe("close", () => {
    it("should close the group and drop its active guard only while the guard points at it", async () => {
      const { client, sent } = stubDocumentClient()
      const repository = new DynamoDBAlertGroupRepository(client)
      const closedAt = new Date("2025-01-06T09:00:00.000Z")

      const closed = await repository.close(GROUP, closedAt, "seal replaced")

      expect(sent).toHaveLength(1)
      const [update, guard] = transactItems(sent[0])
      expect(update.Update).toMatchObject({
        TableName: "alert_groups",
        Key: { PK: "GROUP#g-1", SK: "METADATA" },
        ConditionExpression: "#status = :active AND occurrence_count = :count",
        ExpressionAttributeValues: {
          ":closed": "closed",
          ":closedAt": "2025-01-06T09:00:00.000Z",
          ":metadata": { shift: "night", close_reason: "seal replaced" },
          ":closedPartition": "STATUS#closed",
          ":active": "active",
          ":count": 2,
        },
      })
      expect(guard.Delete).toEqual({
        TableName: "alert_groups",
        Key: { PK: "GROUPKEY#pump-7:pressure-high:critical", SK: "ACTIVE" },
        ConditionExpression: "group_id = :groupId",
        ExpressionAttributeValues: { ":groupId": "g-1" },
      })
      expect(closed).toMatchObject({ status: "closed", closedAt, updatedAt: closedAt })
    })

    it("should keep the metadata unchanged without a reason", async () => {
      const { client, sent } = stubDocumentClient()
      const repository = new DynamoDBAlertGroupRepository(client)

      const closed = await repository.close(GROUP, new Date("2025-01-06T09:00:00.000Z"), null)

      expect(transactItems(sent[0])[0].Update?.ExpressionAttributeValues?.[":metadata"]).toEqual({ shift: "night" })
      expect(closed.metadata).toEqual({ shift: "night" })
    })

    it("should raise ConflictError when an alert joined after the read", async () => {
      const { client } = stubDocumentClient(() => {
        throw new TransactionCanceledException({
          message: "Transaction cancelled",
          $metadata: {},
          CancellationReasons: [{ Code: "ConditionalCheckFailed" }, { Code: "None" }],
        })
      })
      const repository = new DynamoDBAlertGroupRepository(client)

      await expect(repository.close(GROUP, new Date("2025-01-06T09:00:00.000Z"), null)).rejects.toThrow(ConflictError)
    })
  })

  describe("delete", () => {
    it("should unlink each member that still points at the group, then remove group and guard", async () => {
      const { client, sent } = stubDocumentClient(groupWithMembers(GROUP, ["a-1", "a-2"]))
      const repository = new DynamoDBAlertGroupRepository(client)

      await repository.delete("g-1")

      expect(sent).toHaveLength(5)
      expect(sent[1]).toBeInstanceOf(QueryCommand)
      expect(updateInput(sent[2])).toEqual({
        TableName: "alerts",
        Key: { PK: "ALERT#a-1", SK: "METADATA" },
        UpdateExpression: "REMOVE group_id, GROUP_PK, GROUP_SK",
        ConditionExpression: "group_id = :groupId",
        ExpressionAttributeValues: { ":groupId": "g-1" },
      })
      expect(updateInput(sent[3]).Key).toEqual({ PK: "ALERT#a-2", SK: "METADATA" })
      expect(transactItems(sent[4])).toEqual([
        { Delete: { TableName: "alert_groups", Key: { PK: "GROUP#g-1", SK: "METADATA" } } },
        {
          Delete: {
            TableName: "alert_groups",
            Key: { PK: "GROUPKEY#pump-7:pressure-high:critical", SK: "ACTIVE" },
            ConditionExpression: "group_id = :groupId",
            ExpressionAttributeValues: { ":groupId": "g-1" },
          },
        },
      ])
    })

    it("should leave the guard alone for a closed group", async () => {
      const closed: AlertGroup = { ...GROUP, status: "closed", closedAt: new Date("2025-01-06T09:00:00.000Z") }
      const { client, sent } = stubDocumentClient(groupWithMembers(closed, []))
      const repository = new DynamoDBAlertGroupRepository(client)

      await repository.delete("g-1")

      expect(sent).toHaveLength(3)
      expect(transactItems(sent[2])).toEqual([
        { Delete: { TableName: "alert_groups", Key: { PK: "GROUP#g-1", SK: "METADATA" } } },
      ])
    })

    it("should throw NotFoundError for an unknown group", async () => {
      const { client, sent } = stubDocumentClient(() => ({}))
      const repository = new DynamoDBAlertGroupRepository(client)

      await expect(repository.delete("missing")).rejects.toThrow(NotFoundError)
      expect(sent).toHaveLength(1)
    })
  })
})
