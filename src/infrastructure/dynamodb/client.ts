/**
 * DynamoDB document client factory
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb"
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import type { AlertingConfig } from "../../shared/config"

export function createDocumentClient(config: AlertingConfig): DynamoDBDocumentClient {
  const client = new DynamoDBClient({
    // Retries are owned by executeStoreOperation
    maxAttempts: 1,
    requestHandler: {
      connectionTimeout: config.store.requestTimeoutMs,
      requestTimeout: config.store.requestTimeoutMs,
    },
  })

  return DynamoDBDocumentClient.from(client, {
    marshallOptions: {
      removeUndefinedValues: true,
    },
  })
}
