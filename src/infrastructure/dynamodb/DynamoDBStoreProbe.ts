import { DynamoDBDocumentClient, GetCommand } from "@aws-sdk/lib-dynamodb"
import type { StoreProbe } from "../../application/health/HealthService"
import type { AlertingTables } from "../../shared/config"
import { executeStoreOperation } from "./storeErrors"

/** A consistent read of a key that never exists. */
export class DynamoDBStoreProbe implements StoreProbe {
  constructor(
    private client: DynamoDBDocumentClient,
    private tables: AlertingTables
  ) {}

  async ping(): Promise<void> {
    await executeStoreOperation("health.ping", () =>
      this.client.send(
        new GetCommand({
          TableName: this.tables.alerts,
          Key: { PK: "HEALTH#PROBE", SK: "PROBE" },
          ConsistentRead: true,
        })
      )
    )
  }
}
