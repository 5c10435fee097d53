/**
 * Store error policy
 */

import { ConditionalCheckFailedException, TransactionCanceledException } from "@aws-sdk/client-dynamodb"
import {
  executeStoreOperation,
  isConditionalCheckFailure,
  isTransientStoreError,
} from "../../../src/infrastructure/dynamodb/storeErrors"
import { ConflictError, NotFoundError, StoreUnavailableError } from "../../../src/shared/errors"

function throttled(): Error {
  const error = new Error("Rate exceeded")
  error.name = "ThrottlingException"
  return error
}

function conditionalFailure(): ConditionalCheckFailedException {
  return new ConditionalCheckFailedException({ message: "The conditional request failed", $metadata: {} })
}

function cancelled(code: string): TransactionCanceledException {
  return new TransactionCanceledException({
    message: "Transaction cancelled",
    $metadata: {},
    CancellationReasons: [{ Code: "None" }, { Code: code }],
  })
}

describe("store error classification", () => {
  it("should treat a failed condition as a conflict", () => {
    expect(isConditionalCheckFailure(conditionalFailure())).toBe(true)
    expect(isConditionalCheckFailure(cancelled("ConditionalCheckFailed"))).toBe(true)
    expect(isConditionalCheckFailure(cancelled("TransactionConflict"))).toBe(false)
  })

  it("should treat throttling and transaction conflicts as transient", () => {
    expect(isTransientStoreError(throttled())).toBe(true)
    expect(isTransientStoreError(cancelled("TransactionConflict"))).toBe(true)
    expect(isTransientStoreError(conditionalFailure())).toBe(false)
    expect(isTransientStoreError(new Error("boom"))).toBe(false)
  })

  it("should treat connection resets as transient", () => {
    const reset = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" })

    expect(isTransientStoreError(reset)).toBe(true)
  })
})

describe("executeStoreOperation", () => {
  it("should retry a transient failure once", async () => {
    const run = jest.fn<Promise<string>, []>().mockRejectedValueOnce(throttled()).mockResolvedValueOnce("ok")

    await expect(executeStoreOperation("alerts.get", run)).resolves.toBe("ok")
    expect(run).toHaveBeenCalledTimes(2)
  })

  it("should raise StoreUnavailableError after a second transient failure", async () => {
    const run = jest.fn<Promise<string>, []>().mockRejectedValue(throttled())

    await expect(executeStoreOperation("alerts.get", run)).rejects.toThrow(StoreUnavailableError)
    expect(run).toHaveBeenCalledTimes(2)
  })

  it("should turn a failed condition into ConflictError without retrying", async () => {
    const run = jest.fn<Promise<string>, []>().mockRejectedValue(conditionalFailure())

    await expect(executeStoreOperation("alerts.appendEntry", run)).rejects.toThrow(
      "Concurrent modification during alerts.appendEntry"
    )
    await expect(executeStoreOperation("alerts.appendEntry", run)).rejects.toThrow(ConflictError)
    expect(run).toHaveBeenCalledTimes(2)
  })

  it("should pass application errors through", async () => {
    const run = jest.fn<Promise<string>, []>().mockRejectedValue(new NotFoundError("Alert"))

    await expect(executeStoreOperation("alerts.delete", run)).rejects.toThrow(NotFoundError)
  })
})
