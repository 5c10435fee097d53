/**
 * DynamoDB error policy
 *
 * Conditional-check failures mean another writer got there first and become
 * ConflictError for the service layer to re-read and retry. Transient faults
 * are retried once; a second failure is StoreUnavailableError.
 */

import {
  ConditionalCheckFailedException,
  TransactionCanceledException,
} from "@aws-sdk/client-dynamodb"
import { AppError, ConflictError, StoreUnavailableError } from "../../shared/errors"

const TRANSIENT_ERROR_NAMES = new Set([
  "ProvisionedThroughputExceededException",
  "ThrottlingException",
  "RequestLimitExceeded",
  "InternalServerError",
  "ServiceUnavailable",
  "TransactionConflictException",
  "TransactionInProgressException",
  "TimeoutError",
  "RequestTimeout",
  "NetworkingError",
])

const TRANSIENT_ERROR_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "EPIPE"])

export function isConditionalCheckFailure(error: unknown): boolean {
  if (error instanceof ConditionalCheckFailedException) {
    return true
  }
  if (error instanceof TransactionCanceledException) {
    return (error.CancellationReasons ?? []).some((r) => r.Code === "ConditionalCheckFailed")
  }
  return false
}

/** True when the transaction was cancelled by the condition on item `index`. */
export function failedConditionAt(error: unknown, index: number): boolean {
  return (
    error instanceof TransactionCanceledException &&
    error.CancellationReasons?.[index]?.Code === "ConditionalCheckFailed"
  )
}

export function isTransientStoreError(error: unknown): boolean {
  if (error instanceof TransactionCanceledException) {
    return (error.CancellationReasons ?? []).some((r) => r.Code === "TransactionConflict")
  }
  if (!(error instanceof Error)) {
    return false
  }
  if (TRANSIENT_ERROR_NAMES.has(error.name)) {
    return true
  }
  if ("code" in error && typeof error.code === "string" && TRANSIENT_ERROR_CODES.has(error.code)) {
    return true
  }
  return "$fault" in error && error.$fault === "server"
}

function translate(operation: string, error: unknown): unknown {
  if (error instanceof AppError) {
    return error
  }
  if (isConditionalCheckFailure(error)) {
    return new ConflictError(`Concurrent modification during ${operation}`, { operation })
  }
  return error
}

/**
 * Runs one store operation under the retry policy.
 */
export async function executeStoreOperation<T>(
  operation: string,
  run: () => Promise<T>
): Promise<T> {
  try {
    return await run()
  } catch (error) {
    if (!isTransientStoreError(error)) {
      throw translate(operation, error)
    }
    console.warn(`[Store] Transient failure during ${operation}, retrying once:`, error)
  }

  try {
    return await run()
  } catch (error) {
    if (isTransientStoreError(error)) {
      throw new StoreUnavailableError(operation, error)
    }
    throw translate(operation, error)
  }
}
