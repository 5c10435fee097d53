/**
 * Conflict retry and deadlines
 */

import { DeadlineExceededError, withDeadline } from "../../../src/shared/deadline"
import { MAX_CONFLICT_ATTEMPTS, retryOnConflict } from "../../../src/shared/retry"
import { ConflictError, ValidationError } from "../../../src/shared/errors"

describe("retryOnConflict", () => {
  it("should re-run after a conflict", async () => {
    const run = jest
      .fn<Promise<number>, []>()
      .mockRejectedValueOnce(new ConflictError("lost the race"))
      .mockResolvedValueOnce(7)

    await expect(retryOnConflict("groups.absorb", run)).resolves.toBe(7)
    expect(run).toHaveBeenCalledTimes(2)
  })

  it("should give up after the last attempt", async () => {
    const run = jest.fn<Promise<number>, []>().mockRejectedValue(new ConflictError("lost the race"))

    await expect(retryOnConflict("groups.absorb", run)).rejects.toThrow(ConflictError)
    expect(run).toHaveBeenCalledTimes(MAX_CONFLICT_ATTEMPTS)
  })

  it("should not retry other errors", async () => {
    const run = jest.fn<Promise<number>, []>().mockRejectedValue(new ValidationError("bad input"))

    await expect(retryOnConflict("groups.absorb", run)).rejects.toThrow(ValidationError)
    expect(run).toHaveBeenCalledTimes(1)
  })
})

describe("withDeadline", () => {
  it("should settle with the work when it finishes in time", async () => {
    await expect(withDeadline(Promise.resolve("done"), 50, "probe")).resolves.toBe("done")
  })

  it("should reject once the deadline passes", async () => {
    const never = new Promise<string>(() => undefined)

    await expect(withDeadline(never, 10, "escalation of alert a-1")).rejects.toThrow(
      new DeadlineExceededError("escalation of alert a-1", 10)
    )
  })

  it("should name the work in the message", () => {
    expect(new DeadlineExceededError("escalation of alert a-1", 10).message).toBe(
      "escalation of alert a-1 exceeded its 10ms deadline"
    )
  })
})
