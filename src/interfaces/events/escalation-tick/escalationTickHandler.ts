/**
 * Escalation Tick Lambda Handler
 *
 * EventBridge trigger: scheduled at the configured tick interval.
 * Runs one driver tick. Alerts that failed or timed out stay due and are
 * retried by the next tick, so the invocation itself does not fail for them.
 */

import type { EventBridgeEvent } from "aws-lambda"
import { getContainer } from "../../container"
import type { EscalationTickSummary } from "../../../application/escalation/EscalationDriver"

export async function handler(
  event: EventBridgeEvent<"Scheduled Event", unknown>
): Promise<EscalationTickSummary> {
  console.log(`[EscalationTick] Event received: ${event.id} at ${event.time}`)

  try {
    const summary = await getContainer().driver.tick()
    console.log("[EscalationTick] Tick completed:", JSON.stringify(summary))
    return summary
  } catch (error) {
    console.error("[EscalationTick] Error:", error)
    throw error
  }
}
