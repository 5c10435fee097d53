import type { AlertState } from "./Alert"

export const ALERT_TRANSITIONS: Readonly<Record<AlertState, readonly AlertState[]>> = {
  new: ["acknowledged", "investigating", "resolved"],
  acknowledged: ["investigating", "resolved"],
  investigating: ["resolved"],
  resolved: [],
}

export function isValidTransition(from: AlertState, to: AlertState): boolean {
  return ALERT_TRANSITIONS[from].includes(to)
}

/** States whose first occurrence counts as the human response for TTA. */
export const RESPONSE_STATES: readonly AlertState[] = ["acknowledged", "investigating", "resolved"]

export function isTerminal(state: AlertState): boolean {
  return ALERT_TRANSITIONS[state].length === 0
}

export interface AlertTransitionEvent {
  alertId: string
  fromState: AlertState
  toState: AlertState
  actor: string | null
  occurredAt: Date
  forced: boolean
}
