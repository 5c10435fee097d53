/**
 * Clock
 *
 * All lifecycle, SLA and escalation instants come from one injected clock
 * owned by the service layer; client-supplied timestamps are never used.
 */

export interface Clock {
  now(): Date
}

export const systemClock: Clock = {
  now: () => new Date(),
}
