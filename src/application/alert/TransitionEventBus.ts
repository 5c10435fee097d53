/**
 * In-process fan-out of committed lifecycle transitions.
 *
 * Listeners run in subscription order after the history entry is stored.
 * A failing listener is logged and never affects the transition or the
 * listeners after it.
 */

import type { AlertTransitionEvent } from "../../domain/alert/AlertLifecycle"

export type TransitionListener = (event: AlertTransitionEvent) => Promise<void>

export class TransitionEventBus {
  private listeners: Array<{ name: string; listener: TransitionListener }> = []

  subscribe(name: string, listener: TransitionListener): void {
    this.listeners.push({ name, listener })
  }

  async publish(event: AlertTransitionEvent): Promise<void> {
    for (const { name, listener } of this.listeners) {
      try {
        await listener(event)
      } catch (error) {
        console.error(
          `[TransitionEvents] Listener ${name} failed for alert ${event.alertId} (${event.fromState} -> ${event.toState}):`,
          error
        )
      }
    }
  }
}
