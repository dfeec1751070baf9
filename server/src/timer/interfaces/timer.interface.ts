/**
 * Timer Interface
 * Contract between the timer service and the engine that fires its timeouts
 */

import type { TimeUnit } from '@tickwork/shared'

export type TimeoutState = 'pending' | 'cancelled' | 'expired'

/**
 * Handle for a task registered with an {@link ITimer}
 */
export interface Timeout {
  readonly timer: ITimer
  readonly task: TimerTask
  readonly state: TimeoutState

  isExpired(): boolean
  isCancelled(): boolean

  /**
   * Cancel the task if it has not fired yet.
   * Returns false when the timeout already expired or was cancelled.
   */
  cancel(): boolean
}

export interface TimerTask {
  run(timeout: Timeout): void | Promise<void>
}

export type TimerCallback = (timeout: Timeout) => void | Promise<void>

export interface ITimer {
  /**
   * Schedule a one-shot task to run after the given delay
   */
  newTimeout(task: TimerTask, delay: number, unit: TimeUnit): Timeout

  /**
   * Stop the timer and discard every timeout that has not fired yet.
   * Returns the discarded timeouts.
   */
  stop(): Set<Timeout>

  /**
   * Number of timeouts that have neither fired nor been removed
   */
  pendingTimeouts(): number
}

/**
 * Monotonic clock read by the timer engine
 */
export interface TimeSource {
  nowMs(): number
}

export const systemTimeSource: TimeSource = {
  nowMs: () => performance.now(),
}
