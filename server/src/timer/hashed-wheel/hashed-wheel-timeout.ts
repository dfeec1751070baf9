import type { ITimer, Timeout, TimeoutState, TimerTask } from '../interfaces/timer.interface.js'
import type { HashedWheelTimer } from './hashed-wheel-timer.js'

export class HashedWheelTimeout implements Timeout {
  private currentState: TimeoutState = 'pending'

  // Full wheel rotations left before this timeout is due
  remainingRounds = 0
  bucket: HashedWheelBucket | null = null

  constructor(
    private readonly owner: HashedWheelTimer,
    readonly task: TimerTask,
    /** Milliseconds since the owning timer started */
    readonly deadline: number,
  ) {}

  get timer(): ITimer {
    return this.owner
  }

  get state(): TimeoutState {
    return this.currentState
  }

  isExpired(): boolean {
    return this.currentState === 'expired'
  }

  isCancelled(): boolean {
    return this.currentState === 'cancelled'
  }

  cancel(): boolean {
    if (!this.settle('cancelled')) return false
    // Bucket removal happens on the next tick
    this.owner.enqueueCancelled(this)
    return true
  }

  /**
   * Mark as cancelled without queueing a bucket removal (timer is stopping)
   */
  discard(): boolean {
    return this.settle('cancelled')
  }

  remove(): void {
    this.bucket?.remove(this)
  }

  expire(): void {
    if (!this.settle('expired')) return

    try {
      const result = this.task.run(this)
      if (result instanceof Promise) {
        void result.catch((error: unknown) => this.owner.reportTaskError(error))
      }
    } catch (error) {
      this.owner.reportTaskError(error)
    }
  }

  private settle(next: TimeoutState): boolean {
    if (this.currentState !== 'pending') return false
    this.currentState = next
    this.owner.onTimeoutSettled()
    return true
  }
}

/**
 * One slot of the wheel. Keeps insertion order, so timeouts due on the same
 * tick fire in the order they were registered.
 */
export class HashedWheelBucket {
  // Allocated on first add; most slots of a large wheel stay empty
  private timeouts: Set<HashedWheelTimeout> | null = null

  get size(): number {
    return this.timeouts?.size ?? 0
  }

  add(timeout: HashedWheelTimeout): void {
    timeout.bucket = this
    this.timeouts ??= new Set()
    this.timeouts.add(timeout)
  }

  remove(timeout: HashedWheelTimeout): void {
    this.timeouts?.delete(timeout)
    timeout.bucket = null
  }

  /**
   * Fire every timeout whose last round has come and whose deadline is
   * covered by `deadline`. Timeouts that landed in the slot a hair early are
   * handed to `requeue` instead of firing.
   */
  expireTimeouts(deadline: number, requeue: (timeout: HashedWheelTimeout) => void): void {
    if (!this.timeouts) return
    for (const timeout of this.timeouts) {
      if (timeout.state !== 'pending') {
        this.remove(timeout)
        continue
      }

      if (timeout.remainingRounds <= 0) {
        this.remove(timeout)
        if (timeout.deadline <= deadline) {
          timeout.expire()
        } else {
          requeue(timeout)
        }
      } else {
        timeout.remainingRounds--
      }
    }
  }

  clear(visit: (timeout: HashedWheelTimeout) => void): void {
    if (!this.timeouts) return
    for (const timeout of this.timeouts) {
      timeout.bucket = null
      visit(timeout)
    }
    this.timeouts = null
  }
}
