/**
 * HashedWheelTimer
 *
 * Timer engine for large numbers of one-shot timeouts. Pending timeouts are
 * hashed into a fixed ring of buckets by deadline; a single tick loop walks
 * the ring one bucket per tick and fires whatever is due. Insertion and
 * cancellation are O(1), precision is bounded by the tick duration.
 *
 * The tick loop is a chain of unref'd setTimeout calls, so an idle timer
 * never keeps the process alive.
 */

import { toNanos, type TimeUnit, type TimeValue } from '@tickwork/shared'
import {
  systemTimeSource,
  type ITimer,
  type Timeout,
  type TimerTask,
  type TimeSource,
} from '../interfaces/timer.interface.js'
import { HashedWheelBucket, HashedWheelTimeout } from './hashed-wheel-timeout.js'
import { TimerError } from '../errors.js'
import { runInContext } from '../../lib/execution-context.js'
import { createLogger, errorMeta, type Logger } from '../../lib/logger.js'

const NANOS_PER_MILLI = 1_000_000
const MAX_WHEEL_LENGTH = 2 ** 20
// Caps the work a single tick spends moving new timeouts into buckets
const MAX_TRANSFERS_PER_TICK = 100_000

export interface HashedWheelTimerOptions {
  tickDuration: TimeValue
  ticksPerWheel: number
  name?: string
  logger?: Logger
  timeSource?: TimeSource
  maxPendingTimeouts?: number // <= 0: unlimited
}

export class HashedWheelTimer implements ITimer {
  readonly name: string
  readonly tickDurationMs: number
  private readonly wheel: HashedWheelBucket[]
  private readonly logger: Logger
  private readonly timeSource: TimeSource
  private readonly maxPendingTimeouts: number
  private readonly startTime: number

  private tick = 0
  private workerState: 'started' | 'shutdown' = 'started'
  private tickHandle: ReturnType<typeof setTimeout> | null = null
  private newTimeouts: HashedWheelTimeout[] = []
  private cancelledTimeouts: HashedWheelTimeout[] = []
  private pendingCount = 0

  constructor(options: HashedWheelTimerOptions) {
    const tickDurationMs = options.tickDuration.nanos() / NANOS_PER_MILLI
    if (!Number.isFinite(tickDurationMs) || tickDurationMs <= 0) {
      throw new TimerError('INVALID_ARGUMENT', `tickDuration must be greater than 0: ${options.tickDuration}`)
    }
    if (tickDurationMs < 1) {
      throw new TimerError('INVALID_ARGUMENT', `tickDuration must be at least 1ms: ${options.tickDuration}`)
    }
    if (
      !Number.isInteger(options.ticksPerWheel) ||
      options.ticksPerWheel < 1 ||
      options.ticksPerWheel > MAX_WHEEL_LENGTH
    ) {
      throw new TimerError(
        'INVALID_ARGUMENT',
        `ticksPerWheel must be an integer between 1 and ${MAX_WHEEL_LENGTH}: ${options.ticksPerWheel}`,
      )
    }

    this.name = options.name ?? 'hashed-wheel-timer'
    this.tickDurationMs = tickDurationMs
    this.wheel = createWheel(options.ticksPerWheel)
    this.logger = options.logger ?? createLogger('hashed-wheel-timer')
    this.timeSource = options.timeSource ?? systemTimeSource
    this.maxPendingTimeouts = options.maxPendingTimeouts ?? 0

    this.startTime = this.timeSource.nowMs()
    this.scheduleTick()

    this.logger.debug('timer started', {
      timer: this.name,
      tickDurationMs: this.tickDurationMs,
      wheelLength: this.wheel.length,
    })
  }

  get wheelLength(): number {
    return this.wheel.length
  }

  get isStopped(): boolean {
    return this.workerState === 'shutdown'
  }

  newTimeout(task: TimerTask, delay: number, unit: TimeUnit): Timeout {
    if (this.workerState === 'shutdown') {
      throw new TimerError('TIMER_STOPPED', `${this.name} cannot accept new timeouts once stopped`)
    }
    if (!Number.isFinite(delay)) {
      throw new TimerError('INVALID_ARGUMENT', `delay must be a finite number: ${delay}`)
    }
    if (this.maxPendingTimeouts > 0 && this.pendingCount >= this.maxPendingTimeouts) {
      throw new TimerError(
        'TOO_MANY_PENDING',
        `Number of pending timeouts (${this.pendingCount}) is greater than or equal to maximum allowed pending timeouts (${this.maxPendingTimeouts})`,
      )
    }

    // Negative delays fire on the next tick
    const delayMs = Math.max(0, toNanos(delay, unit) / NANOS_PER_MILLI)
    const timeout = new HashedWheelTimeout(this, task, this.elapsed() + delayMs)
    this.newTimeouts.push(timeout)
    this.pendingCount++
    return timeout
  }

  stop(): Set<Timeout> {
    const unprocessed = new Set<Timeout>()
    if (this.workerState === 'shutdown') return unprocessed

    this.workerState = 'shutdown'
    if (this.tickHandle) {
      clearTimeout(this.tickHandle)
      this.tickHandle = null
    }

    const collect = (timeout: HashedWheelTimeout): void => {
      if (timeout.discard()) unprocessed.add(timeout)
    }
    for (const bucket of this.wheel) {
      bucket.clear(collect)
    }
    for (const timeout of this.newTimeouts) {
      collect(timeout)
    }
    this.newTimeouts = []
    this.cancelledTimeouts = []

    this.logger.debug('timer stopped', { timer: this.name, discarded: unprocessed.size })
    return unprocessed
  }

  pendingTimeouts(): number {
    return this.pendingCount
  }

  /** @internal */
  enqueueCancelled(timeout: HashedWheelTimeout): void {
    if (this.workerState === 'started') {
      this.cancelledTimeouts.push(timeout)
    }
  }

  /** @internal */
  onTimeoutSettled(): void {
    this.pendingCount--
  }

  /** @internal */
  reportTaskError(error: unknown): void {
    this.logger.warn('An exception was thrown by TimerTask.', { timer: this.name, ...errorMeta(error) })
  }

  private elapsed(): number {
    return this.timeSource.nowMs() - this.startTime
  }

  private scheduleTick(): void {
    this.armTick(this.tickDurationMs * (this.tick + 1))
  }

  private armTick(deadline: number): void {
    const sleepMs = Math.max(0, Math.ceil(deadline - this.elapsed()))
    this.tickHandle = setTimeout(() => this.onTick(deadline), sleepMs)
    this.tickHandle.unref()
  }

  private onTick(deadline: number): void {
    this.tickHandle = null
    if (this.workerState !== 'started') return

    // Host timers may fire slightly before the requested instant
    if (this.elapsed() < deadline) {
      this.armTick(deadline)
      return
    }

    // Process every tick that is already due before re-arming
    runInContext({ kind: 'timer', name: this.name }, () => {
      let tickDeadline = deadline
      do {
        this.processCancelledTasks()
        this.transferTimeoutsToBuckets()
        this.wheel[this.tick % this.wheel.length].expireTimeouts(tickDeadline, (timeout) => {
          this.newTimeouts.push(timeout)
        })
        this.tick++
        tickDeadline = this.tickDurationMs * (this.tick + 1)
      } while (this.workerState === 'started' && this.elapsed() >= tickDeadline)
    })

    if (this.workerState === 'started') {
      this.scheduleTick()
    }
  }

  private processCancelledTasks(): void {
    const cancelled = this.cancelledTimeouts
    this.cancelledTimeouts = []
    for (const timeout of cancelled) {
      timeout.remove()
    }
  }

  private transferTimeoutsToBuckets(): void {
    const batch = this.newTimeouts.splice(0, MAX_TRANSFERS_PER_TICK)
    for (const timeout of batch) {
      // Cancelled before it ever reached a bucket
      if (timeout.state !== 'pending') continue

      const calculated = Math.floor(timeout.deadline / this.tickDurationMs)
      timeout.remainingRounds = Math.floor((calculated - this.tick) / this.wheel.length)

      // Already overdue: put it in the bucket processed this tick
      const ticks = Math.max(calculated, this.tick)
      this.wheel[ticks % this.wheel.length].add(timeout)
    }
  }
}

function createWheel(ticksPerWheel: number): HashedWheelBucket[] {
  let length = 1
  while (length < ticksPerWheel) {
    length *= 2
  }
  return Array.from({ length }, () => new HashedWheelBucket())
}
