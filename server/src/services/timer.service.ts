/**
 * TimerService
 * Single entry point for one-shot delayed tasks. Owns one hashed wheel timer;
 * a task either runs inline on the timer's tick loop or, when threaded, is
 * handed to the worker pool as it fires.
 */

import { isTimeUnit, toNanos, TimeValue, type TimeUnit } from '@tickwork/shared'
import type {
  ITimer,
  Timeout,
  TimerCallback,
  TimerTask,
  TimeSource,
} from '../timer/interfaces/timer.interface.js'
import type { IWorkerPool } from '../pool/interfaces/worker-pool.interface.js'
import { HashedWheelTimer } from '../timer/hashed-wheel/hashed-wheel-timer.js'
import { TimerError } from '../timer/errors.js'
import { TimerSettingsSchema, type TimerSettingsInput } from '../config/timer-settings.js'
import { ThreadedTimerTask } from './threaded-timer-task.js'
import { createLogger, type Logger } from '../lib/logger.js'

export type ExecutionMode = 'inline' | 'threaded'

export type TimerTaskLike = TimerTask | TimerCallback

export interface TimerServiceOptions {
  logger?: Logger
  timeSource?: TimeSource
}

export class TimerService {
  readonly tickDuration: TimeValue
  readonly ticksPerWheel: number
  private readonly timer: ITimer
  private readonly logger: Logger
  private closed = false

  constructor(
    private readonly workerPool: IWorkerPool,
    settings: TimerSettingsInput = {},
    options: TimerServiceOptions = {},
  ) {
    const parsed = TimerSettingsSchema.safeParse(settings)
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => issue.message).join('; ')
      throw new TimerError('INVALID_CONFIG', `Invalid timer settings: ${details}`)
    }

    this.tickDuration = parsed.data.tickDuration
    this.ticksPerWheel = parsed.data.ticksPerWheel
    this.logger = options.logger ?? createLogger('timer-service')
    this.timer = new HashedWheelTimer({
      name: 'timer',
      tickDuration: this.tickDuration,
      ticksPerWheel: this.ticksPerWheel,
      logger: this.logger,
      timeSource: options.timeSource,
    })
  }

  get isShutdown(): boolean {
    return this.closed
  }

  estimatedCurrentTimeMillis(): number {
    // don't use the wheel's tick clock so we won't wake up the timer loop each time
    return Date.now()
  }

  submit(task: TimerTaskLike, delay: TimeValue, mode: ExecutionMode): Timeout
  submit(task: TimerTaskLike, delay: number, unit: TimeUnit, mode: ExecutionMode): Timeout
  submit(
    task: TimerTaskLike,
    delay: TimeValue | number,
    unitOrMode: TimeUnit | ExecutionMode,
    mode?: ExecutionMode,
  ): Timeout {
    if (this.closed) {
      throw new TimerError('TIMER_STOPPED', 'Timer service has been shut down')
    }

    let delayNanos: number
    let executionMode: ExecutionMode | undefined
    if (delay instanceof TimeValue) {
      delayNanos = delay.nanos()
      executionMode = isExecutionMode(unitOrMode) ? unitOrMode : undefined
    } else {
      if (!isTimeUnit(unitOrMode)) {
        throw new TimerError('INVALID_ARGUMENT', `Unknown time unit: ${String(unitOrMode)}`)
      }
      delayNanos = toNanos(delay, unitOrMode)
      executionMode = isExecutionMode(mode) ? mode : undefined
    }

    if (!executionMode) {
      throw new TimerError('INVALID_ARGUMENT', 'Execution mode must be "inline" or "threaded"')
    }
    if (!Number.isFinite(delayNanos) || delayNanos < 0) {
      throw new TimerError('INVALID_ARGUMENT', `Delay must be a non-negative finite duration: ${String(delay)}`)
    }

    return this.timer.newTimeout(this.prepareTask(toTimerTask(task), executionMode), delayNanos, 'nanoseconds')
  }

  pendingTimeouts(): number {
    return this.timer.pendingTimeouts()
  }

  shutdown(): void {
    if (this.closed) return
    this.closed = true
    const discarded = this.timer.stop()
    this.logger.debug('timer service stopped', { discarded: discarded.size })
  }

  private prepareTask(task: TimerTask, mode: ExecutionMode): TimerTask {
    switch (mode) {
      case 'inline':
        return task
      case 'threaded':
        return new ThreadedTimerTask(this.workerPool, task, this.logger)
    }
  }
}

function isExecutionMode(value: unknown): value is ExecutionMode {
  return value === 'inline' || value === 'threaded'
}

function toTimerTask(task: TimerTaskLike): TimerTask {
  return typeof task === 'function' ? { run: task } : task
}
