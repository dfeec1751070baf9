import 'dotenv/config'

export { createTimerContext } from './app.js'
export type { TimerContext, TimerContextOptions } from './app.js'
export { config } from './config/env.js'
export { TimerSettingsSchema } from './config/timer-settings.js'
export type { TimerSettings, TimerSettingsInput } from './config/timer-settings.js'
export { TimerService } from './services/timer.service.js'
export type { ExecutionMode, TimerServiceOptions, TimerTaskLike } from './services/timer.service.js'
export { ThreadedTimerTask } from './services/threaded-timer-task.js'
export { HashedWheelTimer } from './timer/hashed-wheel/hashed-wheel-timer.js'
export type { HashedWheelTimerOptions } from './timer/hashed-wheel/hashed-wheel-timer.js'
export { TimerError } from './timer/errors.js'
export type { TimerErrorCode } from './timer/errors.js'
export { systemTimeSource } from './timer/interfaces/timer.interface.js'
export type {
  ITimer,
  Timeout,
  TimeoutState,
  TimerCallback,
  TimerTask,
  TimeSource,
} from './timer/interfaces/timer.interface.js'
export { LocalWorkerPool, WorkerPoolError } from './pool/local/local-worker-pool.js'
export type { LocalWorkerPoolOptions } from './pool/local/local-worker-pool.js'
export type { IWorkerPool, Job } from './pool/interfaces/worker-pool.interface.js'
export { currentExecutionContext, runInContext } from './lib/execution-context.js'
export type { ExecutionContext } from './lib/execution-context.js'
export { createLogger } from './lib/logger.js'
export type { Logger } from './lib/logger.js'
export { TimeValue, TimeValueParseError, isTimeUnit, toNanos } from '@tickwork/shared'
export type { TimeUnit } from '@tickwork/shared'
