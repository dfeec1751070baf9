import { config } from './config/env.js'
import type { TimerSettingsInput } from './config/timer-settings.js'
import { LocalWorkerPool } from './pool/local/local-worker-pool.js'
import { TimerService } from './services/timer.service.js'
import type { Logger } from './lib/logger.js'

export interface TimerContextOptions {
  settings?: TimerSettingsInput
  poolSize?: number
  logger?: Logger
}

export interface TimerContext {
  timerService: TimerService
  workerPool: LocalWorkerPool
  close(): Promise<void>
}

/**
 * Wire a timer service to its worker pool. Anything not passed in comes from
 * the environment configuration.
 */
export function createTimerContext(options: TimerContextOptions = {}): TimerContext {
  const workerPool = new LocalWorkerPool({
    name: 'timer',
    concurrency: options.poolSize ?? config.workerPoolSize,
    logger: options.logger,
  })
  const timerService = new TimerService(
    workerPool,
    options.settings ?? { tickDuration: config.tickDuration, ticksPerWheel: config.ticksPerWheel },
    { logger: options.logger },
  )

  return {
    timerService,
    workerPool,
    async close() {
      timerService.shutdown()
      await workerPool.shutdown()
    },
  }
}
