/**
 * ThreadedTimerTask
 * Moves a timer task off the timer's tick loop and onto a worker pool. Errors
 * from the task are logged here and go no further.
 */

import type { Timeout, TimerTask } from '../timer/interfaces/timer.interface.js'
import type { IWorkerPool } from '../pool/interfaces/worker-pool.interface.js'
import { errorMeta, type Logger } from '../lib/logger.js'

export class ThreadedTimerTask implements TimerTask {
  constructor(
    private readonly pool: IWorkerPool,
    private readonly task: TimerTask,
    private readonly logger: Logger,
  ) {}

  run(timeout: Timeout): void {
    this.pool.execute(() => this.dispatch(timeout))
  }

  private async dispatch(timeout: Timeout): Promise<void> {
    try {
      await this.task.run(timeout)
    } catch (error) {
      this.logger.warn('An exception was thrown by TimerTask.', errorMeta(error))
    }
  }
}
