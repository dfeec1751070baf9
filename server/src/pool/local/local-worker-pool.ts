/**
 * Local Worker Pool
 * In-process pool: jobs start on a later event-loop turn, in FIFO order, with
 * at most `concurrency` jobs in flight at once
 */

import type { IWorkerPool, Job } from '../interfaces/worker-pool.interface.js'
import { runInContext } from '../../lib/execution-context.js'
import { createLogger, errorMeta, type Logger } from '../../lib/logger.js'

export interface LocalWorkerPoolOptions {
  name?: string
  concurrency?: number // default: 16
  logger?: Logger
  /** Called with anything a job throws or rejects with */
  onUncaughtError?: (error: unknown) => void
}

export class LocalWorkerPool implements IWorkerPool {
  readonly name: string
  readonly concurrency: number
  private readonly logger: Logger
  private readonly onUncaughtError?: (error: unknown) => void

  private queue: Job[] = []
  private active = 0
  private workerSeq = 0
  private closed = false
  private idleWaiters: Array<() => void> = []

  constructor(options: LocalWorkerPoolOptions = {}) {
    const concurrency = options.concurrency ?? 16
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new WorkerPoolError('INVALID_CONCURRENCY', `concurrency must be a positive integer: ${concurrency}`)
    }
    this.name = options.name ?? 'worker'
    this.concurrency = concurrency
    this.logger = options.logger ?? createLogger('worker-pool')
    this.onUncaughtError = options.onUncaughtError
  }

  get isShutdown(): boolean {
    return this.closed
  }

  execute(job: Job): void {
    if (this.closed) {
      throw new WorkerPoolError('POOL_SHUTDOWN', `Worker pool ${this.name} has been shut down`)
    }
    this.queue.push(job)
    this.drain()
  }

  activeCount(): number {
    return this.active
  }

  queuedCount(): number {
    return this.queue.length
  }

  /**
   * Stop accepting jobs; resolves once queued and running jobs are done
   */
  async shutdown(): Promise<void> {
    this.closed = true
    if (this.active === 0 && this.queue.length === 0) return
    await new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve)
    })
  }

  private drain(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const job = this.queue.shift()
      if (!job) break

      this.active++
      const workerName = `${this.name}[${++this.workerSeq}]`
      setImmediate(() => {
        void runInContext({ kind: 'worker', name: workerName }, () => this.runJob(job))
      })
    }
  }

  private async runJob(job: Job): Promise<void> {
    try {
      await job()
    } catch (error) {
      this.logger.error('Uncaught error in worker job', { pool: this.name, ...errorMeta(error) })
      this.reportUncaught(error)
    } finally {
      this.active--
      this.drain()
      this.notifyIfIdle()
    }
  }

  private reportUncaught(error: unknown): void {
    try {
      this.onUncaughtError?.(error)
    } catch (hookError) {
      this.logger.error('onUncaughtError handler failed', { pool: this.name, ...errorMeta(hookError) })
    }
  }

  private notifyIfIdle(): void {
    if (this.active > 0 || this.queue.length > 0) return
    const waiters = this.idleWaiters
    this.idleWaiters = []
    for (const resolve of waiters) resolve()
  }
}

export class WorkerPoolError extends Error {
  constructor(
    public code: 'POOL_SHUTDOWN' | 'INVALID_CONCURRENCY',
    message: string,
  ) {
    super(message)
    this.name = 'WorkerPoolError'
  }
}
