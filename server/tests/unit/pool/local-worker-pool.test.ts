/**
 * LocalWorkerPool unit tests
 */

import { describe, it, expect, vi } from 'vitest'
import { LocalWorkerPool, WorkerPoolError } from '../../../src/pool/local/local-worker-pool.js'
import { currentExecutionContext, runInContext, type ExecutionContext } from '../../../src/lib/execution-context.js'
import { createLogger } from '../../../src/lib/logger.js'

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve))

describe('LocalWorkerPool', () => {
  it('should never run a job inline', async () => {
    const pool = new LocalWorkerPool({ name: 'test' })
    const job = vi.fn()

    pool.execute(job)
    expect(job).not.toHaveBeenCalled()

    await pool.shutdown()
    expect(job).toHaveBeenCalledTimes(1)
  })

  it('should run jobs inside a named worker context', async () => {
    const pool = new LocalWorkerPool({ name: 'test' })
    const contexts: Array<ExecutionContext | undefined> = []

    runInContext({ kind: 'timer', name: 'caller' }, () => {
      pool.execute(() => { contexts.push(currentExecutionContext()) })
      pool.execute(() => { contexts.push(currentExecutionContext()) })
    })
    await pool.shutdown()

    expect(contexts).toEqual([
      { kind: 'worker', name: 'test[1]' },
      { kind: 'worker', name: 'test[2]' },
    ])
  })

  it('should start jobs in submission order', async () => {
    const pool = new LocalWorkerPool({ concurrency: 1 })
    const order: number[] = []

    for (const n of [1, 2, 3]) {
      pool.execute(async () => {
        await Promise.resolve()
        order.push(n)
      })
    }
    await pool.shutdown()

    expect(order).toEqual([1, 2, 3])
  })

  it('should limit the number of jobs in flight', async () => {
    const pool = new LocalWorkerPool({ concurrency: 2 })
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    const started: number[] = []

    for (const n of [1, 2, 3]) {
      pool.execute(async () => {
        started.push(n)
        await gate
      })
    }
    expect(pool.activeCount()).toBe(2)
    expect(pool.queuedCount()).toBe(1)

    await nextTurn()
    expect(started).toEqual([1, 2])

    release()
    await pool.shutdown()
    expect(started).toEqual([1, 2, 3])
    expect(pool.activeCount()).toBe(0)
  })

  it('should report failing jobs and keep running', async () => {
    const logger = createLogger('test')
    const errorLog = vi.spyOn(logger, 'error')
    const onUncaughtError = vi.fn()
    const pool = new LocalWorkerPool({ name: 'test', logger, onUncaughtError })
    const failure = new Error('job failed')
    const after = vi.fn()

    pool.execute(() => { throw failure })
    pool.execute(after)
    await pool.shutdown()

    expect(onUncaughtError).toHaveBeenCalledWith(failure)
    expect(errorLog).toHaveBeenCalledWith(
      'Uncaught error in worker job',
      expect.objectContaining({ pool: 'test', error: 'job failed' }),
    )
    expect(after).toHaveBeenCalledTimes(1)
  })

  it('should log a failing onUncaughtError handler instead of rejecting', async () => {
    const logger = createLogger('test')
    const errorLog = vi.spyOn(logger, 'error')
    const unhandled: unknown[] = []
    const onUnhandled = (reason: unknown) => { unhandled.push(reason) }
    process.on('unhandledRejection', onUnhandled)

    try {
      const pool = new LocalWorkerPool({
        name: 'test',
        logger,
        onUncaughtError: () => { throw new Error('handler failed') },
      })
      pool.execute(() => { throw new Error('job failed') })
      await pool.shutdown()
      await nextTurn()

      expect(unhandled).toEqual([])
      expect(errorLog).toHaveBeenCalledWith(
        'onUncaughtError handler failed',
        expect.objectContaining({ pool: 'test', error: 'handler failed' }),
      )
    } finally {
      process.off('unhandledRejection', onUnhandled)
    }
  })

  it('should refuse jobs after shutdown', async () => {
    const pool = new LocalWorkerPool({ name: 'test' })
    await pool.shutdown()

    expect(pool.isShutdown).toBe(true)
    expect(() => pool.execute(() => {})).toThrow(WorkerPoolError)
    expect(() => pool.execute(() => {})).toThrow('Worker pool test has been shut down')
  })

  it('should reject an invalid concurrency', () => {
    expect(() => new LocalWorkerPool({ concurrency: 0 })).toThrow(WorkerPoolError)
  })
})
