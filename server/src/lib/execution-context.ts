import { AsyncLocalStorage } from 'node:async_hooks'

/**
 * Where a piece of work is running: on a timer's tick loop or on a pool worker.
 */
export interface ExecutionContext {
  kind: 'timer' | 'worker'
  name: string
}

const storage = new AsyncLocalStorage<ExecutionContext>()

export function runInContext<T>(context: ExecutionContext, fn: () => T): T {
  return storage.run(context, fn)
}

export function currentExecutionContext(): ExecutionContext | undefined {
  return storage.getStore()
}
