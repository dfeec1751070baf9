/**
 * Worker Pool Interface
 * Runs zero-argument jobs asynchronously, away from the caller's context
 */

export type Job = () => void | Promise<void>

export interface IWorkerPool {
  /**
   * Accept a job for asynchronous execution. Never runs the job inline.
   */
  execute(job: Job): void
}
