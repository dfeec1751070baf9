export type TimerErrorCode =
  | 'INVALID_CONFIG'
  | 'INVALID_ARGUMENT'
  | 'TIMER_STOPPED'
  | 'TOO_MANY_PENDING'

export class TimerError extends Error {
  constructor(
    public code: TimerErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'TimerError'
  }
}
