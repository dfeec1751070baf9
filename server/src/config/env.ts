export const config = {
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: process.env.LOG_LEVEL || 'info',
  // Timer wheel configuration
  tickDuration: process.env.TIMER_TICK_DURATION || '100ms',
  ticksPerWheel: parseInt(process.env.TIMER_TICKS_PER_WHEEL || '1024', 10),
  // Worker pool used for threaded timer tasks
  workerPoolSize: parseInt(process.env.TIMER_WORKER_POOL_SIZE || '16', 10),
} as const
