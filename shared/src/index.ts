export {
  TimeValue,
  TimeValueParseError,
  isTimeUnit,
  toNanos,
} from './types/time-value.js'
export type { TimeUnit } from './types/time-value.js'
