/**
 * Durations with units, shared by the timer service and its callers.
 */

export type TimeUnit =
  | 'nanoseconds'
  | 'microseconds'
  | 'milliseconds'
  | 'seconds'
  | 'minutes'
  | 'hours'
  | 'days'

const NANOS_PER_UNIT: Record<TimeUnit, number> = {
  nanoseconds: 1,
  microseconds: 1_000,
  milliseconds: 1_000_000,
  seconds: 1_000_000_000,
  minutes: 60 * 1_000_000_000,
  hours: 60 * 60 * 1_000_000_000,
  days: 24 * 60 * 60 * 1_000_000_000,
}

export function isTimeUnit(value: unknown): value is TimeUnit {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(NANOS_PER_UNIT, value)
}

export function toNanos(duration: number, unit: TimeUnit): number {
  return duration * NANOS_PER_UNIT[unit]
}

// Longest suffixes first so "ms" is not read as "m"
const SUFFIXES: Array<[string, TimeUnit]> = [
  ['nanos', 'nanoseconds'],
  ['micros', 'microseconds'],
  ['ms', 'milliseconds'],
  ['s', 'seconds'],
  ['m', 'minutes'],
  ['h', 'hours'],
  ['d', 'days'],
]

const FORMAT_ORDER: Array<[string, TimeUnit]> = [
  ['d', 'days'],
  ['h', 'hours'],
  ['m', 'minutes'],
  ['s', 'seconds'],
  ['ms', 'milliseconds'],
  ['micros', 'microseconds'],
]

export class TimeValue {
  constructor(
    readonly duration: number,
    readonly unit: TimeUnit = 'milliseconds',
  ) {}

  static timeValueNanos(nanos: number): TimeValue {
    return new TimeValue(nanos, 'nanoseconds')
  }

  static timeValueMillis(millis: number): TimeValue {
    return new TimeValue(millis, 'milliseconds')
  }

  static timeValueSeconds(seconds: number): TimeValue {
    return new TimeValue(seconds, 'seconds')
  }

  static timeValueMinutes(minutes: number): TimeValue {
    return new TimeValue(minutes, 'minutes')
  }

  static timeValueHours(hours: number): TimeValue {
    return new TimeValue(hours, 'hours')
  }

  /**
   * Parse a duration such as `100ms`, `2s`, `1.5m` or `250`.
   * A bare number is read as milliseconds.
   */
  static parse(text: string): TimeValue {
    const trimmed = text.trim().toLowerCase()
    if (trimmed === '') {
      throw new TimeValueParseError(text, 'empty value')
    }

    let unit: TimeUnit = 'milliseconds'
    let numeric = trimmed
    for (const [suffix, suffixUnit] of SUFFIXES) {
      if (trimmed.endsWith(suffix)) {
        unit = suffixUnit
        numeric = trimmed.slice(0, -suffix.length).trim()
        break
      }
    }

    if (!/^\d+(\.\d+)?$/.test(numeric)) {
      throw new TimeValueParseError(text, 'expected a non-negative number with an optional unit suffix')
    }
    return new TimeValue(Number(numeric), unit)
  }

  nanos(): number {
    return toNanos(this.duration, this.unit)
  }

  micros(): number {
    return this.nanos() / NANOS_PER_UNIT.microseconds
  }

  millis(): number {
    return this.nanos() / NANOS_PER_UNIT.milliseconds
  }

  seconds(): number {
    return this.nanos() / NANOS_PER_UNIT.seconds
  }

  /**
   * Display form in the largest fitting unit, rounded to one decimal.
   * `parse(value.toString())` is not guaranteed to return the same duration.
   */
  toString(): string {
    const nanos = this.nanos()
    for (const [suffix, unit] of FORMAT_ORDER) {
      const perUnit = NANOS_PER_UNIT[unit]
      if (nanos >= perUnit) {
        return `${formatDecimal(nanos / perUnit)}${suffix}`
      }
    }
    return `${nanos}nanos`
  }
}

function formatDecimal(value: number): string {
  const rounded = Math.round(value * 10) / 10
  return Number.isInteger(rounded) ? String(rounded) : rounded.toFixed(1)
}

export class TimeValueParseError extends Error {
  constructor(
    public input: string,
    reason: string,
  ) {
    super(`Failed to parse time value [${input}]: ${reason}`)
    this.name = 'TimeValueParseError'
  }
}
