import { z } from 'zod'
import { TimeValue } from '@tickwork/shared'

const MAX_TICKS_PER_WHEEL = 2 ** 20
// Host timers never sleep for less than a millisecond
const MIN_TICK_NANOS = 1_000_000

// Tick durations arrive as TimeValue, "100ms"-style strings, or plain milliseconds
export const TickDurationSchema = z
  .union([z.instanceof(TimeValue), z.number(), z.string()])
  .transform((value, ctx) => {
    let tickDuration: TimeValue
    if (value instanceof TimeValue) {
      tickDuration = value
    } else if (typeof value === 'number') {
      tickDuration = TimeValue.timeValueMillis(value)
    } else {
      try {
        tickDuration = TimeValue.parse(value)
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: error instanceof Error ? error.message : String(error),
        })
        return z.NEVER
      }
    }

    const nanos = tickDuration.nanos()
    if (!Number.isFinite(nanos) || nanos <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'tick_duration must be greater than 0' })
      return z.NEVER
    }
    if (nanos < MIN_TICK_NANOS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `tick_duration must be at least 1ms: ${tickDuration}` })
      return z.NEVER
    }
    return tickDuration
  })

export const TimerSettingsSchema = z.object({
  tickDuration: TickDurationSchema.default('100ms'),
  ticksPerWheel: z
    .number()
    .int({ message: 'ticks_per_wheel must be an integer' })
    .min(1, { message: 'ticks_per_wheel must be at least 1' })
    .max(MAX_TICKS_PER_WHEEL, { message: `ticks_per_wheel must be at most ${MAX_TICKS_PER_WHEEL}` })
    .default(1024),
})

export type TimerSettingsInput = z.input<typeof TimerSettingsSchema>
export type TimerSettings = z.output<typeof TimerSettingsSchema>
