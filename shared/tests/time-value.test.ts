import { describe, it, expect } from 'vitest'
import {
  TimeValue,
  TimeValueParseError,
  isTimeUnit,
  toNanos,
} from '../src/types/time-value.js'

describe('TimeValue', () => {
  describe('toNanos', () => {
    it('should convert every unit to nanoseconds', () => {
      expect(toNanos(3, 'nanoseconds')).toBe(3)
      expect(toNanos(3, 'microseconds')).toBe(3_000)
      expect(toNanos(3, 'milliseconds')).toBe(3_000_000)
      expect(toNanos(2, 'seconds')).toBe(2_000_000_000)
      expect(toNanos(1, 'minutes')).toBe(60_000_000_000)
      expect(toNanos(1, 'hours')).toBe(3_600_000_000_000)
      expect(toNanos(1, 'days')).toBe(86_400_000_000_000)
    })
  })

  describe('isTimeUnit', () => {
    it('should accept known units only', () => {
      expect(isTimeUnit('seconds')).toBe(true)
      expect(isTimeUnit('threaded')).toBe(false)
      expect(isTimeUnit('toString')).toBe(false)
      expect(isTimeUnit(5)).toBe(false)
    })
  })

  describe('parse', () => {
    it('should parse unit suffixes', () => {
      expect(TimeValue.parse('100ms').millis()).toBe(100)
      expect(TimeValue.parse('2s').millis()).toBe(2000)
      expect(TimeValue.parse('1.5m').seconds()).toBe(90)
      expect(TimeValue.parse('2h').seconds()).toBe(7200)
      expect(TimeValue.parse('1d').seconds()).toBe(86400)
      expect(TimeValue.parse('250micros').nanos()).toBe(250_000)
      expect(TimeValue.parse('40nanos').nanos()).toBe(40)
    })

    it('should read a bare number as milliseconds', () => {
      const value = TimeValue.parse('250')
      expect(value.unit).toBe('milliseconds')
      expect(value.millis()).toBe(250)
    })

    it('should ignore case and surrounding whitespace', () => {
      expect(TimeValue.parse(' 10 MS ').millis()).toBe(10)
    })

    it('should reject negative and malformed values', () => {
      expect(() => TimeValue.parse('-5ms')).toThrow(TimeValueParseError)
      expect(() => TimeValue.parse('abc')).toThrow(TimeValueParseError)
      expect(() => TimeValue.parse('')).toThrow('Failed to parse time value []: empty value')
      expect(() => TimeValue.parse('10 parsecs')).toThrow(TimeValueParseError)
    })
  })

  describe('accessors', () => {
    it('should convert between units', () => {
      const value = TimeValue.timeValueSeconds(2)
      expect(value.nanos()).toBe(2_000_000_000)
      expect(value.micros()).toBe(2_000_000)
      expect(value.millis()).toBe(2000)
      expect(value.seconds()).toBe(2)
    })

    it('should build values from static constructors', () => {
      expect(TimeValue.timeValueNanos(500).nanos()).toBe(500)
      expect(TimeValue.timeValueMillis(100).unit).toBe('milliseconds')
      expect(TimeValue.timeValueMinutes(2).seconds()).toBe(120)
      expect(TimeValue.timeValueHours(1).millis()).toBe(3_600_000)
    })
  })

  describe('toString', () => {
    it('should format in the largest whole unit', () => {
      expect(TimeValue.timeValueMillis(100).toString()).toBe('100ms')
      expect(TimeValue.timeValueMillis(1500).toString()).toBe('1.5s')
      expect(TimeValue.timeValueSeconds(90).toString()).toBe('1.5m')
      expect(TimeValue.timeValueHours(48).toString()).toBe('2d')
      expect(TimeValue.timeValueNanos(1500).toString()).toBe('1.5micros')
      expect(TimeValue.timeValueNanos(12).toString()).toBe('12nanos')
    })

    it('should round the display form to one decimal', () => {
      const value = TimeValue.timeValueSeconds(60.04)
      expect(value.toString()).toBe('1m')
      expect(TimeValue.parse(value.toString()).seconds()).toBe(60)
    })
  })
})
